// tests/unit/signals.unit.test.ts

import assert from "node:assert/strict"
import { describe, it } from "node:test"

import {
  basisMetrics,
  DEFAULT_THRESHOLDS,
  generateSignal,
  isEntrySignal,
  Signal,
} from "../../backtester/signals"
import { buildGrid } from "../../pipelines/grid"

describe("basisMetrics", () => {
  it("normalises the basis to 30 and 365 days", () => {
    const m = basisMetrics(90_000, 91_000, 20)
    assert.equal(m.basis, 1000)
    assert.ok(Math.abs(m.basisPct - 1000 / 90_000) < 1e-12)
    assert.ok(Math.abs(m.monthlyBasis - (1000 / 90_000) * 1.5) < 1e-12)
    assert.ok(Math.abs(m.annualBasis - ((1000 / 90_000) * 365) / 20) < 1e-12)
  })

  it("floors days to expiry at 1", () => {
    assert.equal(basisMetrics(100, 101, 0).daysToExpiry, 1)
    assert.equal(basisMetrics(100, 101, -5).daysToExpiry, 1)
  })

  it("treats a non-positive spot as zero basis", () => {
    const m = basisMetrics(0, 10, 5)
    assert.equal(m.basisPct, 0)
    assert.equal(m.monthlyBasis, 0)
  })
})

describe("generateSignal", () => {
  it("classifies each band with the default thresholds", () => {
    assert.equal(generateSignal(90_000, 91_000, 20), Signal.StrongEntry)
    assert.equal(generateSignal(100, 100.8, 30), Signal.AcceptableEntry)
    assert.equal(generateSignal(100, 100.4, 30), Signal.NoEntry)
    assert.equal(generateSignal(100, 103, 30), Signal.PartialExit)
    assert.equal(generateSignal(100, 104, 30), Signal.FullExit)
    assert.equal(generateSignal(100, 100.1, 30), Signal.StopLoss)
  })

  it("stops out on backwardation whatever the thresholds", () => {
    assert.equal(
      generateSignal(100, 99, 30, { ...DEFAULT_THRESHOLDS, stopLossThreshold: -1 }),
      Signal.StopLoss
    )
  })

  it("exits on a large basis when expiry is today", () => {
    assert.equal(generateSignal(100, 101, 0), Signal.FullExit)
  })

  it("stops out when spot is zero", () => {
    assert.equal(generateSignal(0, 10, 5), Signal.StopLoss)
  })

  it("is a pure function of its inputs", () => {
    const a = generateSignal(50_000, 50_600, 17)
    const b = generateSignal(50_000, 50_600, 17)
    assert.equal(a, b)
  })

  it("never enters below the entry threshold nor holds off above the exit threshold", () => {
    const { combos } = buildGrid()
    const monthly = Array.from({ length: 81 }, (_, i) => -0.01 + i * 0.001)
    for (const p of combos) {
      const t = {
        entryThreshold: p.entry,
        stopLossThreshold: p.stop,
        exitThreshold: p.exit,
        strongEntryThreshold: DEFAULT_THRESHOLDS.strongEntryThreshold,
      }
      for (const m of monthly) {
        const futures = 100 * (1 + m)
        const actual = basisMetrics(100, futures, 30).monthlyBasis
        const s = generateSignal(100, futures, 30, t)
        if (actual < t.entryThreshold) assert.ok(!isEntrySignal(s), `entry ${s} at ${actual}`)
        if (actual > t.exitThreshold) assert.notEqual(s, Signal.NoEntry)
      }
    }
  })
})

describe("isEntrySignal", () => {
  it("accepts only the two entry signals", () => {
    assert.ok(isEntrySignal(Signal.StrongEntry))
    assert.ok(isEntrySignal(Signal.AcceptableEntry))
    assert.ok(!isEntrySignal(Signal.PartialExit))
    assert.ok(!isEntrySignal(Signal.NoEntry))
  })
})
