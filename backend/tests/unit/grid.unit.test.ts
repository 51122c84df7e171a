// tests/unit/grid.unit.test.ts

import assert from "node:assert/strict"
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { describe, it } from "node:test"

import { generateSampleData } from "../../data/sample"
import { isAppError } from "../../engine/errors"
import { setLogLevel } from "../../observability/logger"
import {
  BASELINE_PARAMS,
  bestParams,
  buildGrid,
  DEFAULT_GRID,
  frange,
  isValidCombo,
  runGridSearch,
  runGridSearchAsync,
  saveBestParams,
  type GridSpec,
} from "../../pipelines/grid"

setLogLevel("silent")

const SMALL_GRID: GridSpec = {
  entry: [0.005, 0.01],
  stop: [0.002, 0.012],
  exit: [0.035],
  hold: [10, 30],
}

const observations = generateSampleData("2024-01-01", "2024-04-30", { seed: 11 })

describe("frange", () => {
  it("includes the stop value", () => {
    assert.deepEqual(frange(0.001, 0.005, 0.001), [0.001, 0.002, 0.003, 0.004, 0.005])
  })

  it("rejects a non-positive step", () => {
    assert.throws(() => frange(0, 1, 0), (e: unknown) => isAppError(e) && e.kind === "Optimizer")
  })
})

describe("buildGrid", () => {
  it("sizes the default grid", () => {
    assert.equal(DEFAULT_GRID.entry.length, 10)
    assert.equal(DEFAULT_GRID.stop.length, 5)
    assert.equal(DEFAULT_GRID.exit.length, 9)
    assert.equal(DEFAULT_GRID.hold.length, 6)

    const { combos, total } = buildGrid()
    assert.equal(total, 2700)
    assert.equal(combos.length, 2346)
  })

  it("keeps only ordered threshold combinations", () => {
    for (const p of buildGrid().combos) {
      assert.ok(p.entry > p.stop, `entry ${p.entry} <= stop ${p.stop}`)
      assert.ok(p.exit > p.entry, `exit ${p.exit} <= entry ${p.entry}`)
    }
    assert.ok(!isValidCombo({ entry: 0.002, stop: 0.002, exit: 0.03, hold: 10 }))
    assert.ok(!isValidCombo({ entry: 0.02, stop: 0.002, exit: 0.02, hold: 10 }))
  })

  it("keeps grid order", () => {
    const { combos, total } = buildGrid(SMALL_GRID)
    assert.equal(total, 8)
    assert.deepEqual(combos, [
      { entry: 0.005, stop: 0.002, exit: 0.035, hold: 10 },
      { entry: 0.005, stop: 0.002, exit: 0.035, hold: 30 },
      { entry: 0.01, stop: 0.002, exit: 0.035, hold: 10 },
      { entry: 0.01, stop: 0.002, exit: 0.035, hold: 30 },
    ])
  })
})

describe("runGridSearch", () => {
  const report = runGridSearch(observations, {}, { grid: SMALL_GRID, topN: 2 })

  it("ranks by total return, best first", () => {
    assert.equal(report.totalCombos, 8)
    assert.equal(report.evaluated, 4)
    for (let i = 1; i < report.results.length; i++) {
      assert.ok(report.results[i - 1].return >= report.results[i].return)
    }
    assert.ok(report.top.length <= 2)
    assert.deepEqual(report.best, report.valid[0] ?? null)
    assert.ok(!report.aborted)
  })

  it("scores the default parameters as the baseline", () => {
    const { entry, stop, exit, hold } = report.baseline
    assert.deepEqual({ entry, stop, exit, hold }, BASELINE_PARAMS)
  })

  it("reports no best row when nothing traded", () => {
    const empty = runGridSearch([], {}, { grid: SMALL_GRID })
    assert.equal(empty.valid.length, 0)
    assert.equal(empty.best, null)
  })
})

describe("runGridSearchAsync", () => {
  it("matches the synchronous sweep", async () => {
    const sync = runGridSearch(observations, {}, { grid: SMALL_GRID })
    const queued = await runGridSearchAsync(observations, {}, { grid: SMALL_GRID, concurrency: 3 })
    assert.deepEqual(queued.results, sync.results)
    assert.deepEqual(queued.baseline, sync.baseline)
  })

  it("stops early on abort and reports what it scored", async () => {
    const ac = new AbortController()
    const seen: number[] = []
    const report = await runGridSearchAsync(observations, {}, {
      grid: SMALL_GRID,
      concurrency: 1,
      signal: ac.signal,
      onProgress: done => {
        seen.push(done)
        if (done === 3) ac.abort()
      },
    })
    assert.deepEqual(seen, [1, 2, 3])
    assert.equal(report.evaluated, 3)
    assert.ok(report.aborted)
  })

  it("scores nothing when aborted up front", async () => {
    const ac = new AbortController()
    ac.abort()
    const report = await runGridSearchAsync(observations, {}, { grid: SMALL_GRID, signal: ac.signal })
    assert.equal(report.evaluated, 0)
    assert.ok(report.aborted)
    assert.equal(report.best, null)
  })
})

describe("saveBestParams", () => {
  it("writes the best row as threshold keys", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "grid-"))
    const file = path.join(dir, "nested", "best.json")
    const report = runGridSearch(observations, {}, { grid: SMALL_GRID })
    assert.ok(report.best)

    assert.equal(saveBestParams(report, file), true)
    assert.deepEqual(JSON.parse(fs.readFileSync(file, "utf8")), bestParams(report.best))
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it("writes nothing without a best row", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "grid-"))
    const file = path.join(dir, "best.json")
    assert.equal(saveBestParams(runGridSearch([], {}, { grid: SMALL_GRID }), file), false)
    assert.ok(!fs.existsSync(file))
    fs.rmSync(dir, { recursive: true, force: true })
  })
})
