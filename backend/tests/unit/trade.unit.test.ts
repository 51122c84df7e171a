// tests/unit/trade.unit.test.ts

import assert from "node:assert/strict"
import { describe, it } from "node:test"

import { BacktestResult, Trade } from "../../backtester/trade"
import { isAppError } from "../../engine/errors"

const open = () =>
  new Trade({ entryDate: "2024-01-01", entrySpot: 90_000, entryFutures: 91_000, entryBasis: 1000 })

describe("Trade", () => {
  it("starts open with no exit figures", () => {
    const t = open()
    assert.ok(t.isOpen)
    assert.equal(t.status, "open")
    assert.equal(t.positionSize, 1)
    assert.equal(t.holdingDays, 0)
    assert.equal(t.returnPct, null)
    assert.equal(t.annualizedReturn, null)
    assert.equal(t.exitBasis, null)
  })

  it("derives returns once closed", () => {
    const t = open()
    t.close({
      exitDate: "2024-01-11",
      exitSpot: 92_000,
      exitFutures: 92_500,
      status: "closed",
      fundingCost: 100,
      realizedPnl: 400,
    })
    assert.equal(t.exitBasis, 500)
    assert.equal(t.holdingDays, 10)
    assert.equal(t.returnPct, 400 / 90_000)
    assert.equal(t.annualizedReturn, (400 / 90_000) * 36.5)
    assert.equal(t.costs, null)

    const r = t.toRecord()
    assert.equal(r.exit_date, "2024-01-11")
    assert.equal(r.return_pct, (400 / 90_000) * 100)
    assert.equal(r.status, "closed")
  })

  it("leaves annualised return unset for a same-day close", () => {
    const t = open()
    t.close({ exitDate: "2024-01-01", exitSpot: 90_000, exitFutures: 91_000, status: "forced_close", fundingCost: 0, realizedPnl: 0 })
    assert.equal(t.returnPct, 0)
    assert.equal(t.annualizedReturn, null)
  })

  it("leaves the exit basis unset on a forced close", () => {
    const t = open()
    t.close({ exitDate: "2024-01-05", exitSpot: 91_000, exitFutures: 91_800, status: "forced_close", fundingCost: 0, realizedPnl: 0 })
    assert.equal(t.exitBasis, null)
    assert.equal(t.toRecord().exit_basis, null)
    assert.equal(t.toRecord().exit_date, "2024-01-05")
  })

  it("refuses to close twice", () => {
    const t = open()
    const exit = { exitDate: "2024-01-02", exitSpot: 1, exitFutures: 1, status: "closed" as const, fundingCost: 0, realizedPnl: 0 }
    t.close(exit)
    assert.throws(() => t.close(exit), (e: unknown) => isAppError(e) && e.kind === "Backtest")
  })
})

describe("BacktestResult", () => {
  it("is zeroed when empty", () => {
    const r = BacktestResult.empty(1000)
    assert.equal(r.totalTrades, 0)
    assert.equal(r.winRate, 0)
    assert.equal(r.profitFactor, Infinity)
    assert.equal(r.finalCapital, 1000)
    assert.deepEqual(r.equityCurve, [{ date: null, equity: 1000 }])
    assert.equal(r.toRecord().summary.start_date, null)
  })

  it("derives profit factor and final capital", () => {
    const r = new BacktestResult({
      initialCapital: 100_000,
      stats: { totalReturn: 0.1, avgWin: 0.02, avgLoss: -0.01 },
    })
    assert.equal(r.profitFactor, 2)
    assert.ok(Math.abs(r.finalCapital - 110_000) < 1e-6)
    assert.ok(Math.abs(r.toRecord().summary.avg_win - 2) < 1e-9)
  })
})
