// tests/unit/engine.unit.test.ts

import assert from "node:assert/strict"
import { describe, it } from "node:test"

import { Backtester, DEFAULT_BACKTESTER_CONFIG, runBacktest } from "../../backtester/engine"
import { calculateCosts } from "../../backtester/costs"
import { Signal } from "../../backtester/signals"
import { generateSampleData } from "../../data/sample"
import type { Observation } from "../../data/types"
import { setLogLevel } from "../../observability/logger"

setLogLevel("silent")

const close = (a: number, b: number, eps = 1e-6) => assert.ok(Math.abs(a - b) < eps, `${a} != ${b}`)

const FUNDING_10D = (0.05 / 365) * 10 * 90_000

const entryBar: Observation = { date: "2024-01-01", spotPrice: 90_000, futuresPrice: 91_000, futuresExpiry: "2024-01-26" }

describe("Backtester.run", () => {
  it("returns a zeroed result for an empty series", () => {
    const r = new Backtester().run([])
    assert.equal(r.totalTrades, 0)
    assert.equal(r.totalReturn, 0)
    assert.equal(r.sharpeRatio, 0)
    assert.equal(r.maxDrawdown, 0)
    assert.equal(r.startDate, null)
    assert.equal(r.finalCapital, DEFAULT_BACKTESTER_CONFIG.accountSize)
  })

  it("opens and force-closes on a single observation", () => {
    const obs: Observation[] = [{ date: "2024-01-01", spotPrice: 90_000, futuresPrice: 91_000, futuresExpiry: "2024-01-21" }]
    const bt = new Backtester()
    assert.equal(bt.signalFor(obs[0]), Signal.StrongEntry)

    const r = bt.run(obs)
    assert.equal(r.totalTrades, 1)
    const [t] = r.trades
    assert.equal(t.status, "forced_close")
    assert.equal(t.holdingDays, 0)
    assert.equal(t.realizedPnl, 0)
    assert.equal(r.winningTrades, 0)
    assert.equal(r.losingTrades, 0)
    assert.equal(t.exitBasis, null)
    assert.deepEqual(r.equityCurve, [{ date: "2024-01-01", equity: 200_000 }])
    assert.equal(r.startDate, "2024-01-01")
    assert.equal(r.endDate, "2024-01-01")
  })

  it("closes at the holding limit with funding deducted, then re-enters on the same bar", () => {
    const obs: Observation[] = [
      entryBar,
      { date: "2024-01-11", spotPrice: 92_000, futuresPrice: 92_500, futuresExpiry: "2024-01-26" },
    ]
    const r = new Backtester({ holdingDays: 10 }).run(obs)

    assert.equal(r.totalTrades, 2)
    const [first, second] = r.trades
    assert.equal(first.status, "closed")
    assert.equal(first.exitDate, "2024-01-11")
    assert.equal(first.holdingDays, 10)
    close(first.fundingCost, FUNDING_10D)
    close(first.realizedPnl ?? NaN, 2000 - 1500 - FUNDING_10D)
    close(first.realizedPnl ?? NaN, 376.712329)

    assert.equal(second.entryDate, "2024-01-11")
    assert.equal(second.status, "forced_close")
    assert.equal(second.realizedPnl, 0)

    assert.equal(r.equityCurve.length, 2)
    close(r.equityCurve[1].equity, 200_000 + 500 - FUNDING_10D)
    close(r.totalReturn, (500 - FUNDING_10D) / 200_000)
    assert.equal(r.winningTrades, 1)
    assert.equal(r.losingTrades, 0)
    close(r.avgWin, (500 - FUNDING_10D) / 90_000)
    assert.equal(r.avgLoss, 0)
  })

  it("keeps a forced close out of the equity curve and the return", () => {
    const obs: Observation[] = [
      entryBar,
      { date: "2024-01-02", spotPrice: 90_000, futuresPrice: 91_000, futuresExpiry: "2024-01-26" },
    ]
    const r = new Backtester().run(obs)

    assert.equal(r.totalTrades, 1)
    const [t] = r.trades
    assert.equal(t.status, "forced_close")
    assert.equal(t.exitDate, "2024-01-02")
    close(t.realizedPnl ?? NaN, -(0.05 / 365) * 90_000)
    assert.equal(r.losingTrades, 1)
    assert.deepEqual(r.equityCurve, [{ date: "2024-01-01", equity: 200_000 }])
    assert.equal(r.totalReturn, 0)
    assert.equal(r.maxDrawdown, 0)
    assert.equal(r.finalCapital, 200_000)
  })

  it("lets a per-run holding limit override the configured one", () => {
    const obs: Observation[] = [
      entryBar,
      { date: "2024-01-11", spotPrice: 92_000, futuresPrice: 92_500, futuresExpiry: "2024-01-26" },
    ]
    const r = new Backtester({ holdingDays: 30 }).run(obs, 10)
    assert.equal(r.trades[0].status, "closed")
  })

  it("stops out on backwardation and stays flat", () => {
    const obs: Observation[] = [
      entryBar,
      { date: "2024-01-05", spotPrice: 93_000, futuresPrice: 92_900, futuresExpiry: "2024-01-26" },
      { date: "2024-01-06", spotPrice: 93_000, futuresPrice: 92_800, futuresExpiry: "2024-01-26" },
    ]
    const r = runBacktest(obs)
    assert.equal(r.totalTrades, 1)
    assert.equal(r.trades[0].status, "stopped_out")
    assert.equal(r.trades[0].exitDate, "2024-01-05")
  })

  it("takes the basis off on a full-exit signal", () => {
    const obs: Observation[] = [
      entryBar,
      { date: "2024-01-11", spotPrice: 92_000, futuresPrice: 96_000, futuresExpiry: "2024-01-26" },
    ]
    const r = runBacktest(obs)
    assert.equal(r.totalTrades, 1)
    assert.equal(r.trades[0].status, "closed")
    assert.ok((r.trades[0].realizedPnl ?? 0) < 0)
  })

  it("deducts itemised costs when trading costs are on", () => {
    const obs: Observation[] = [
      entryBar,
      { date: "2024-01-11", spotPrice: 92_000, futuresPrice: 92_500, futuresExpiry: "2024-01-26" },
    ]
    const r = new Backtester({ holdingDays: 10, applyTradingCosts: true }).run(obs)
    const expected = calculateCosts({
      entrySpot: 90_000,
      exitSpot: 92_000,
      entryFutures: 91_000,
      exitFutures: 92_500,
      positionSize: 1,
      holdingDays: 10,
    })
    const [first] = r.trades
    close(first.realizedPnl ?? NaN, 500 - expected.totalCosts)
    close(first.costs?.totalCosts ?? NaN, expected.totalCosts)
    close(first.fundingCost, FUNDING_10D)
  })

  it("closes every trade it opens and never mutates its input", () => {
    const obs = generateSampleData("2024-01-01", "2024-06-30", { seed: 7 })
    const frozen = Object.freeze(obs.map(o => Object.freeze({ ...o })))
    const r = new Backtester().run(frozen)

    assert.ok(r.totalTrades > 0)
    for (const t of r.trades) assert.notEqual(t.status, "open")
    const exited = r.trades.filter(t => t.status !== "forced_close").length
    assert.equal(r.equityCurve.length, exited + 1)
    assert.ok(r.maxDrawdown >= 0)
    assert.ok(r.winningTrades + r.losingTrades <= r.totalTrades)
  })
})
