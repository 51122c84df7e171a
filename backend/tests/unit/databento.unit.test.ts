// tests/unit/databento.unit.test.ts

import assert from "node:assert/strict"
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { after, describe, it } from "node:test"

import { DatabentoLocalSource, findDatabentoCSV, parseDatabentoRows } from "../../data/databento"
import { resolveFrontContract } from "../../derivatives/futures/continuous"
import { isAppError } from "../../engine/errors"
import { setLogLevel } from "../../observability/logger"

setLogLevel("silent")

const HEADER = "ts_event,rtype,publisher_id,instrument_id,open,high,low,close,volume,symbol"
const row = (day: string, close: number, symbol: string, volume = 10) =>
  `${day}T00:00:00.000000000Z,35,1,1001,${close},${close},${close},${close},${volume},${symbol}`

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "databento-"))
const mainFile = path.join(dir, "glbx-mdp3-20240101-20240131.ohlcv-1d.csv")
fs.writeFileSync(
  mainFile,
  [
    HEADER,
    row("2024-01-24", 40000, "MBTF4"),
    row("2024-01-24", 40500, "MBTG4"),
    row("2024-01-25", 40100, "MBTF4"),
    row("2024-01-25", 40600, "MBTG4"),
    row("2024-01-29", 41000, "MBTG4"),
    row("2024-01-29", 500, "MBTF4-MBTG4"),
    row("2024-01-29", 2300, "METG4"),
  ].join("\n") + "\n"
)
fs.writeFileSync(path.join(dir, "small.ohlcv-1d.csv"), [HEADER, row("2024-01-24", 1, "MBTF4")].join("\n"))
fs.writeFileSync(path.join(dir, "notes.csv"), "not,databento\n")

after(() => fs.rmSync(dir, { recursive: true, force: true }))

describe("findDatabentoCSV", () => {
  it("picks the largest OHLCV file", () => {
    assert.equal(findDatabentoCSV(dir), mainFile)
  })

  it("finds nothing in a missing directory", () => {
    assert.equal(findDatabentoCSV(path.join(dir, "missing")), undefined)
  })
})

describe("parseDatabentoRows", () => {
  it("keeps outright contracts and decodes their month", () => {
    const rows = parseDatabentoRows(mainFile)
    assert.equal(rows.length, 6)
    assert.deepEqual(rows[0], {
      date: "2024-01-24",
      root: "MBT",
      code: "202401",
      symbol: "MBTF4",
      price: 40000,
      volume: 10,
    })
    assert.ok(!rows.some(r => r.symbol.includes("-")))
  })
})

describe("DatabentoLocalSource", () => {
  it("serves one contract's bars within the range, with its expiry", async () => {
    const res = await new DatabentoLocalSource(dir).fetchContract("MBT", "202401", "2024-01-01", "2024-01-31")
    assert.ok(res.ok)
    assert.deepEqual(res.value, [
      { date: "2024-01-24", price: 40000, expiry: "2024-01-26" },
      { date: "2024-01-25", price: 40100, expiry: "2024-01-26" },
    ])
  })

  it("rejects an invalid month code", async () => {
    const res = await new DatabentoLocalSource(dir).fetchContract("MBT", "2024", "2024-01-01", "2024-01-31")
    assert.ok(!res.ok)
    assert.equal(isAppError(res.error) && res.error.kind, "Fetch")
  })

  it("splices a front-month continuous series", () => {
    const res = new DatabentoLocalSource(dir).continuousSeries("MBT", "2024-01-24", "2024-01-31")
    assert.ok(res.ok)
    assert.deepEqual(res.value, [
      { date: "2024-01-24", price: 40000, code: "202401" },
      { date: "2024-01-25", price: 40100, code: "202401" },
      { date: "2024-01-29", price: 41000, code: "202402" },
    ])
  })

  it("caches the load, including a failed one", () => {
    const empty = new DatabentoLocalSource(path.join(dir, "missing"))
    const first = empty.rows()
    assert.ok(!first.ok)
    assert.equal(isAppError(first.error) && first.error.kind, "Data")
    assert.equal(empty.rows(), first)

    const src = new DatabentoLocalSource(dir)
    assert.equal(src.rows(), src.rows())
  })

  it("feeds the front-contract resolver", async () => {
    const res = await resolveFrontContract(new DatabentoLocalSource(dir), "MBT", "2024-01-24", "2024-01-31")
    assert.ok(res.ok)
    assert.equal(res.value.code, "202401")
    assert.equal(res.value.bars.length, 2)
  })
})
