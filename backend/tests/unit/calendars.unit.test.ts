// tests/unit/calendars.unit.test.ts

import assert from "node:assert/strict"
import { describe, it } from "node:test"

import {
  buildExpirySchedule,
  daysBetween,
  daysToExpiry,
  expiryFromYYYYMM,
  expiryToCode,
  expiryWindow,
  frontMonthCode,
  frontMonthExpiry,
  lastTradingFriday,
  parseISODate,
} from "../../derivatives/futures/calendars"
import { isAppError } from "../../engine/errors"
import { setLogLevel } from "../../observability/logger"

setLogLevel("silent")

describe("lastTradingFriday", () => {
  it("finds the last Friday of the month", () => {
    assert.equal(lastTradingFriday(2024, 1), "2024-01-26")
    assert.equal(lastTradingFriday(2024, 2), "2024-02-23")
    assert.equal(lastTradingFriday(2024, 3), "2024-03-29")
    assert.equal(lastTradingFriday(2023, 12), "2023-12-29")
  })

  it("returns the month's last day when that day is a Friday", () => {
    assert.equal(lastTradingFriday(2024, 5), "2024-05-31")
  })
})

describe("buildExpirySchedule", () => {
  it("covers the range plus the forward buffer, sorted", () => {
    assert.deepEqual(buildExpirySchedule("2024-01-10", "2024-03-15"), [
      "2024-01-26",
      "2024-02-23",
      "2024-03-29",
      "2024-04-26",
      "2024-05-31",
    ])
  })

  it("honours a custom buffer", () => {
    assert.deepEqual(buildExpirySchedule("2024-01-10", "2024-01-20", 0), ["2024-01-26"])
  })
})

describe("frontMonthExpiry", () => {
  const schedule = buildExpirySchedule("2024-01-10", "2024-03-15")

  it("keeps a contract as front month through its expiry day", () => {
    assert.equal(frontMonthExpiry("2024-01-10", schedule), "2024-01-26")
    assert.equal(frontMonthExpiry("2024-01-26", schedule), "2024-01-26")
    assert.equal(frontMonthExpiry("2024-01-27", schedule), "2024-02-23")
  })

  it("falls back to the last expiry past the buffered range", () => {
    assert.equal(frontMonthExpiry("2024-07-01", schedule), "2024-05-31")
  })

  it("is undefined for an empty schedule", () => {
    assert.equal(frontMonthExpiry("2024-01-10", []), undefined)
  })
})

describe("month codes", () => {
  it("maps YYYYMM to the expiry and back", () => {
    assert.equal(expiryFromYYYYMM("202402"), "2024-02-23")
    assert.equal(expiryToCode("2024-02-23"), "202402")
  })

  it("rejects a malformed code with a Data error", () => {
    assert.throws(
      () => expiryFromYYYYMM("202413"),
      (e: unknown) => isAppError(e) && e.kind === "Data"
    )
  })

  it("rolls the front-month code on the last trading Friday", () => {
    assert.equal(frontMonthCode("2024-01-25"), "202401")
    assert.equal(frontMonthCode("2024-01-26"), "202402")
    assert.equal(frontMonthCode("2023-12-28"), "202312")
    assert.equal(frontMonthCode("2023-12-29"), "202401")
  })
})

describe("expiryWindow", () => {
  it("runs from the previous expiry to the day before expiry", () => {
    assert.deepEqual(expiryWindow("202402"), { start: "2024-01-26", end: "2024-02-22" })
  })

  it("ends on expiry when asked", () => {
    assert.deepEqual(expiryWindow("202402", true), { start: "2024-01-27", end: "2024-02-23" })
  })

  it("crosses the year boundary for January", () => {
    assert.deepEqual(expiryWindow("202401"), { start: "2023-12-29", end: "2024-01-25" })
  })
})

describe("date helpers", () => {
  it("parses dates and timestamps, rejecting impossible days", () => {
    assert.equal(parseISODate("2024-02-29T10:00:00Z"), "2024-02-29")
    assert.equal(parseISODate("2024-02-30"), undefined)
    assert.equal(parseISODate("bad"), undefined)
  })

  it("counts calendar days", () => {
    assert.equal(daysBetween("2024-01-01", "2024-03-01"), 60)
    assert.equal(daysBetween("2024-01-10", "2024-01-01"), -9)
    assert.equal(daysToExpiry("2024-01-21", "2024-01-01"), 20)
  })
})
