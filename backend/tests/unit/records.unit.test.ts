// tests/unit/records.unit.test.ts

import { describe, it } from "node:test"
import assert from "node:assert/strict"

import { assertColumns, parseAmount, parseGrade, parsePercent, toLoanRecord } from "../../loans/records"
import { isChargedOff, isCurrent, isFullyPaid, isLate } from "../../loans/status"
import { MissingColumnError, ParseError } from "../../engine/errors"

describe("parsePercent", () => {
  it("turns a percentage string into a fraction", () => {
    assert.equal(parsePercent("13.5%"), 0.135)
    assert.equal(parsePercent(" 10%"), 0.1)
    assert.equal(parsePercent("7"), 0.07)
  })

  it("returns null for blank cells", () => {
    assert.equal(parsePercent(""), null)
    assert.equal(parsePercent("   "), null)
    assert.equal(parsePercent(undefined), null)
  })

  it("rejects text that is not a number", () => {
    assert.throws(() => parsePercent("abc%", { column: "int_rate", line: 7 }), {
      name: "ParseError",
      message: 'Invalid percentage "abc%" in column int_rate on line 7',
    })
    assert.throws(() => parsePercent("12..5%"), ParseError)
  })

  it("rejects rates that overflow to infinity", () => {
    assert.throws(() => parsePercent("1e999%", { column: "int_rate" }), {
      name: "ParseError",
      message: 'Invalid percentage "1e999%" in column int_rate',
    })
  })
})

describe("parseAmount", () => {
  it("parses plain decimals", () => {
    assert.equal(parseAmount("5000"), 5000)
    assert.equal(parseAmount(" 1234.56 "), 1234.56)
    assert.equal(parseAmount("-3.5"), -3.5)
  })

  it("rejects grouped or prefixed numbers", () => {
    assert.throws(() => parseAmount("1,000"), ParseError)
    assert.throws(() => parseAmount("$5"), ParseError)
    assert.throws(() => parseAmount("0x10"), ParseError)
  })

  it("rejects amounts that overflow to infinity", () => {
    assert.throws(() => parseAmount("1e400", { column: "loan_amnt", line: 3 }), {
      name: "ParseError",
      message: 'Invalid number "1e400" in column loan_amnt on line 3',
    })
  })
})

describe("parseGrade", () => {
  it("treats blank as absent", () => {
    assert.equal(parseGrade(""), null)
    assert.equal(parseGrade(undefined), null)
    assert.equal(parseGrade(" B "), "B")
  })
})

describe("assertColumns", () => {
  it("names every missing column", () => {
    assert.throws(
      () => assertColumns(["grade", "loan_amnt", "loan_status", "out_prncp", "total_pymnt"]),
      (e: unknown) =>
        e instanceof MissingColumnError &&
        e.message === "Missing required column(s): total_rec_int, total_rec_late_fee, int_rate"
    )
  })

  it("accepts extra columns", () => {
    assertColumns(["id", "grade", "loan_amnt", "loan_status", "out_prncp", "total_pymnt", "total_rec_int", "total_rec_late_fee", "int_rate"])
  })
})

describe("toLoanRecord", () => {
  it("maps source columns onto record fields", () => {
    const rec = toLoanRecord({
      grade: "C",
      loan_amnt: "12000",
      loan_status: "Charged Off",
      out_prncp: "0",
      total_pymnt: "4000.5",
      total_rec_int: "900",
      total_rec_late_fee: "",
      int_rate: "15%",
    })
    assert.deepEqual(rec, {
      grade: "C",
      loanAmount: 12000,
      loanStatus: "Charged Off",
      outstandingPrincipal: 0,
      totalPaymentsReceived: 4000.5,
      totalInterestReceived: 900,
      totalLateFeesReceived: null,
      interestRate: 0.15,
    })
  })
})

describe("status predicates", () => {
  it("matches the fixed vocabulary", () => {
    assert.ok(isFullyPaid("Fully Paid"))
    assert.ok(!isFullyPaid("Does not meet the credit policy. Status:Fully Paid"))
    assert.ok(isCurrent("Current"))
    assert.ok(isCurrent("In Grace Period"))
    assert.ok(isLate("Late (31-120 days)"))
    assert.ok(isLate("Default"))
    assert.ok(!isLate("late"))
    assert.ok(isChargedOff("Charged Off"))
    assert.ok(!isChargedOff("Does not meet the credit policy. Status:Charged Off"))
  })
})
