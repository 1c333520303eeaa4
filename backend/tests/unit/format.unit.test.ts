// tests/unit/format.unit.test.ts

import { describe, it } from "node:test"
import assert from "node:assert/strict"

import { formatCurrency, formatPercent, formatTable } from "../../loans/format"
import { mdTable, renderSummaryMarkdown } from "../../reports/md"
import type { SummaryTable } from "../../loans/types"

const table: SummaryTable = {
  rows: [
    {
      bucket: "A",
      totalIssued: 3000,
      fullyPaid: 1000,
      current: 1500,
      late: 0,
      chargedOffNet: 0,
      principalPaymentsReceived: 1500,
      interestPaymentsReceived: 80,
      avgInterestRate: 340 / 3000,
    },
    {
      bucket: "All",
      totalIssued: 1234567.4,
      fullyPaid: 0.5,
      current: -0.4,
      late: -425,
      chargedOffNet: 999.5,
      principalPaymentsReceived: 0,
      interestPaymentsReceived: 12.49,
      avgInterestRate: NaN,
    },
  ],
  recordCount: 2,
  droppedCount: 0,
}

describe("formatCurrency", () => {
  it("rounds to whole dollars with grouping", () => {
    assert.equal(formatCurrency(1234567.4), "$1,234,567")
    assert.equal(formatCurrency(1234567.5), "$1,234,568")
    assert.equal(formatCurrency(999.5), "$1,000")
    assert.equal(formatCurrency(0), "$0")
  })

  it("puts the sign after the dollar sign", () => {
    assert.equal(formatCurrency(-425), "$-425")
    assert.equal(formatCurrency(-1234.6), "$-1,235")
  })

  it("does not render negative zero", () => {
    assert.equal(formatCurrency(-0.4), "$0")
  })
})

describe("formatPercent", () => {
  it("shows two decimals", () => {
    assert.equal(formatPercent(0.1325), "13.25%")
    assert.equal(formatPercent(0.2), "20.00%")
    assert.equal(formatPercent(440 / 3500), "12.57%")
  })

  it("shows a dash for an undefined rate", () => {
    assert.equal(formatPercent(NaN), "—")
  })
})

describe("formatTable", () => {
  it("keeps row order and formats every column", () => {
    assert.deepEqual(formatTable(table), [
      {
        bucket: "A",
        totalIssued: "$3,000",
        fullyPaid: "$1,000",
        current: "$1,500",
        late: "$0",
        chargedOffNet: "$0",
        principalPaymentsReceived: "$1,500",
        interestPaymentsReceived: "$80",
        avgInterestRate: "11.33%",
      },
      {
        bucket: "All",
        totalIssued: "$1,234,567",
        fullyPaid: "$1",
        current: "$0",
        late: "$-425",
        chargedOffNet: "$1,000",
        principalPaymentsReceived: "$0",
        interestPaymentsReceived: "$12",
        avgInterestRate: "—",
      },
    ])
  })
})

describe("mdTable", () => {
  it("escapes pipes inside cells", () => {
    assert.equal(mdTable(["a"], [["x|y"]]), "| a |\n| :--- |\n| x\\|y |")
  })

  it("applies column alignment", () => {
    assert.equal(mdTable(["k", "v"], [["a", 1]], ["left", "right"]), "| k | v |\n| :--- | ---: |\n| a | 1 |")
  })
})

describe("renderSummaryMarkdown", () => {
  it("renders one line per bucket under a labelled header", () => {
    const lines = renderSummaryMarkdown(formatTable(table)).split("\n")
    assert.deepEqual(lines, [
      "|  | Total Issued | Fully Paid | Current | Late | Charged Off (Net) | Principal Payments Received | Interest Payments Received | Avg. Interest Rate |",
      "| :--- | ---: | ---: | ---: | ---: | ---: | ---: | ---: | ---: |",
      "| A | $3,000 | $1,000 | $1,500 | $0 | $0 | $1,500 | $80 | 11.33% |",
      "| All | $1,234,567 | $1 | $0 | $-425 | $1,000 | $0 | $12 | — |",
      "",
    ])
  })
})
