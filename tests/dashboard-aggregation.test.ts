import test from "node:test";
import assert from "node:assert/strict";
import type { SalesInvoice } from "@shared/schema";
import {
  buildCustomerOverview,
  buildDailySeries,
  buildMonthlySeries,
  buildOpenInvoiceRows,
  computeDaysOverdue,
  rankTopCustomers,
  rollupDebtsByCustomer,
  searchCustomers,
  summarizeRevenue,
  topN,
} from "../server/dashboard-aggregation";

let sequence = 0;

function invoice(overrides: Partial<SalesInvoice>): SalesInvoice {
  sequence += 1;
  const ttc = overrides.ttc ?? 0;
  const outstanding = overrides.outstandingAmount ?? 0;
  const rate = overrides.conversionRate ?? 1;
  return {
    name: `SINV-${String(sequence).padStart(4, "0")}`,
    postingDate: null,
    dueDate: null,
    company: "Acme",
    customer: "Bob",
    grandTotal: ttc,
    baseGrandTotal: ttc,
    currency: "EUR",
    status: "Unpaid",
    docstatus: "submitted",
    ...overrides,
    ttc,
    outstandingAmount: outstanding,
    conversionRate: rate,
    baseOutstanding: outstanding * rate,
  };
}

const periodInvoices = [
  invoice({ company: "Acme", customer: "Bob", postingDate: "2024-01-30", ttc: 100 }),
  invoice({ company: "Beta", customer: "Dan", postingDate: "2024-01-31", ttc: 10 }),
  invoice({ company: "Acme", customer: "Carl", postingDate: "2024-02-02", ttc: 50 }),
  invoice({ company: "Acme", customer: "Bob", postingDate: "2024-01-30", ttc: 25 }),
  invoice({ company: null, customer: "Ghost", postingDate: "2024-01-30", ttc: 999 }),
];

test("buildDailySeries fills idle days inside each company span", () => {
  assert.deepEqual(buildDailySeries(periodInvoices), [
    { date: "2024-01-30", company: "Acme", ttc: 125 },
    { date: "2024-01-31", company: "Acme", ttc: 0 },
    { date: "2024-02-01", company: "Acme", ttc: 0 },
    { date: "2024-02-02", company: "Acme", ttc: 50 },
    { date: "2024-01-31", company: "Beta", ttc: 10 },
  ]);
});

test("buildDailySeries is empty without dated invoices", () => {
  assert.deepEqual(buildDailySeries([]), []);
  assert.deepEqual(buildDailySeries([invoice({ ttc: 5 })]), []);
});

test("buildMonthlySeries sums the daily series per company and month", () => {
  assert.deepEqual(buildMonthlySeries(buildDailySeries(periodInvoices)), [
    { month: "2024-01", company: "Acme", ttc: 125 },
    { month: "2024-02", company: "Acme", ttc: 50 },
    { month: "2024-01", company: "Beta", ttc: 10 },
  ]);
});

test("summarizeRevenue counts invoices and distinct days", () => {
  const dated = periodInvoices.slice(0, 4);
  const summary = summarizeRevenue(dated, buildDailySeries(dated));

  assert.deepEqual(summary, { totalTtc: 185, invoiceCount: 4, averageInvoice: 46.25, dayCount: 4 });
  assert.deepEqual(summarizeRevenue([], []), { totalTtc: 0, invoiceCount: 0, averageInvoice: 0, dayCount: 0 });
});

test("rankTopCustomers sorts descending and keeps first-seen order on ties", () => {
  const invoices = [
    invoice({ customer: "A", ttc: 50 }),
    invoice({ customer: "B", ttc: 30 }),
    invoice({ customer: "C", ttc: 50 }),
    invoice({ customer: "B", ttc: 40 }),
    invoice({ customer: null, ttc: 500 }),
  ];

  assert.deepEqual(rankTopCustomers(invoices), [
    { customer: "B", ttc: 70 },
    { customer: "A", ttc: 50 },
    { customer: "C", ttc: 50 },
  ]);
  assert.deepEqual(rankTopCustomers(invoices, 2).map(row => row.customer), ["B", "A"]);
});

test("topN never returns more rows than asked", () => {
  assert.deepEqual(topN([3, 1, 2], value => value, 0), []);
  assert.deepEqual(topN([3, 1, 2], value => value, 10), [3, 2, 1]);
});

test("computeDaysOverdue counts whole days and goes negative before the due date", () => {
  assert.equal(computeDaysOverdue("2024-03-01", "2024-03-11"), 10);
  assert.equal(computeDaysOverdue("2024-03-16", "2024-03-11"), -5);
  assert.equal(computeDaysOverdue("2024-02-28", "2024-03-01"), 2);
  assert.equal(computeDaysOverdue(null, "2024-03-11"), 0);
});

const openInvoices = [
  invoice({ company: "Acme", customer: "Bob", dueDate: "2024-03-08", outstandingAmount: 40 }),
  invoice({ company: "Acme", customer: "Carl", dueDate: null, outstandingAmount: 200 }),
  invoice({ company: "Acme", customer: "Bob", dueDate: "2024-03-01", outstandingAmount: 30, conversionRate: 2 }),
  invoice({ company: "Beta", customer: "Bob", dueDate: "2024-03-20", outstandingAmount: 15 }),
];

test("rollupDebtsByCustomer groups by company and customer", () => {
  assert.deepEqual(rollupDebtsByCustomer(openInvoices, "2024-03-11"), [
    { company: "Acme", customer: "Carl", outstanding: 200, invoices: 1, maxOverdue: 0 },
    { company: "Acme", customer: "Bob", outstanding: 100, invoices: 2, maxOverdue: 10 },
    { company: "Beta", customer: "Bob", outstanding: 15, invoices: 1, maxOverdue: -9 },
  ]);
});

test("buildOpenInvoiceRows orders by company, customer, then due date with missing dates last", () => {
  const rows = buildOpenInvoiceRows(
    [...openInvoices, invoice({ company: "Acme", customer: "Bob", dueDate: null, outstandingAmount: 5 })],
    "2024-03-11",
  );

  assert.deepEqual(
    rows.map(row => [row.company, row.customer, row.dueDate, row.daysOverdue]),
    [
      ["Acme", "Bob", "2024-03-01", 10],
      ["Acme", "Bob", "2024-03-08", 3],
      ["Acme", "Bob", null, 0],
      ["Acme", "Carl", null, 0],
      ["Beta", "Bob", "2024-03-20", -9],
    ],
  );
  assert.equal(rows[0].baseOutstanding, 60);
  assert.equal(rows[0].conversionRate, 2);
});

test("buildCustomerOverview joins period sales with outstanding balances", () => {
  const overview = buildCustomerOverview(
    [
      invoice({ company: "Beta", customer: "Dan", postingDate: "2024-01-10", ttc: 300 }),
      invoice({ company: "Acme", customer: "Bob", postingDate: "2024-01-20", ttc: 50 }),
      invoice({ company: "Acme", customer: "Bob", postingDate: "2024-01-05", ttc: 100 }),
    ],
    [
      invoice({ company: "Acme", customer: "Carl", outstandingAmount: 30 }),
      invoice({ company: "Acme", customer: "Bob", outstandingAmount: 20 }),
    ],
  );

  assert.deepEqual(overview, [
    { company: "Acme", customer: "Bob", salesTtc: 150, invoices: 2, lastInvoice: "2024-01-20", outstanding: 20 },
    { company: "Acme", customer: "Carl", salesTtc: 0, invoices: 0, lastInvoice: null, outstanding: 30 },
    { company: "Beta", customer: "Dan", salesTtc: 300, invoices: 1, lastInvoice: "2024-01-10", outstanding: 0 },
  ]);
});

test("searchCustomers matches case-insensitively", () => {
  const rows = [{ customer: "Bob Martin" }, { customer: "Carl" }, { customer: "BOBBY" }];

  assert.deepEqual(searchCustomers(rows, "bob"), [{ customer: "Bob Martin" }, { customer: "BOBBY" }]);
  assert.deepEqual(searchCustomers(rows, ""), rows);
});

test("aggregations return equal results for repeated calls on the same input", () => {
  assert.deepEqual(buildDailySeries(periodInvoices), buildDailySeries(periodInvoices));
  assert.deepEqual(rollupDebtsByCustomer(openInvoices, "2024-03-11"), rollupDebtsByCustomer(openInvoices, "2024-03-11"));
  assert.deepEqual(buildCustomerOverview(periodInvoices, openInvoices), buildCustomerOverview(periodInvoices, openInvoices));
});
