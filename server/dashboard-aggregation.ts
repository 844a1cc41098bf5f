import type {
  CustomerDebtRow,
  CustomerOverviewRow,
  CustomerRevenueRow,
  DailyRevenueRow,
  MonthlyRevenueRow,
  OpenInvoiceRow,
  RevenueSummary,
  SalesInvoice,
} from "@shared/schema";
import { daysBetween, fromDayNumber, getMonthKey, toDayNumber } from "@shared/utils";

export const TOP_CUSTOMERS_BY_REVENUE = 10;
export const TOP_DEBTORS = 15;
export const TOP_CUSTOMERS_BY_PERIOD_SALES = 20;

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareNullableText(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return compareText(a, b);
}

function pairKey(company: string, counterparty: string): string {
  return JSON.stringify([company, counterparty]);
}

/**
 * Descending by `measure`, truncated to `n`. Ties keep input order.
 */
export function topN<T>(rows: readonly T[], measure: (row: T) => number, n: number): T[] {
  return rows
    .map((row, index) => ({ row, index, value: measure(row) }))
    .sort((a, b) => b.value - a.value || a.index - b.index)
    .slice(0, Math.max(0, n))
    .map(entry => entry.row);
}

/**
 * Per company, one row per calendar day between its first and last posting date.
 * Idle days inside that span are 0; a company contributes nothing outside it.
 * Companies appear in first-seen order.
 */
export function buildDailySeries(invoices: readonly SalesInvoice[]): DailyRevenueRow[] {
  const byCompany = new Map<string, Map<number, number>>();

  for (const invoice of invoices) {
    if (invoice.company === null || invoice.postingDate === null) {
      continue;
    }
    let days = byCompany.get(invoice.company);
    if (!days) {
      days = new Map<number, number>();
      byCompany.set(invoice.company, days);
    }
    const day = toDayNumber(invoice.postingDate);
    days.set(day, (days.get(day) ?? 0) + invoice.ttc);
  }

  const rows: DailyRevenueRow[] = [];
  byCompany.forEach((days, company) => {
    const dayNumbers = Array.from(days.keys());
    const first = Math.min(...dayNumbers);
    const last = Math.max(...dayNumbers);
    for (let day = first; day <= last; day += 1) {
      rows.push({ date: fromDayNumber(day), company, ttc: days.get(day) ?? 0 });
    }
  });

  return rows;
}

export function buildMonthlySeries(daily: readonly DailyRevenueRow[]): MonthlyRevenueRow[] {
  const byCompany = new Map<string, Map<string, number>>();

  for (const row of daily) {
    let months = byCompany.get(row.company);
    if (!months) {
      months = new Map<string, number>();
      byCompany.set(row.company, months);
    }
    const month = getMonthKey(row.date);
    months.set(month, (months.get(month) ?? 0) + row.ttc);
  }

  const rows: MonthlyRevenueRow[] = [];
  byCompany.forEach((months, company) => {
    const sortedMonths = Array.from(months.keys()).sort(compareText);
    for (const month of sortedMonths) {
      rows.push({ month, company, ttc: months.get(month) ?? 0 });
    }
  });

  return rows;
}

export function summarizeRevenue(
  invoices: readonly SalesInvoice[],
  daily: readonly DailyRevenueRow[],
): RevenueSummary {
  const totalTtc = invoices.reduce((acc, invoice) => acc + invoice.ttc, 0);
  const invoiceCount = invoices.length;

  return {
    totalTtc,
    invoiceCount,
    averageInvoice: invoiceCount > 0 ? totalTtc / invoiceCount : 0,
    dayCount: new Set(daily.map(row => row.date)).size,
  };
}

export function rankTopCustomers(
  invoices: readonly SalesInvoice[],
  n = TOP_CUSTOMERS_BY_REVENUE,
): CustomerRevenueRow[] {
  const totals = new Map<string, number>();
  for (const invoice of invoices) {
    if (invoice.customer === null) {
      continue;
    }
    totals.set(invoice.customer, (totals.get(invoice.customer) ?? 0) + invoice.ttc);
  }

  const rows = Array.from(totals.entries()).map(([customer, ttc]) => ({ customer, ttc }));
  return topN(rows, row => row.ttc, n);
}

/**
 * Whole days past the due date; negative while not yet due.
 * A missing due date counts as 0 days.
 */
export function computeDaysOverdue(dueDate: string | null, today: string): number {
  if (dueDate === null) {
    return 0;
  }
  return daysBetween(dueDate, today);
}

export function rollupDebtsByCustomer(openInvoices: readonly SalesInvoice[], today: string): CustomerDebtRow[] {
  const rollup = new Map<string, CustomerDebtRow>();

  for (const invoice of openInvoices) {
    if (invoice.company === null || invoice.customer === null) {
      continue;
    }
    const key = pairKey(invoice.company, invoice.customer);
    const overdue = computeDaysOverdue(invoice.dueDate, today);
    const current = rollup.get(key);
    if (current) {
      current.outstanding += invoice.baseOutstanding;
      current.invoices += 1;
      current.maxOverdue = Math.max(current.maxOverdue, overdue);
    } else {
      rollup.set(key, {
        company: invoice.company,
        customer: invoice.customer,
        outstanding: invoice.baseOutstanding,
        invoices: 1,
        maxOverdue: overdue,
      });
    }
  }

  const rows = Array.from(rollup.values());
  return topN(rows, row => row.outstanding, rows.length);
}

export function buildOpenInvoiceRows(openInvoices: readonly SalesInvoice[], today: string): OpenInvoiceRow[] {
  return openInvoices
    .map(invoice => ({
      name: invoice.name,
      postingDate: invoice.postingDate,
      dueDate: invoice.dueDate,
      company: invoice.company,
      customer: invoice.customer,
      baseOutstanding: invoice.baseOutstanding,
      currency: invoice.currency,
      status: invoice.status,
      daysOverdue: computeDaysOverdue(invoice.dueDate, today),
      outstandingAmount: invoice.outstandingAmount,
      conversionRate: invoice.conversionRate,
    }))
    .sort(
      (a, b) =>
        compareNullableText(a.company, b.company) ||
        compareNullableText(a.customer, b.customer) ||
        compareNullableText(a.dueDate, b.dueDate)
    );
}

/**
 * Outer join of period sales and current outstanding per (company, customer).
 */
export function buildCustomerOverview(
  periodInvoices: readonly SalesInvoice[],
  openInvoices: readonly SalesInvoice[],
): CustomerOverviewRow[] {
  const rows = new Map<string, CustomerOverviewRow>();

  const rowFor = (company: string, customer: string): CustomerOverviewRow => {
    const key = pairKey(company, customer);
    let row = rows.get(key);
    if (!row) {
      row = { company, customer, salesTtc: 0, invoices: 0, lastInvoice: null, outstanding: 0 };
      rows.set(key, row);
    }
    return row;
  };

  for (const invoice of periodInvoices) {
    if (invoice.company === null || invoice.customer === null) {
      continue;
    }
    const row = rowFor(invoice.company, invoice.customer);
    row.salesTtc += invoice.ttc;
    row.invoices += 1;
    if (invoice.postingDate !== null && (row.lastInvoice === null || invoice.postingDate > row.lastInvoice)) {
      row.lastInvoice = invoice.postingDate;
    }
  }

  for (const invoice of openInvoices) {
    if (invoice.company === null || invoice.customer === null) {
      continue;
    }
    rowFor(invoice.company, invoice.customer).outstanding += invoice.baseOutstanding;
  }

  return Array.from(rows.values()).sort(
    (a, b) => compareText(a.company, b.company) || b.salesTtc - a.salesTtc
  );
}

export function searchCustomers<T extends { customer: string }>(rows: readonly T[], query?: string): T[] {
  if (!query) {
    return [...rows];
  }
  const needle = query.toLowerCase();
  return rows.filter(row => row.customer.toLowerCase().includes(needle));
}
