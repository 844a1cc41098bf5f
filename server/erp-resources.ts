import type {
  Company,
  Customer,
  ErpFilter,
  PurchaseInvoice,
  RawRow,
  SalesInvoice,
  Supplier,
} from "@shared/schema";
import type { ErpFetcher } from "./erp-client";
import { fetchAllPages, type ListingRequest } from "./erp-pagination";
import {
  normalizeCompany,
  normalizeCustomer,
  normalizePurchaseInvoice,
  normalizeSalesInvoice,
  normalizeSupplier,
} from "./erp-normalizers";
import type { StructuredLogger } from "./observability/logger";

export const SALES_INVOICE_FIELDS = [
  "name",
  "posting_date",
  "company",
  "customer",
  "due_date",
  "base_grand_total",
  "grand_total",
  "currency",
  "outstanding_amount",
  "status",
  "conversion_rate",
  "docstatus",
] as const;

export const PURCHASE_INVOICE_FIELDS = [
  "name",
  "posting_date",
  "company",
  "supplier",
  "base_grand_total",
  "grand_total",
  "currency",
  "status",
  "docstatus",
] as const;

export const CUSTOMER_FIELDS = ["name", "customer_name", "mobile_no", "territory", "custom_lat", "custom_lon"] as const;
export const SUPPLIER_FIELDS = ["name", "supplier_name", "supplier_group", "mobile_no", "custom_lat", "custom_lon"] as const;
export const COMPANY_FIELDS = ["name", "custom_lat", "custom_lon"] as const;

const INVOICE_ORDER = "posting_date asc, name asc";
const NAME_ORDER = "name asc";

export type ResourceOptions = {
  pageSize?: number;
  logger?: StructuredLogger;
};

export interface InvoiceQuery {
  companies: readonly string[];
  start?: string | null;
  end?: string | null;
  includeDrafts: boolean;
  extraFilters?: readonly ErpFilter[];
}

export function resourcePath(doctype: string): string {
  return `/api/resource/${encodeURIComponent(doctype)}`;
}

/**
 * Inclusive date range; reversed bounds are swapped. Null unless both are set.
 */
export function normalizeDateRange(
  start?: string | null,
  end?: string | null,
): { start: string; end: string } | null {
  if (!start || !end) {
    return null;
  }
  return start > end ? { start: end, end: start } : { start, end };
}

export function buildInvoiceFilters(company: string, query: InvoiceQuery): ErpFilter[] {
  const filters: ErpFilter[] = [["company", "=", company]];

  const range = normalizeDateRange(query.start, query.end);
  if (range) {
    filters.push(["posting_date", ">=", range.start], ["posting_date", "<=", range.end]);
  }

  filters.push(query.includeDrafts ? ["docstatus", "in", [0, 1]] : ["docstatus", "=", 1]);

  if (query.extraFilters) {
    filters.push(...query.extraFilters);
  }

  return filters;
}

async function fetchInvoiceRows(
  fetcher: ErpFetcher,
  doctype: string,
  fields: readonly string[],
  query: InvoiceQuery,
  options: ResourceOptions,
): Promise<RawRow[]> {
  const companies = Array.from(new Set(query.companies));
  if (companies.length === 0) {
    return [];
  }

  const rows: RawRow[] = [];
  // One company at a time, pages in order: results concatenate company-then-page
  for (const company of companies) {
    const request: ListingRequest = {
      resource: resourcePath(doctype),
      fields,
      filters: buildInvoiceFilters(company, query),
      orderBy: INVOICE_ORDER,
      pageSize: options.pageSize,
    };
    const page = await fetchAllPages(fetcher, request, {
      logger: options.logger?.child({ company }),
    });
    for (const row of page) {
      rows.push(row);
    }
  }
  return rows;
}

export async function fetchSalesInvoices(
  fetcher: ErpFetcher,
  query: InvoiceQuery,
  options: ResourceOptions = {},
): Promise<SalesInvoice[]> {
  const rows = await fetchInvoiceRows(fetcher, "Sales Invoice", SALES_INVOICE_FIELDS, query, options);
  return rows.map(normalizeSalesInvoice);
}

/**
 * Submitted invoices with something left to pay, regardless of posting date.
 */
export function fetchOutstandingInvoices(
  fetcher: ErpFetcher,
  companies: readonly string[],
  options: ResourceOptions = {},
): Promise<SalesInvoice[]> {
  return fetchSalesInvoices(
    fetcher,
    {
      companies,
      start: null,
      end: null,
      includeDrafts: false,
      extraFilters: [["outstanding_amount", ">", 0]],
    },
    options,
  );
}

export async function fetchPurchaseInvoices(
  fetcher: ErpFetcher,
  query: InvoiceQuery,
  options: ResourceOptions = {},
): Promise<PurchaseInvoice[]> {
  const rows = await fetchInvoiceRows(fetcher, "Purchase Invoice", PURCHASE_INVOICE_FIELDS, query, options);
  return rows.map(normalizePurchaseInvoice);
}

function listAll(
  fetcher: ErpFetcher,
  doctype: string,
  fields: readonly string[],
  options: ResourceOptions,
): Promise<RawRow[]> {
  return fetchAllPages(
    fetcher,
    { resource: resourcePath(doctype), fields, orderBy: NAME_ORDER, pageSize: options.pageSize },
    { logger: options.logger },
  );
}

export async function listCompanies(fetcher: ErpFetcher, options: ResourceOptions = {}): Promise<Company[]> {
  const rows = await listAll(fetcher, "Company", COMPANY_FIELDS, options);
  return rows.map(normalizeCompany);
}

export async function listCustomers(fetcher: ErpFetcher, options: ResourceOptions = {}): Promise<Customer[]> {
  const rows = await listAll(fetcher, "Customer", CUSTOMER_FIELDS, options);
  return rows.map(normalizeCustomer);
}

export async function listSuppliers(fetcher: ErpFetcher, options: ResourceOptions = {}): Promise<Supplier[]> {
  const rows = await listAll(fetcher, "Supplier", SUPPLIER_FIELDS, options);
  return rows.map(normalizeSupplier);
}
