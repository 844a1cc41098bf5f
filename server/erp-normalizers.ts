import type {
  Company,
  Customer,
  DocStatus,
  PurchaseInvoice,
  RawRow,
  SalesInvoice,
  Supplier,
} from "@shared/schema";
import { parseIsoDate } from "@shared/utils";

const DOCSTATUS_BY_CODE: Record<number, DocStatus> = {
  0: "draft",
  1: "submitted",
  2: "cancelled",
};

/**
 * Permissive numeric parse. Missing or unparseable input is `null` (absent), never 0.
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function parseText(value: unknown): string | null {
  if (typeof value === "string") {
    return value.length > 0 ? value : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Blank and absent display names both fall back to the identifier.
 */
export function resolveDisplayName(preferred: unknown, identifier: string): string {
  if (typeof preferred === "string" && preferred.trim().length > 0) {
    return preferred;
  }
  return identifier;
}

export function parseDocStatus(value: unknown): DocStatus | null {
  const code = parseNumeric(value);
  if (code === null) {
    return null;
  }
  return DOCSTATUS_BY_CODE[code] ?? null;
}

export function normalizeSalesInvoice(row: RawRow): SalesInvoice {
  const baseGrandTotal = parseNumeric(row.base_grand_total);
  const outstandingAmount = parseNumeric(row.outstanding_amount) ?? 0;
  const conversionRate = parseNumeric(row.conversion_rate) ?? 1;

  return {
    name: parseText(row.name) ?? "",
    postingDate: parseIsoDate(row.posting_date),
    dueDate: parseIsoDate(row.due_date),
    company: parseText(row.company),
    customer: parseText(row.customer),
    grandTotal: parseNumeric(row.grand_total),
    baseGrandTotal,
    ttc: baseGrandTotal ?? 0,
    currency: parseText(row.currency),
    outstandingAmount,
    conversionRate,
    baseOutstanding: outstandingAmount * conversionRate,
    status: parseText(row.status),
    docstatus: parseDocStatus(row.docstatus),
  };
}

export function normalizePurchaseInvoice(row: RawRow): PurchaseInvoice {
  return {
    name: parseText(row.name) ?? "",
    postingDate: parseIsoDate(row.posting_date),
    company: parseText(row.company),
    supplier: parseText(row.supplier),
    grandTotal: parseNumeric(row.grand_total),
    baseGrandTotal: parseNumeric(row.base_grand_total),
    currency: parseText(row.currency),
    status: parseText(row.status),
    docstatus: parseDocStatus(row.docstatus),
  };
}

export function normalizeCustomer(row: RawRow): Customer {
  const name = parseText(row.name) ?? "";
  return {
    name,
    displayName: resolveDisplayName(row.customer_name, name),
    phone: parseText(row.mobile_no),
    territory: parseText(row.territory),
    latitude: parseNumeric(row.custom_lat),
    longitude: parseNumeric(row.custom_lon),
  };
}

export function normalizeSupplier(row: RawRow): Supplier {
  const name = parseText(row.name) ?? "";
  return {
    name,
    displayName: resolveDisplayName(row.supplier_name, name),
    phone: parseText(row.mobile_no),
    supplierGroup: parseText(row.supplier_group),
    latitude: parseNumeric(row.custom_lat),
    longitude: parseNumeric(row.custom_lon),
  };
}

export function normalizeCompany(row: RawRow): Company {
  return {
    name: parseText(row.name) ?? "",
    latitude: parseNumeric(row.custom_lat),
    longitude: parseNumeric(row.custom_lon),
  };
}
