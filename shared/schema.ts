import { z } from "zod";
import { parseIsoDate } from "./utils";

// ===== Raw ERP rows =====

// Anything the listing endpoints hand back: field-keyed, loosely typed.
export const rawRowSchema = z.record(z.string(), z.unknown());
export const rawRowListSchema = z.array(rawRowSchema);
export type RawRow = z.infer<typeof rawRowSchema>;

export const filterOperators = ["=", "!=", ">", ">=", "<", "<=", "in", "not in", "like"] as const;
export type FilterOperator = typeof filterOperators[number];

export type FilterValue = string | number | boolean | (string | number)[];
export type ErpFilter = [field: string, operator: FilterOperator, value: FilterValue];

export type QueryParamValue = string | number;
export type QueryParams = Record<string, QueryParamValue>;

// ===== Normalized records =====

export const docStatuses = ["draft", "submitted", "cancelled"] as const;
export type DocStatus = typeof docStatuses[number];

export interface SalesInvoice {
  name: string;
  postingDate: string | null;
  dueDate: string | null;
  company: string | null;
  customer: string | null;
  grandTotal: number | null;
  baseGrandTotal: number | null;
  ttc: number;
  currency: string | null;
  outstandingAmount: number;
  conversionRate: number;
  baseOutstanding: number;
  status: string | null;
  docstatus: DocStatus | null;
}

export interface PurchaseInvoice {
  name: string;
  postingDate: string | null;
  company: string | null;
  supplier: string | null;
  grandTotal: number | null;
  baseGrandTotal: number | null;
  currency: string | null;
  status: string | null;
  docstatus: DocStatus | null;
}

export interface GeoLocated {
  latitude: number | null;
  longitude: number | null;
}

export interface Customer extends GeoLocated {
  name: string;
  displayName: string;
  phone: string | null;
  territory: string | null;
}

export interface Supplier extends GeoLocated {
  name: string;
  displayName: string;
  phone: string | null;
  supplierGroup: string | null;
}

export interface Company extends GeoLocated {
  name: string;
}

export type WithCoordinates<T extends GeoLocated> = T & {
  latitude: number;
  longitude: number;
};

// ===== Query parameters =====

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date")
  .refine(value => parseIsoDate(value) !== null, "Not a calendar date");

const booleanFlagSchema = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform(value => value === true || value === "true" || value === "1");

const companyListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(value =>
    (Array.isArray(value) ? value : [value])
      .flatMap(entry => entry.split(","))
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0)
  );

export const dashboardFiltersQuerySchema = z.object({
  companies: companyListSchema.optional(),
  start: isoDateSchema.optional(),
  end: isoDateSchema.optional(),
  includeDrafts: booleanFlagSchema.optional(),
});

export type DashboardFiltersQuery = z.infer<typeof dashboardFiltersQuerySchema>;

export interface DashboardFilters {
  companies: string[];
  start: string;
  end: string;
  includeDrafts: boolean;
}

export const mapOptionsQuerySchema = z.object({
  showCustomers: booleanFlagSchema.default(true),
  showSuppliers: booleanFlagSchema.default(false),
  supplierStatusByPeriod: booleanFlagSchema.default(true),
  showFlows: booleanFlagSchema.default(false),
  jitter: booleanFlagSchema.default(true),
  flowWidthPx: z.coerce.number().int().min(1).max(10).optional(),
});

export type MapOptions = z.infer<typeof mapOptionsQuerySchema>;

export const exportQuerySchema = z.object({
  format: z.enum(["json", "csv"]).default("json"),
  table: z.string().min(1).optional(),
  q: z.string().optional(),
});

export const loginRequestSchema = z.object({
  username: z.string().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
});

export type LoginRequest = z.infer<typeof loginRequestSchema>;

// ===== Aggregate rows =====

export interface DailyRevenueRow {
  date: string;
  company: string;
  ttc: number;
}

export interface MonthlyRevenueRow {
  month: string;
  company: string;
  ttc: number;
}

export interface CustomerRevenueRow {
  customer: string;
  ttc: number;
}

export interface RevenueSummary {
  totalTtc: number;
  invoiceCount: number;
  averageInvoice: number;
  dayCount: number;
}

export interface CustomerDebtRow {
  company: string;
  customer: string;
  outstanding: number;
  invoices: number;
  maxOverdue: number;
}

export interface OpenInvoiceRow {
  name: string;
  postingDate: string | null;
  dueDate: string | null;
  company: string | null;
  customer: string | null;
  baseOutstanding: number;
  currency: string | null;
  status: string | null;
  daysOverdue: number;
  outstandingAmount: number;
  conversionRate: number;
}

export interface CustomerOverviewRow {
  company: string;
  customer: string;
  salesTtc: number;
  invoices: number;
  lastInvoice: string | null;
  outstanding: number;
}

export interface SupplierFlowRow {
  supplier: string;
  company: string;
  amount: number;
  supplierLatitude: number;
  supplierLongitude: number;
  companyLatitude: number;
  companyLongitude: number;
  widthPx: number;
  label: string;
}

export type CustomerPointStatus = "sold" | "no-sale";
export type SupplierPointStatus = "active" | "inactive" | "supplier";

export interface MapPoint<TStatus extends string> {
  name: string;
  displayName: string;
  status: TStatus;
  label: string;
  phone: string;
  latitude: number;
  longitude: number;
}

export interface CoordinateCoverage {
  total: number;
  withCoordinates: number;
}
