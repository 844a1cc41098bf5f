import type { Company, PurchaseInvoice, Supplier, SupplierFlowRow } from "@shared/schema";
import { withValidCoordinates } from "./geo-coordinates";

export const DEFAULT_FLOW_WIDTH_PX = 4;

type FlowOptions = {
  baseWidthPx?: number;
};

const amountFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Width between `base` and `2 × base`, proportional to amount / max.
 */
export function flowWidth(amount: number, maxAmount: number, baseWidthPx: number): number {
  if (!(maxAmount > 0)) {
    return baseWidthPx;
  }
  const scaled = (amount / maxAmount) * baseWidthPx * 2;
  return Math.min(Math.max(scaled, baseWidthPx), baseWidthPx * 2);
}

/**
 * Supplier → company purchase volume for the period. A pair is dropped when
 * either endpoint lacks valid coordinates.
 */
export function buildSupplierFlows(
  purchases: readonly PurchaseInvoice[],
  suppliers: readonly Supplier[],
  companies: readonly Company[],
  options: FlowOptions = {},
): SupplierFlowRow[] {
  const baseWidthPx = options.baseWidthPx ?? DEFAULT_FLOW_WIDTH_PX;

  const totals = new Map<string, { supplier: string; company: string; amount: number }>();
  for (const purchase of purchases) {
    if (purchase.supplier === null || purchase.company === null) {
      continue;
    }
    const key = JSON.stringify([purchase.supplier, purchase.company]);
    const current = totals.get(key);
    if (current) {
      current.amount += purchase.baseGrandTotal ?? 0;
    } else {
      totals.set(key, {
        supplier: purchase.supplier,
        company: purchase.company,
        amount: purchase.baseGrandTotal ?? 0,
      });
    }
  }

  const supplierCoords = new Map(withValidCoordinates(suppliers).map(supplier => [supplier.name, supplier] as const));
  const companyCoords = new Map(withValidCoordinates(companies).map(company => [company.name, company] as const));

  const joined: Omit<SupplierFlowRow, "widthPx" | "label">[] = [];
  for (const pair of Array.from(totals.values())) {
    const supplier = supplierCoords.get(pair.supplier);
    const company = companyCoords.get(pair.company);
    if (!supplier || !company) {
      continue;
    }
    joined.push({
      ...pair,
      supplierLatitude: supplier.latitude,
      supplierLongitude: supplier.longitude,
      companyLatitude: company.latitude,
      companyLongitude: company.longitude,
    });
  }

  const maxAmount = joined.reduce((max, row) => Math.max(max, row.amount), 0);

  return joined.map(row => ({
    ...row,
    widthPx: flowWidth(row.amount, maxAmount, baseWidthPx),
    label: `Supplier → Company: ${row.supplier} → ${row.company} (amount ${amountFormatter.format(row.amount)})`,
  }));
}
