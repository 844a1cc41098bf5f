import type {
  Customer,
  CustomerPointStatus,
  MapPoint,
  Supplier,
  SupplierPointStatus,
} from "@shared/schema";
import { jitterOffset, withValidCoordinates } from "./geo-coordinates";

type PointOptions = {
  jitter: boolean;
};

type SupplierPointOptions = PointOptions & {
  statusByPeriod: boolean;
};

function offsetPosition(seed: string, latitude: number, longitude: number, jitter: boolean) {
  if (!jitter) {
    return { latitude, longitude };
  }
  return {
    latitude: latitude + jitterOffset(seed),
    longitude: longitude + jitterOffset(`${seed}x`),
  };
}

/**
 * Plottable customers; "sold" when they bought during the period.
 */
export function buildCustomerPoints(
  customers: readonly Customer[],
  buyers: ReadonlySet<string>,
  options: PointOptions,
): MapPoint<CustomerPointStatus>[] {
  return withValidCoordinates(customers).map((customer): MapPoint<CustomerPointStatus> => ({
    name: customer.name,
    displayName: customer.displayName,
    status: buyers.has(customer.name) ? "sold" : "no-sale",
    label: `Customer: ${customer.displayName}`,
    phone: customer.phone ?? "",
    ...offsetPosition(customer.name, customer.latitude, customer.longitude, options.jitter),
  }));
}

export function buildSupplierPoints(
  suppliers: readonly Supplier[],
  activeSuppliers: ReadonlySet<string>,
  options: SupplierPointOptions,
): MapPoint<SupplierPointStatus>[] {
  return withValidCoordinates(suppliers).map((supplier): MapPoint<SupplierPointStatus> => {
    let status: SupplierPointStatus = "supplier";
    if (options.statusByPeriod) {
      status = activeSuppliers.has(supplier.name) ? "active" : "inactive";
    }
    return {
      name: supplier.name,
      displayName: supplier.displayName,
      status,
      label: `Supplier: ${supplier.displayName}`,
      phone: supplier.phone ?? "",
      ...offsetPosition(`S${supplier.name}`, supplier.latitude, supplier.longitude, options.jitter),
    };
  });
}

export function mapCenter(
  positions: readonly { latitude: number; longitude: number }[],
): { latitude: number; longitude: number } | null {
  if (positions.length === 0) {
    return null;
  }
  let latitude = 0;
  let longitude = 0;
  for (const position of positions) {
    latitude += position.latitude;
    longitude += position.longitude;
  }
  return { latitude: latitude / positions.length, longitude: longitude / positions.length };
}
