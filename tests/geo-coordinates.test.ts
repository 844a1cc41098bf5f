import test from "node:test";
import assert from "node:assert/strict";
import type { Customer } from "@shared/schema";
import {
  coordinateCoverage,
  isValidCoordinate,
  jitterOffset,
  withValidCoordinates,
} from "../server/geo-coordinates";
import { buildCustomerPoints, buildSupplierPoints, mapCenter } from "../server/map-points";

function customer(name: string, latitude: number | null, longitude: number | null): Customer {
  return { name, displayName: `${name} Ltd`, phone: null, territory: null, latitude, longitude };
}

test("isValidCoordinate treats (0, 0) and missing values as absent", () => {
  assert.equal(isValidCoordinate(0, 0), false);
  assert.equal(isValidCoordinate(null, 2.35), false);
  assert.equal(isValidCoordinate(48.85, undefined), false);
  assert.equal(isValidCoordinate(Number.NaN, 1), false);
  assert.equal(isValidCoordinate(0, 5), true);
  assert.equal(isValidCoordinate(48.85, 2.35), true);
});

test("withValidCoordinates and coordinateCoverage agree", () => {
  const customers = [customer("A", 48.85, 2.35), customer("B", 0, 0), customer("C", null, null), customer("D", -33.9, 18.4)];

  assert.deepEqual(withValidCoordinates(customers).map(item => item.name), ["A", "D"]);
  assert.deepEqual(coordinateCoverage(customers), { total: 4, withCoordinates: 2 });
});

test("jitterOffset is stable and stays within a few metres", () => {
  for (const seed of ["CUST-0001", "SCUST-0001", "x", ""]) {
    const offset = jitterOffset(seed);
    assert.equal(jitterOffset(seed), offset);
    assert.ok(Math.abs(offset) <= 0.000025, `offset for "${seed}" out of range: ${offset}`);
  }
});

test("buildCustomerPoints flags buyers and keeps exact positions without jitter", () => {
  const points = buildCustomerPoints(
    [customer("A", 48.85, 2.35), customer("B", 0, 0), customer("C", 45.76, 4.83)],
    new Set(["C"]),
    { jitter: false },
  );

  assert.deepEqual(points, [
    { name: "A", displayName: "A Ltd", status: "no-sale", label: "Customer: A Ltd", phone: "", latitude: 48.85, longitude: 2.35 },
    { name: "C", displayName: "C Ltd", status: "sold", label: "Customer: C Ltd", phone: "", latitude: 45.76, longitude: 4.83 },
  ]);
});

test("buildCustomerPoints applies the seeded offset when jitter is on", () => {
  const [point] = buildCustomerPoints([customer("A", 48.85, 2.35)], new Set(), { jitter: true });

  assert.equal(point.latitude, 48.85 + jitterOffset("A"));
  assert.equal(point.longitude, 2.35 + jitterOffset("Ax"));
});

test("buildSupplierPoints uses period activity only when asked", () => {
  const suppliers = [
    { name: "S1", displayName: "Steel", phone: "0102", supplierGroup: null, latitude: 45, longitude: 5 },
    { name: "S2", displayName: "Wood", phone: null, supplierGroup: null, latitude: 46, longitude: 6 },
  ];

  const byPeriod = buildSupplierPoints(suppliers, new Set(["S2"]), { jitter: false, statusByPeriod: true });
  const plain = buildSupplierPoints(suppliers, new Set(["S2"]), { jitter: false, statusByPeriod: false });

  assert.deepEqual(byPeriod.map(point => point.status), ["inactive", "active"]);
  assert.deepEqual(plain.map(point => point.status), ["supplier", "supplier"]);
  assert.equal(byPeriod[0].label, "Supplier: Steel");
  assert.equal(byPeriod[0].phone, "0102");
});

test("mapCenter averages positions", () => {
  assert.equal(mapCenter([]), null);
  assert.deepEqual(
    mapCenter([
      { latitude: 40, longitude: 2 },
      { latitude: 50, longitude: 4 },
    ]),
    { latitude: 45, longitude: 3 },
  );
});
