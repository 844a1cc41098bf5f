import test from "node:test";
import assert from "node:assert/strict";
import type { Company, PurchaseInvoice, Supplier } from "@shared/schema";
import { buildSupplierFlows, flowWidth } from "../server/supplier-flows";

function purchase(supplier: string | null, company: string | null, amount: number | null): PurchaseInvoice {
  return {
    name: `PINV-${supplier}-${company}-${amount}`,
    postingDate: "2024-02-05",
    company,
    supplier,
    grandTotal: amount,
    baseGrandTotal: amount,
    currency: "EUR",
    status: "Paid",
    docstatus: "submitted",
  };
}

function supplier(name: string, latitude: number | null, longitude: number | null): Supplier {
  return { name, displayName: name, phone: null, supplierGroup: null, latitude, longitude };
}

const suppliers = [supplier("S1", 45, 5), supplier("S2", 0, 0), supplier("S3", 46, 6)];
const companies: Company[] = [
  { name: "Acme", latitude: 43.6, longitude: 1.44 },
  { name: "Beta", latitude: null, longitude: null },
];

test("flowWidth scales between the base width and twice the base", () => {
  assert.equal(flowWidth(1000, 1000, 4), 8);
  assert.equal(flowWidth(750, 1000, 4), 6);
  assert.equal(flowWidth(100, 1000, 4), 4);
  assert.equal(flowWidth(0, 0, 4), 4);
  assert.equal(flowWidth(5, -1, 3), 3);
});

test("buildSupplierFlows sums purchases per pair and drops unplottable endpoints", () => {
  const flows = buildSupplierFlows(
    [
      purchase("S1", "Acme", 1000),
      purchase("S2", "Acme", 900),
      purchase("S1", "Acme", 500),
      purchase("S3", "Acme", 300),
      purchase("S1", "Beta", 100),
      purchase(null, "Acme", 50),
    ],
    suppliers,
    companies,
  );

  assert.deepEqual(flows, [
    {
      supplier: "S1",
      company: "Acme",
      amount: 1500,
      supplierLatitude: 45,
      supplierLongitude: 5,
      companyLatitude: 43.6,
      companyLongitude: 1.44,
      widthPx: 8,
      label: "Supplier → Company: S1 → Acme (amount 1,500.00)",
    },
    {
      supplier: "S3",
      company: "Acme",
      amount: 300,
      supplierLatitude: 46,
      supplierLongitude: 6,
      companyLatitude: 43.6,
      companyLongitude: 1.44,
      widthPx: 4,
      label: "Supplier → Company: S3 → Acme (amount 300.00)",
    },
  ]);
});

test("buildSupplierFlows keeps pairs without amounts at the base width", () => {
  const flows = buildSupplierFlows([purchase("S3", "Acme", null)], suppliers, companies, { baseWidthPx: 2 });

  assert.equal(flows.length, 1);
  assert.equal(flows[0].amount, 0);
  assert.equal(flows[0].widthPx, 2);
  assert.equal(flows[0].label, "Supplier → Company: S3 → Acme (amount 0.00)");
});

test("buildSupplierFlows returns nothing without purchases", () => {
  assert.deepEqual(buildSupplierFlows([], suppliers, companies), []);
});
