import type {
  Company,
  CoordinateCoverage,
  Customer,
  CustomerDebtRow,
  CustomerOverviewRow,
  CustomerPointStatus,
  CustomerRevenueRow,
  DailyRevenueRow,
  DashboardFilters,
  DashboardFiltersQuery,
  MapOptions,
  MapPoint,
  MonthlyRevenueRow,
  OpenInvoiceRow,
  PurchaseInvoice,
  RevenueSummary,
  SalesInvoice,
  Supplier,
  SupplierFlowRow,
  SupplierPointStatus,
} from "@shared/schema";
import { addMonths, toIsoDate } from "@shared/utils";
import { defineExportTable, type ExportTable } from "./csv-export";
import {
  TOP_CUSTOMERS_BY_PERIOD_SALES,
  TOP_DEBTORS,
  buildCustomerOverview,
  buildDailySeries,
  buildMonthlySeries,
  buildOpenInvoiceRows,
  rankTopCustomers,
  rollupDebtsByCustomer,
  searchCustomers,
  summarizeRevenue,
  topN,
} from "./dashboard-aggregation";
import type { DashboardSession } from "./dashboard-session";
import {
  fetchOutstandingInvoices,
  fetchPurchaseInvoices,
  fetchSalesInvoices,
  listCompanies,
  listCustomers,
  listSuppliers,
  normalizeDateRange,
  type ResourceOptions,
} from "./erp-resources";
import { coordinateCoverage } from "./geo-coordinates";
import { buildCustomerPoints, buildSupplierPoints, mapCenter } from "./map-points";
import { logger as rootLogger, type StructuredLogger } from "./observability/logger";
import type { QueryKey } from "./query-cache";
import { DEFAULT_FLOW_WIDTH_PX, buildSupplierFlows } from "./supplier-flows";

const DEFAULT_RANGE_MONTHS = 3;

export interface DashboardServiceOptions {
  pageSize?: number;
  flowWidthPx?: number;
  now?: () => Date;
  logger?: StructuredLogger;
}

export interface InvoiceListRow {
  name: string;
  postingDate: string | null;
  company: string | null;
  customer: string | null;
  baseGrandTotal: number | null;
  currency: string | null;
}

export interface RevenueReport {
  filters: DashboardFilters;
  empty: boolean;
  summary: RevenueSummary;
  daily: DailyRevenueRow[];
  monthly: MonthlyRevenueRow[];
  topCustomers: CustomerRevenueRow[];
  invoices: InvoiceListRow[];
}

export interface DebtsReport {
  filters: DashboardFilters;
  asOf: string;
  empty: boolean;
  totalOutstanding: number;
  openInvoiceCount: number;
  rollup: CustomerDebtRow[];
  topDebtors: CustomerDebtRow[];
  openInvoices: OpenInvoiceRow[];
}

export interface CustomersReport {
  filters: DashboardFilters;
  empty: boolean;
  query: string | null;
  totals: {
    salesTtc: number;
    outstanding: number;
    rows: number;
  };
  rows: CustomerOverviewRow[];
  topCustomers: CustomerOverviewRow[];
}

export interface MapReport {
  filters: DashboardFilters;
  customers: MapPoint<CustomerPointStatus>[];
  suppliers: MapPoint<SupplierPointStatus>[];
  flows: SupplierFlowRow[];
  coverage: {
    customers: (CoordinateCoverage & { sold: number; noSale: number }) | null;
    suppliers: (CoordinateCoverage & { active: number }) | null;
    flows: number;
  };
  center: { latitude: number; longitude: number } | null;
}

export const revenueExports: Record<string, ExportTable<RevenueReport>> = {
  daily: defineExportTable("ttc_daily.csv", (report: RevenueReport) => report.daily, ["date", "company", "ttc"]),
  monthly: defineExportTable("ttc_monthly.csv", (report: RevenueReport) => report.monthly, ["month", "company", "ttc"]),
  topCustomers: defineExportTable("ttc_top_customers.csv", (report: RevenueReport) => report.topCustomers, [
    "customer",
    "ttc",
  ]),
  invoices: defineExportTable("ttc_invoices.csv", (report: RevenueReport) => report.invoices, [
    "name",
    "postingDate",
    "company",
    "customer",
    "baseGrandTotal",
    "currency",
  ]),
};

const debtColumns = ["company", "customer", "outstanding", "invoices", "maxOverdue"] as const;

export const debtsExports: Record<string, ExportTable<DebtsReport>> = {
  rollup: defineExportTable("debts_by_customer.csv", (report: DebtsReport) => report.rollup, debtColumns),
  topDebtors: defineExportTable("debts_top_customers.csv", (report: DebtsReport) => report.topDebtors, debtColumns),
  openInvoices: defineExportTable("debts_open_invoices.csv", (report: DebtsReport) => report.openInvoices, [
    "name",
    "postingDate",
    "dueDate",
    "company",
    "customer",
    "baseOutstanding",
    "currency",
    "status",
    "daysOverdue",
    "outstandingAmount",
    "conversionRate",
  ]),
};

const overviewColumns = ["company", "customer", "salesTtc", "invoices", "lastInvoice", "outstanding"] as const;

export const customersExports: Record<string, ExportTable<CustomersReport>> = {
  overview: defineExportTable("customers_overview.csv", (report: CustomersReport) => report.rows, overviewColumns),
  topCustomers: defineExportTable(
    "customers_top_sales.csv",
    (report: CustomersReport) => report.topCustomers,
    overviewColumns,
  ),
};

const pointColumns = ["name", "displayName", "status", "label", "phone", "latitude", "longitude"] as const;

export const mapExports: Record<string, ExportTable<MapReport>> = {
  customers: defineExportTable("map_customers.csv", (report: MapReport) => report.customers, pointColumns),
  suppliers: defineExportTable("map_suppliers.csv", (report: MapReport) => report.suppliers, pointColumns),
  flows: defineExportTable("map_supplier_flows.csv", (report: MapReport) => report.flows, [
    "supplier",
    "company",
    "amount",
    "supplierLatitude",
    "supplierLongitude",
    "companyLatitude",
    "companyLongitude",
    "widthPx",
  ]),
};

/**
 * The reporting pipeline: fetch (through the session cache), normalize,
 * aggregate. Every report is a function of its filters and the session state.
 */
export class DashboardService {
  private readonly pageSize: number | undefined;
  private readonly flowWidthPx: number;
  private readonly now: () => Date;
  private readonly logger: StructuredLogger;

  constructor(options: DashboardServiceOptions = {}) {
    this.pageSize = options.pageSize;
    this.flowWidthPx = options.flowWidthPx ?? DEFAULT_FLOW_WIDTH_PX;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({ event: "dashboard.report" });
  }

  today(): string {
    return toIsoDate(this.now());
  }

  private resourceOptions(session: DashboardSession): ResourceOptions {
    return { pageSize: this.pageSize, logger: this.logger.child({ userId: session.user }) };
  }

  private listKey(session: DashboardSession): QueryKey {
    return { companies: [], start: null, end: null, includeDrafts: false, identity: session.identity };
  }

  companies(session: DashboardSession): Promise<Company[]> {
    return session.caches.companies.getOrLoad(this.listKey(session), () =>
      listCompanies(session.erp, this.resourceOptions(session))
    );
  }

  async companyNames(session: DashboardSession): Promise<string[]> {
    const companies = await this.companies(session);
    return companies.map(company => company.name).filter(name => name.length > 0);
  }

  customers(session: DashboardSession): Promise<Customer[]> {
    return session.caches.customers.getOrLoad(this.listKey(session), () =>
      listCustomers(session.erp, this.resourceOptions(session))
    );
  }

  suppliers(session: DashboardSession): Promise<Supplier[]> {
    return session.caches.suppliers.getOrLoad(this.listKey(session), () =>
      listSuppliers(session.erp, this.resourceOptions(session))
    );
  }

  salesInvoices(session: DashboardSession, filters: DashboardFilters, includeDrafts: boolean): Promise<SalesInvoice[]> {
    const key: QueryKey = {
      companies: filters.companies,
      start: filters.start,
      end: filters.end,
      includeDrafts,
      identity: session.identity,
    };
    return session.caches.salesInvoices.getOrLoad(key, () =>
      fetchSalesInvoices(
        session.erp,
        { companies: filters.companies, start: filters.start, end: filters.end, includeDrafts },
        this.resourceOptions(session),
      )
    );
  }

  outstandingInvoices(session: DashboardSession, companies: readonly string[]): Promise<SalesInvoice[]> {
    const key: QueryKey = { companies, start: null, end: null, includeDrafts: false, identity: session.identity };
    return session.caches.outstandingInvoices.getOrLoad(key, () =>
      fetchOutstandingInvoices(session.erp, companies, this.resourceOptions(session))
    );
  }

  purchaseInvoices(session: DashboardSession, filters: DashboardFilters): Promise<PurchaseInvoice[]> {
    const key: QueryKey = {
      companies: filters.companies,
      start: filters.start,
      end: filters.end,
      includeDrafts: false,
      identity: session.identity,
    };
    return session.caches.purchaseInvoices.getOrLoad(key, () =>
      fetchPurchaseInvoices(
        session.erp,
        { companies: filters.companies, start: filters.start, end: filters.end, includeDrafts: false },
        this.resourceOptions(session),
      )
    );
  }

  /**
   * Fills in defaults (all companies, last three months), keeps only known
   * companies, orders the dates, then records the filters on the session.
   */
  async resolveFilters(session: DashboardSession, query: DashboardFiltersQuery): Promise<DashboardFilters> {
    const known = await this.companyNames(session);
    const requested = query.companies ?? [];
    const knownSet = new Set(known);
    const companies =
      requested.length === 0
        ? known
        : Array.from(new Set(requested)).filter(company => knownSet.has(company));

    const today = this.today();
    const range = normalizeDateRange(
      query.start ?? addMonths(query.end ?? today, -DEFAULT_RANGE_MONTHS),
      query.end ?? today,
    );

    const filters: DashboardFilters = {
      companies,
      start: range?.start ?? today,
      end: range?.end ?? today,
      includeDrafts: query.includeDrafts ?? false,
    };

    session.applyFilters(filters);
    return filters;
  }

  async revenueReport(session: DashboardSession, filters: DashboardFilters): Promise<RevenueReport> {
    const invoices = await this.salesInvoices(session, filters, filters.includeDrafts);
    const daily = buildDailySeries(invoices);

    return {
      filters,
      empty: invoices.length === 0,
      summary: summarizeRevenue(invoices, daily),
      daily,
      monthly: buildMonthlySeries(daily),
      topCustomers: rankTopCustomers(invoices),
      invoices: invoices.map(invoice => ({
        name: invoice.name,
        postingDate: invoice.postingDate,
        company: invoice.company,
        customer: invoice.customer,
        baseGrandTotal: invoice.baseGrandTotal,
        currency: invoice.currency,
      })),
    };
  }

  async debtsReport(session: DashboardSession, filters: DashboardFilters): Promise<DebtsReport> {
    const openInvoices = await this.outstandingInvoices(session, filters.companies);
    const asOf = this.today();
    const rollup = rollupDebtsByCustomer(openInvoices, asOf);

    return {
      filters,
      asOf,
      empty: openInvoices.length === 0,
      totalOutstanding: openInvoices.reduce((acc, invoice) => acc + invoice.baseOutstanding, 0),
      openInvoiceCount: openInvoices.length,
      rollup,
      topDebtors: topN(rollup, row => row.outstanding, TOP_DEBTORS),
      openInvoices: buildOpenInvoiceRows(openInvoices, asOf),
    };
  }

  async customersReport(
    session: DashboardSession,
    filters: DashboardFilters,
    search?: string,
  ): Promise<CustomersReport> {
    const periodInvoices = await this.salesInvoices(session, filters, false);
    const openInvoices = await this.outstandingInvoices(session, filters.companies);

    const overview = buildCustomerOverview(periodInvoices, openInvoices);
    const totals = {
      salesTtc: overview.reduce((acc, row) => acc + row.salesTtc, 0),
      outstanding: overview.reduce((acc, row) => acc + row.outstanding, 0),
      rows: overview.length,
    };
    const rows = searchCustomers(overview, search);

    return {
      filters,
      empty: periodInvoices.length === 0 && openInvoices.length === 0,
      query: search ? search : null,
      totals,
      rows,
      topCustomers: topN(rows, row => row.salesTtc, TOP_CUSTOMERS_BY_PERIOD_SALES),
    };
  }

  async mapReport(session: DashboardSession, filters: DashboardFilters, options: MapOptions): Promise<MapReport> {
    const report: MapReport = {
      filters,
      customers: [],
      suppliers: [],
      flows: [],
      coverage: { customers: null, suppliers: null, flows: 0 },
      center: null,
    };

    if (options.showCustomers) {
      const periodInvoices = await this.salesInvoices(session, filters, false);
      const buyers = new Set<string>();
      for (const invoice of periodInvoices) {
        if (invoice.customer !== null) {
          buyers.add(invoice.customer);
        }
      }

      const customers = await this.customers(session);
      report.customers = buildCustomerPoints(customers, buyers, { jitter: options.jitter });
      const sold = report.customers.filter(point => point.status === "sold").length;
      report.coverage.customers = {
        ...coordinateCoverage(customers),
        sold,
        noSale: report.customers.length - sold,
      };
    }

    if (options.showSuppliers) {
      const purchases = await this.purchaseInvoices(session, filters);
      const activeSuppliers = new Set<string>();
      for (const purchase of purchases) {
        if (purchase.supplier !== null) {
          activeSuppliers.add(purchase.supplier);
        }
      }

      const suppliers = await this.suppliers(session);
      report.suppliers = buildSupplierPoints(suppliers, activeSuppliers, {
        jitter: options.jitter,
        statusByPeriod: options.supplierStatusByPeriod,
      });
      report.coverage.suppliers = {
        ...coordinateCoverage(suppliers),
        active: report.suppliers.filter(point => point.status === "active").length,
      };

      if (options.showFlows) {
        const companies = await this.companies(session);
        report.flows = buildSupplierFlows(purchases, suppliers, companies, {
          baseWidthPx: options.flowWidthPx ?? this.flowWidthPx,
        });
        report.coverage.flows = report.flows.length;
      }
    }

    report.center = mapCenter([
      ...report.customers,
      ...report.suppliers,
      ...report.flows.map(flow => ({ latitude: flow.supplierLatitude, longitude: flow.supplierLongitude })),
      ...report.flows.map(flow => ({ latitude: flow.companyLatitude, longitude: flow.companyLongitude })),
    ]);

    this.logger.info("Map report built", {
      userId: session.user,
      context: {
        customers: report.customers.length,
        suppliers: report.suppliers.length,
        flows: report.flows.length,
      },
    });

    return report;
  }
}
