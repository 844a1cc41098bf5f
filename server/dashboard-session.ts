import type {
  Company,
  Customer,
  DashboardFilters,
  PurchaseInvoice,
  SalesInvoice,
  Supplier,
} from "@shared/schema";
import type { ErpGateway } from "./erp-client";
import { logger as rootLogger, type StructuredLogger } from "./observability/logger";
import { recordCacheEvent } from "./observability/metrics";
import { QueryCache } from "./query-cache";

export interface SessionCaches {
  salesInvoices: QueryCache<SalesInvoice[]>;
  outstandingInvoices: QueryCache<SalesInvoice[]>;
  purchaseInvoices: QueryCache<PurchaseInvoice[]>;
  customers: QueryCache<Customer[]>;
  suppliers: QueryCache<Supplier[]>;
  companies: QueryCache<Company[]>;
}

function filtersKey(filters: DashboardFilters): string {
  return JSON.stringify([filters.companies, filters.start, filters.end, filters.includeDrafts]);
}

/**
 * Everything one signed-in user's reports run against: the ERP connection,
 * the identity token and the query caches. Created at login, closed at logout.
 */
export class DashboardSession {
  readonly caches: SessionCaches = {
    salesInvoices: new QueryCache<SalesInvoice[]>("sales-invoices"),
    outstandingInvoices: new QueryCache<SalesInvoice[]>("outstanding-invoices"),
    purchaseInvoices: new QueryCache<PurchaseInvoice[]>("purchase-invoices"),
    customers: new QueryCache<Customer[]>("customers"),
    suppliers: new QueryCache<Supplier[]>("suppliers"),
    companies: new QueryCache<Company[]>("companies"),
  };

  private lastFilters: string | null = null;
  private readonly logger: StructuredLogger;

  constructor(
    readonly user: string,
    readonly erp: ErpGateway,
    logger: StructuredLogger = rootLogger,
  ) {
    this.logger = logger.child({ userId: user, event: "dashboard.session" });
  }

  get identity(): string {
    return this.user;
  }

  /**
   * Records the active filters. Any change from the previous set flushes the
   * whole cache. Returns true when a flush happened.
   */
  applyFilters(filters: DashboardFilters): boolean {
    const key = filtersKey(filters);
    if (this.lastFilters === key) {
      return false;
    }

    const changed = this.lastFilters !== null;
    this.lastFilters = key;
    if (changed) {
      this.clear();
      this.logger.info("Filters changed, query cache flushed", { context: { ...filters } });
    }
    return changed;
  }

  clear(): void {
    for (const cache of Object.values(this.caches)) {
      cache.clear();
    }
    recordCacheEvent("flush");
  }

  async close(): Promise<void> {
    this.clear();
    this.lastFilters = null;
    await this.erp.logout();
  }
}

/**
 * Dashboard sessions by HTTP session id.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, DashboardSession>();

  get(sessionId: string): DashboardSession | undefined {
    return this.sessions.get(sessionId);
  }

  set(sessionId: string, session: DashboardSession): void {
    const previous = this.sessions.get(sessionId);
    if (previous && previous !== session) {
      previous.clear();
    }
    this.sessions.set(sessionId, session);
  }

  /**
   * Removes the session and hands it back, so the caller can log it out.
   */
  take(sessionId: string): DashboardSession | undefined {
    const session = this.sessions.get(sessionId);
    this.sessions.delete(sessionId);
    return session;
  }

  /**
   * Forgets the session without telling the ERP, for sessions it already rejected.
   */
  discard(sessionId: string): void {
    this.sessions.get(sessionId)?.clear();
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
