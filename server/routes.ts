import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import {
  dashboardFiltersQuerySchema,
  exportQuerySchema,
  loginRequestSchema,
  mapOptionsQuerySchema,
  type DashboardFilters,
} from "@shared/schema";
import { loadConfig, type AppConfig } from "./config";
import type { ExportTable } from "./csv-export";
import {
  DashboardService,
  customersExports,
  debtsExports,
  mapExports,
  revenueExports,
} from "./dashboard-service";
import { DashboardSession, SessionRegistry } from "./dashboard-session";
import { ErpClient, type ErpCookies, type ErpGateway } from "./erp-client";
import {
  ErpError,
  ErpLoginError,
  ErpNotConfiguredError,
  ErpRequestError,
  ErpUnauthorizedError,
} from "./errors";
import { createErpSessionMiddleware, type ErpClientFactory } from "./middleware/erp-session";
import { getLogger } from "./observability/logger";
import { metricsRegistry } from "./observability/metrics";
import { evaluateReadinessDependencies } from "./observability/readiness";

type RouteDependencies = {
  config?: AppConfig;
  createErpClient?: ErpClientFactory;
  registry?: SessionRegistry;
  service?: DashboardService;
};

type ExportQuery = z.infer<typeof exportQuerySchema>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function destroySession(req: Request): Promise<void> {
  return new Promise(resolve => {
    req.session.destroy(error => {
      if (error) {
        getLogger(req).warn("Failed to destroy HTTP session", { event: "auth.session.destroy" }, error);
      }
      resolve();
    });
  });
}

function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate(error => (error ? reject(error) : resolve()));
  });
}

export async function registerRoutes(
  app: Express,
  dependencies: RouteDependencies = {},
): Promise<Server> {
  const config = dependencies.config ?? loadConfig();
  const registry = dependencies.registry ?? new SessionRegistry();
  const service = dependencies.service ?? new DashboardService({
    pageSize: config.pageSize,
    flowWidthPx: config.flowWidthPx,
  });
  const createClient: ErpClientFactory = dependencies.createErpClient ?? ((cookies) => {
    if (!config.erpBaseUrl) {
      throw new ErpNotConfiguredError();
    }
    return new ErpClient({
      baseUrl: config.erpBaseUrl,
      verifySsl: config.erpVerifySsl,
      timeoutMs: config.erpTimeoutMs,
      cookies,
    });
  });
  const requireErpSession = createErpSessionMiddleware(registry, createClient);

  async function respondWithError(req: Request, res: Response, error: unknown) {
    const requestLogger = getLogger(req);

    if (error instanceof z.ZodError) {
      return res.status(400).json({ error: "Invalid query parameters", issues: error.issues });
    }

    if (error instanceof ErpUnauthorizedError) {
      requestLogger.warn("ERP session rejected, re-authentication required", {
        event: "auth.erp.rejected",
        context: { upstreamStatus: error.upstreamStatus },
      });
      registry.discard(req.sessionID);
      await destroySession(req);
      return res.status(401).json({ error: error.message, reauthenticate: true });
    }

    if (error instanceof ErpRequestError) {
      requestLogger.error("ERP API error", {
        event: "erp.request.failed",
        context: { upstreamStatus: error.upstreamStatus },
      }, error);
      return res.status(error.status).json({
        error: "ERP API error.",
        message: error.message,
        upstreamStatus: error.upstreamStatus,
        detail: error.body,
      });
    }

    if (error instanceof ErpError) {
      return res.status(error.status).json({ error: error.message });
    }

    requestLogger.error("Report failed", { event: "dashboard.report.failed" }, error);
    return res.status(500).json({ error: describeError(error) });
  }

  async function serveReport<TReport>(
    req: Request,
    res: Response,
    exports: Record<string, ExportTable<TReport>>,
    build: (session: DashboardSession, filters: DashboardFilters, query: ExportQuery) => Promise<TReport>,
  ) {
    try {
      const session = req.dashboardSession;
      if (!session) {
        return res.status(500).json({ error: "Dashboard session not loaded" });
      }

      const exportQuery = exportQuerySchema.parse(req.query);
      let table: ExportTable<TReport> | undefined;
      if (exportQuery.format === "csv") {
        const tableName = exportQuery.table ?? "";
        table = Object.prototype.hasOwnProperty.call(exports, tableName) ? exports[tableName] : undefined;
        if (!table) {
          return res.status(400).json({
            error: `Unknown table "${tableName}". Available: ${Object.keys(exports).join(", ")}`,
          });
        }
      }

      const filters = await service.resolveFilters(session, dashboardFiltersQuerySchema.parse(req.query));
      const report = await build(session, filters, exportQuery);

      if (table) {
        res.setHeader("Content-Type", "text/csv; charset=utf-8");
        res.setHeader("Content-Disposition", `attachment; filename="${table.filename}"`);
        return res.send(table.render(report));
      }

      return res.json(report);
    } catch (error) {
      return respondWithError(req, res, error);
    }
  }

  app.get("/healthz", (_req, res) => {
    res.status(200).json({
      status: "ok",
      service: config.serviceName,
      commit: process.env.GIT_COMMIT_SHA ?? null,
      buildTime: process.env.BUILD_TIMESTAMP ?? null,
    });
  });

  app.get("/readyz", (_req, res) => {
    const { healthy, dependencies: readiness } = evaluateReadinessDependencies(config);
    res.status(healthy ? 200 : 503).json({
      status: healthy ? "ok" : "error",
      dependencies: readiness,
    });
  });

  app.get("/metrics", async (req, res) => {
    try {
      res.setHeader("Content-Type", metricsRegistry.contentType);
      res.send(await metricsRegistry.metrics());
    } catch (error) {
      getLogger(req).error("Failed to render metrics", { event: "metrics.render" }, error);
      res.status(500).json({ error: "Failed to render metrics" });
    }
  });

  /**
   * Removes the caller's dashboard session from the registry. One lost by a
   * restart is rebuilt from the stored cookies so its ERP session can be closed.
   */
  function takeSession(req: Request): DashboardSession | undefined {
    const erp = req.session.erp;
    const session = registry.take(req.sessionID);
    if (session || !erp) {
      return session;
    }
    try {
      return new DashboardSession(erp.user, createClient(erp.cookies), getLogger(req));
    } catch (error) {
      getLogger(req).warn("Could not rebuild ERP client for logout", { event: "auth.logout" }, error);
      return undefined;
    }
  }

  async function closeSession(req: Request, session: DashboardSession | undefined) {
    if (!session) {
      return;
    }
    try {
      await session.close();
    } catch (error) {
      getLogger(req).warn("ERP logout failed", { event: "auth.logout", userId: session.user }, error);
    }
  }

  // ===== AUTHENTICATION ROUTES =====
  app.post("/api/auth/login", async (req, res) => {
    const parsed = loginRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid login request", issues: parsed.error.issues });
    }

    const { username, password } = parsed.data;
    const requestLogger = getLogger(req);

    let client: ErpGateway;
    let cookies: ErpCookies;
    try {
      client = createClient();
      cookies = await client.login(username, password);
    } catch (error) {
      if (error instanceof ErpLoginError) {
        return res.status(401).json({ error: error.message, detail: error.detail });
      }
      return respondWithError(req, res, error);
    }

    const previous = takeSession(req);

    // Regenerate session ID to prevent fixation attacks
    try {
      await regenerateSession(req);
    } catch (error) {
      requestLogger.error("Failed to regenerate HTTP session", { event: "auth.session.regenerate" }, error);
      await closeSession(req, previous);
      await closeSession(req, new DashboardSession(username, client, requestLogger));
      return res.status(500).json({ error: "Failed to create session" });
    }

    registry.set(req.sessionID, new DashboardSession(username, client, requestLogger));
    req.session.erp = { user: username, cookies };
    await closeSession(req, previous);

    requestLogger.info("User logged in", { event: "auth.login", userId: username });
    return res.json({ user: username });
  });

  app.post("/api/auth/logout", async (req, res) => {
    const user = req.session.erp?.user;
    await closeSession(req, takeSession(req));
    await destroySession(req);

    getLogger(req).info("User logged out", { event: "auth.logout", userId: user });
    return res.json({ ok: true });
  });

  app.get("/api/auth/me", (req, res) => {
    const erp = req.session.erp;
    if (!erp) {
      return res.status(401).json({ error: "Not authenticated. Log in to continue." });
    }
    return res.json({ user: erp.user });
  });

  // ===== DASHBOARD ROUTES =====
  app.get("/api/companies", requireErpSession, async (req, res) => {
    try {
      const session = req.dashboardSession;
      if (!session) {
        return res.status(500).json({ error: "Dashboard session not loaded" });
      }
      const companies = await service.companyNames(session);
      return res.json({ companies });
    } catch (error) {
      return respondWithError(req, res, error);
    }
  });

  app.get("/api/dashboard/revenue", requireErpSession, (req, res) =>
    serveReport(req, res, revenueExports, (session, filters) => service.revenueReport(session, filters))
  );

  app.get("/api/dashboard/debts", requireErpSession, (req, res) =>
    serveReport(req, res, debtsExports, (session, filters) => service.debtsReport(session, filters))
  );

  app.get("/api/dashboard/customers", requireErpSession, (req, res) =>
    serveReport(req, res, customersExports, (session, filters, query) =>
      service.customersReport(session, filters, query.q)
    )
  );

  app.get("/api/dashboard/map", requireErpSession, (req, res) =>
    serveReport(req, res, mapExports, (session, filters) =>
      service.mapReport(session, filters, mapOptionsQuerySchema.parse(req.query))
    )
  );

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    const status = err instanceof ErpError ? err.status : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";

    res.status(status).json({ error: message });
    getLogger(req).error("Unhandled error", { event: "http.error" }, err);
  });

  return createServer(app);
}
