import type { Request, Response, NextFunction } from "express";
import { DashboardSession, type SessionRegistry } from "../dashboard-session";
import type { ErpCookies, ErpGateway } from "../erp-client";
import { getLogger, updateRequestLoggerContext } from "../observability/logger";

export type ErpClientFactory = (cookies?: ErpCookies) => ErpGateway;

/**
 * Attaches the caller's dashboard session. A session lost by a restart is
 * rebuilt from the ERP cookies kept in the HTTP session, with an empty cache.
 */
export function createErpSessionMiddleware(registry: SessionRegistry, createClient: ErpClientFactory) {
  return function erpSessionMiddleware(req: Request, res: Response, next: NextFunction) {
    const erp = req.session.erp;
    if (!erp) {
      return res.status(401).json({ error: "Not authenticated. Log in to continue." });
    }

    let session = registry.get(req.sessionID);
    if (!session || session.user !== erp.user) {
      try {
        session = new DashboardSession(erp.user, createClient(erp.cookies), getLogger(req));
      } catch (error) {
        return next(error);
      }
      registry.set(req.sessionID, session);
    }

    req.dashboardSession = session;
    updateRequestLoggerContext(req, { userId: erp.user });
    next();
  };
}
