import type { RequestLogger } from "../observability/logger";
import type { DashboardSession } from "../dashboard-session";
import type { ErpCookies } from "../erp-client";
import "express-session";

declare global {
  namespace Express {
    interface Request {
      dashboardSession?: DashboardSession;
      requestId?: string;
      logger?: RequestLogger;
    }
  }
}

declare module "express-session" {
  interface SessionData {
    erp?: {
      user: string;
      cookies: ErpCookies;
    };
  }
}

export {};
