import { DEV_SESSION_SECRET, type AppConfig } from "../config";

export type DependencyState = "ok" | "error" | "skipped";

export interface DependencyStatus {
  status: DependencyState;
  optional?: boolean;
  message?: string;
}

export interface ReadinessSnapshot {
  healthy: boolean;
  dependencies: Record<string, DependencyStatus>;
}

export function evaluateReadinessDependencies(config: AppConfig): ReadinessSnapshot {
  const dependencies: Record<string, DependencyStatus> = {};

  if (!config.sessionSecret || config.sessionSecret === DEV_SESSION_SECRET) {
    dependencies.sessionSecret = {
      status: config.production ? "error" : "skipped",
      optional: !config.production,
      message: "SESSION_SECRET is not configured",
    };
  } else {
    dependencies.sessionSecret = { status: "ok" };
  }

  if (!config.erpBaseUrl) {
    dependencies.erp = {
      status: "error",
      message: "ERP_BASE_URL is not configured",
    };
  } else {
    dependencies.erp = {
      status: "ok",
      message: config.erpVerifySsl ? undefined : "TLS certificate verification disabled",
    };
  }

  const healthy = Object.values(dependencies).every(
    (dependency) => dependency.status === "ok" || dependency.status === "skipped"
  );

  return { healthy, dependencies };
}
