import { z } from "zod";

export const DEV_SESSION_SECRET = "dev-secret-change-in-production";

const flagSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform(value => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  ERP_BASE_URL: z
    .string()
    .trim()
    .url("ERP_BASE_URL must be an absolute URL (e.g. https://erp.example.com)")
    .transform(value => value.replace(/\/+$/, ""))
    .optional()
    .or(z.literal("").transform(() => undefined)),
  ERP_VERIFY_SSL: flagSchema.default("true"),
  ERP_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ERP_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
  FLOW_WIDTH_PX: z.coerce.number().min(1).max(10).default(4),
  SESSION_SECRET: z.string().default(DEV_SESSION_SECRET),
  PORT: z.coerce.number().int().positive().default(5000),
  SERVICE_NAME: z.string().default("erp-dashboard-api"),
  NODE_ENV: z.string().default("development"),
});

export interface AppConfig {
  erpBaseUrl: string | null;
  erpVerifySsl: boolean;
  erpTimeoutMs: number;
  pageSize: number;
  flowWidthPx: number;
  sessionSecret: string;
  port: number;
  serviceName: string;
  production: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    erpBaseUrl: values.ERP_BASE_URL ?? null,
    erpVerifySsl: values.ERP_VERIFY_SSL,
    erpTimeoutMs: values.ERP_TIMEOUT_MS,
    pageSize: values.ERP_PAGE_SIZE,
    flowWidthPx: values.FLOW_WIDTH_PX,
    sessionSecret: values.SESSION_SECRET,
    port: values.PORT,
    serviceName: values.SERVICE_NAME,
    production: values.NODE_ENV === "production",
  };
}
