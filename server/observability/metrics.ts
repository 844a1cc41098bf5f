import { collectDefaultMetrics, Counter, Histogram, Registry } from "prom-client";

const SERVICE_NAME = process.env.SERVICE_NAME || "erp-dashboard-api";

export const metricsRegistry = new Registry();

collectDefaultMetrics({
  register: metricsRegistry,
  labels: { service: SERVICE_NAME },
});

const UNKNOWN_LABEL_VALUE = "unknown";

function normalizeLabel(value?: string) {
  if (!value) {
    return UNKNOWN_LABEL_VALUE;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : UNKNOWN_LABEL_VALUE;
}

export const erpRequestDuration = new Histogram({
  name: "erp_request_duration_seconds",
  help: "Duration of ERP REST calls",
  labelNames: ["resource", "outcome"],
  registers: [metricsRegistry],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60],
});

export const erpPagesFetched = new Counter({
  name: "erp_pages_fetched_total",
  help: "Listing pages received from the ERP",
  labelNames: ["resource"],
  registers: [metricsRegistry],
});

export const queryCacheEvents = new Counter({
  name: "query_cache_events_total",
  help: "Session query cache hits, misses and flushes",
  labelNames: ["event"],
  registers: [metricsRegistry],
});

export type ErpRequestOutcome = "success" | "unauthorized" | "error";

export function startErpRequestTimer(resource: string) {
  return { startedAt: process.hrtime.bigint(), resource: normalizeLabel(resource) };
}

export function recordErpRequestDuration(
  timer: { startedAt: bigint; resource: string },
  outcome: ErpRequestOutcome,
) {
  const elapsedNs = process.hrtime.bigint() - timer.startedAt;
  const elapsedSeconds = Number(elapsedNs) / 1_000_000_000;
  erpRequestDuration.observe({ resource: timer.resource, outcome }, elapsedSeconds);
  return elapsedSeconds * 1000;
}

export function incrementPagesFetched(resource: string) {
  erpPagesFetched.inc({ resource: normalizeLabel(resource) });
}

export function recordCacheEvent(event: "hit" | "miss" | "flush") {
  queryCacheEvents.inc({ event });
}
