import https from "node:https";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import { rawRowListSchema, type QueryParams, type RawRow } from "@shared/schema";
import { ErpLoginError, ErpRequestError, ErpUnauthorizedError } from "./errors";
import { logger as rootLogger, type StructuredLogger } from "./observability/logger";
import { recordErpRequestDuration, startErpRequestTimer } from "./observability/metrics";

export type ErpCookies = Record<string, string>;

/**
 * Authenticated access to the ERP REST API, as the reporting pipeline sees it.
 */
export interface ErpFetcher {
  get(path: string, params?: QueryParams): Promise<RawRow[]>;
}

export interface ErpGateway extends ErpFetcher {
  login(user: string, password: string): Promise<ErpCookies>;
  logout(): Promise<void>;
  getCookies(): ErpCookies;
}

export interface ErpClientOptions {
  baseUrl: string;
  verifySsl?: boolean;
  timeoutMs?: number;
  cookies?: ErpCookies;
  logger?: StructuredLogger;
}

const listingResponseSchema = z.object({ data: rawRowListSchema });

const UNAUTHORIZED_STATUSES = new Set([401, 403]);

export function parseSetCookieHeader(header: unknown): ErpCookies {
  const lines = Array.isArray(header) ? header : typeof header === "string" ? [header] : [];
  const cookies: ErpCookies = {};

  for (const line of lines) {
    if (typeof line !== "string") {
      continue;
    }
    const pair = line.split(";")[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (name) {
      cookies[name] = value;
    }
  }

  return cookies;
}

function serializeCookies(cookies: ErpCookies): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

function stringifyBody(data: unknown): string | null {
  if (data === undefined || data === null || data === "") {
    return null;
  }
  if (typeof data === "string") {
    return data;
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export class ErpClient implements ErpGateway {
  private readonly http: AxiosInstance;
  private readonly logger: StructuredLogger;
  private cookies: ErpCookies;

  constructor(options: ErpClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ""),
      timeout: options.timeoutMs ?? 60_000,
      httpsAgent: new https.Agent({ rejectUnauthorized: options.verifySsl ?? true }),
      // Status handling happens below so 401/403 can be told apart
      validateStatus: () => true,
    });
    this.cookies = { ...(options.cookies ?? {}) };
    this.logger = (options.logger ?? rootLogger).child({ event: "erp.client" });
  }

  getCookies(): ErpCookies {
    return { ...this.cookies };
  }

  private cookieHeaders(): Record<string, string> {
    const cookie = serializeCookies(this.cookies);
    return cookie ? { Cookie: cookie } : {};
  }

  async login(user: string, password: string): Promise<ErpCookies> {
    const form = new URLSearchParams({ usr: user, pwd: password });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>("/api/method/login", form.toString(), {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
      });
    } catch (error) {
      this.logger.error("ERP login request failed", { context: { usr: user } }, error);
      throw new ErpRequestError(`ERP login request failed (${describeTransportError(error)})`, { cause: error });
    }

    const cookies = parseSetCookieHeader(response.headers["set-cookie"]);
    if (response.status === 200 && cookies.sid) {
      this.cookies = cookies;
      this.logger.info("ERP login succeeded", { context: { usr: user } });
      return { ...cookies };
    }

    this.logger.warn("ERP login rejected", { context: { usr: user, status: response.status } });
    throw new ErpLoginError(`Login failed (HTTP ${response.status}).`, response.data);
  }

  async logout(): Promise<void> {
    try {
      await this.http.get("/api/method/logout", { headers: this.cookieHeaders(), timeout: 15_000 });
    } catch (error) {
      // Local session state is dropped either way
      this.logger.warn("ERP logout request failed", undefined, error);
    } finally {
      this.cookies = {};
    }
  }

  async get(path: string, params: QueryParams = {}): Promise<RawRow[]> {
    const timer = startErpRequestTimer(path);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path, { params, headers: this.cookieHeaders() });
    } catch (error) {
      recordErpRequestDuration(timer, "error");
      throw new ErpRequestError(`ERP request to ${path} failed (${describeTransportError(error)})`, { cause: error });
    }

    if (UNAUTHORIZED_STATUSES.has(response.status)) {
      recordErpRequestDuration(timer, "unauthorized");
      this.logger.warn("ERP session rejected", { resource: path, context: { status: response.status } });
      throw new ErpUnauthorizedError(response.status, path);
    }

    if (response.status < 200 || response.status >= 300) {
      recordErpRequestDuration(timer, "error");
      throw new ErpRequestError(`ERP API error (HTTP ${response.status}) on ${path}`, {
        upstreamStatus: response.status,
        body: stringifyBody(response.data),
      });
    }

    const parsed = listingResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      recordErpRequestDuration(timer, "error");
      throw new ErpRequestError(`ERP returned an unexpected payload for ${path}`, {
        upstreamStatus: response.status,
        body: stringifyBody(response.data),
      });
    }

    recordErpRequestDuration(timer, "success");
    return parsed.data.data;
  }
}
