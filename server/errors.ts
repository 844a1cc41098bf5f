/**
 * Base class for failures raised while talking to the ERP. `status` is the
 * HTTP status the route layer answers with.
 */
export class ErpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * The ERP rejected the session (401/403). The caller must re-authenticate;
 * the query in progress is abandoned without partial results.
 */
export class ErpUnauthorizedError extends ErpError {
  readonly upstreamStatus: number;

  constructor(upstreamStatus: number, path: string) {
    super(`ERP session expired or not authorized (HTTP ${upstreamStatus} on ${path})`, 401);
    this.upstreamStatus = upstreamStatus;
  }
}

/**
 * Transport failure, non-2xx response or a payload that breaks the listing contract.
 */
export class ErpRequestError extends ErpError {
  readonly upstreamStatus: number | null;
  readonly body: string | null;

  constructor(message: string, options: { upstreamStatus?: number | null; body?: string | null; cause?: unknown } = {}) {
    super(message, 502);
    this.upstreamStatus = options.upstreamStatus ?? null;
    this.body = options.body ?? null;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ErpLoginError extends ErpError {
  readonly detail: unknown;

  constructor(message: string, detail?: unknown) {
    super(message, 401);
    this.detail = detail ?? null;
  }
}

export class ErpNotConfiguredError extends ErpError {
  constructor() {
    super("ERP base URL is not configured (set ERP_BASE_URL)", 503);
  }
}
