// Calendar helpers on ISO dates (YYYY-MM-DD), computed in UTC

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parses the date part of an ISO date or datetime string.
 * Returns null for anything that is not a real calendar day.
 */
export function parseIsoDate(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }

  return `${year}-${month}-${day}`;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().split("T")[0];
}

/**
 * Days since the Unix epoch for an ISO date. The argument must already be valid.
 */
export function toDayNumber(isoDate: string): number {
  return Math.floor(Date.parse(`${isoDate}T00:00:00.000Z`) / MS_PER_DAY);
}

export function fromDayNumber(dayNumber: number): string {
  return toIsoDate(new Date(dayNumber * MS_PER_DAY));
}

export function addMonths(isoDate: string, months: number): string {
  const [year, month, day] = isoDate.split("-").map(Number);
  const target = new Date(Date.UTC(year, month - 1 + months, 1));
  const lastDay = new Date(Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0)).getUTCDate();
  target.setUTCDate(Math.min(day, lastDay));
  return toIsoDate(target);
}

/**
 * Month key (YYYY-MM) of an ISO date
 */
export function getMonthKey(isoDate: string): string {
  return isoDate.substring(0, 7);
}

export function daysBetween(fromIso: string, toIso: string): number {
  return toDayNumber(toIso) - toDayNumber(fromIso);
}

const EMAIL_MASK = /(^.).+(@.+$)/;
const USER_KEYS = new Set(["usr", "user", "username"]);

function maskEmail(email: string): string {
  if (!EMAIL_MASK.test(email)) {
    return "***";
  }
  return email.replace(EMAIL_MASK, (_match, firstChar: string, domain: string) => `${firstChar}***${domain}`);
}

function maskDigits(value: string): string {
  const digits = value.replace(/\D/g, "");
  if (digits.length <= 4) {
    return "***";
  }
  return `${"*".repeat(Math.max(0, digits.length - 4))}${digits.slice(-4)}`;
}

/**
 * ERP user ids are usually e-mail addresses; those are masked, plain ids are kept.
 */
export function maskUserId(userId: string): string {
  return userId.includes("@") ? maskEmail(userId) : userId;
}

export function maskPIIValue(key: string, value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }

  const normalizedKey = key.toLowerCase();
  if (normalizedKey.includes("email") || USER_KEYS.has(normalizedKey)) {
    return maskEmail(value);
  }
  if (normalizedKey.includes("phone") || normalizedKey.includes("mobile")) {
    return maskDigits(value);
  }
  if (normalizedKey.includes("password") || normalizedKey.includes("pwd") || normalizedKey.includes("cookie")) {
    return "***";
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function scrubPII(payload: Record<string, unknown>): Record<string, unknown> {
  return Object.entries(payload).reduce<Record<string, unknown>>((acc, [key, value]) => {
    if (isPlainObject(value)) {
      acc[key] = scrubPII(value);
      return acc;
    }

    if (Array.isArray(value)) {
      acc[key] = value.map((item, index) =>
        isPlainObject(item) ? scrubPII(item) : maskPIIValue(`${key}[${index}]`, item)
      );
      return acc;
    }

    acc[key] = maskPIIValue(key, value);
    return acc;
  }, {});
}

/**
 * Scrubs arbitrary values; non-object payloads pass through unchanged.
 */
export function scrubUnknown(value: unknown): unknown {
  if (isPlainObject(value)) {
    return scrubPII(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => scrubUnknown(item));
  }
  return value;
}
