/**
 * Helper library available in file names and file contents.
 *
 * Helpers are registered on an isolated Handlebars runtime. Binding
 * lambdas passed as arguments are called first, so `{{upper name}}`
 * receives the answer for `name`, not the function.
 *
 *   STRINGS      upper lower title camelcase pascalcase snakecase kebabcase
 *                trim replace trimPrefix trimSuffix hasPrefix hasSuffix
 *                contains repeat quote default
 *   RANDOM       uuid password randomAlphaNum randomBase64
 *   DATE/TIME    now date year
 *   ARITHMETIC   add sub mul div mod max min
 *   LOGIC        eq ne not and or
 *   ENVIRONMENT  env hostname username
 *   FORMATTING   formatFilesize toBinary
 */

import { randomBytes, randomUUID } from "node:crypto";
import { hostname, userInfo } from "node:os";
import { customAlphabet } from "nanoid";
import type Handlebars from "handlebars";

export type TemplateRuntime = typeof Handlebars;

type Helper = (...args: unknown[]) => unknown;

export class HelperError extends Error {
  constructor(helper: string, message: string) {
    super(`${helper}: ${message}`);
    this.name = "HelperError";
  }
}

// ---------------------------------------------------------------------------
// Argument handling
// ---------------------------------------------------------------------------

function unwrap(value: unknown): unknown {
  return typeof value === "function" ? value() : value;
}

function toText(value: unknown): string {
  return value === undefined || value === null ? "" : String(value);
}

function toNumber(helper: string, value: unknown): number {
  const n = typeof value === "number" ? value : Number(toText(value));
  if (!Number.isFinite(n)) {
    throw new HelperError(helper, `expected a number, got ${JSON.stringify(value)}`);
  }
  return n;
}

function toCount(helper: string, value: unknown): number {
  const n = toNumber(helper, value);
  if (!Number.isInteger(n) || n < 0) {
    throw new HelperError(helper, `expected a non-negative integer, got ${n}`);
  }
  return n;
}

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

/** Split "myHTTPServer_v2-beta" into ["my", "HTTP", "Server", "v2", "beta"]. */
export function splitWords(input: string): string[] {
  return input
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

const stringHelpers: Record<string, Helper> = {
  upper: (s) => toText(s).toUpperCase(),
  lower: (s) => toText(s).toLowerCase(),
  title: (s) => toText(s).replace(/\S+/g, capitalize),
  camelcase: (s) =>
    splitWords(toText(s))
      .map((w, i) => (i === 0 ? w.toLowerCase() : capitalize(w)))
      .join(""),
  pascalcase: (s) => splitWords(toText(s)).map(capitalize).join(""),
  snakecase: (s) =>
    splitWords(toText(s))
      .map((w) => w.toLowerCase())
      .join("_"),
  kebabcase: (s) =>
    splitWords(toText(s))
      .map((w) => w.toLowerCase())
      .join("-"),
  trim: (s) => toText(s).trim(),
  replace: (s, from, to) => toText(s).split(toText(from)).join(toText(to)),
  trimPrefix: (s, prefix) => {
    const text = toText(s);
    const p = toText(prefix);
    return p !== "" && text.startsWith(p) ? text.slice(p.length) : text;
  },
  trimSuffix: (s, suffix) => {
    const text = toText(s);
    const p = toText(suffix);
    return p !== "" && text.endsWith(p) ? text.slice(0, -p.length) : text;
  },
  hasPrefix: (s, prefix) => toText(s).startsWith(toText(prefix)),
  hasSuffix: (s, suffix) => toText(s).endsWith(toText(suffix)),
  contains: (s, part) => toText(s).includes(toText(part)),
  repeat: (s, count) => toText(s).repeat(toCount("repeat", count)),
  quote: (s) => JSON.stringify(toText(s)),
  default: (fallback, value) =>
    value === undefined || value === null || value === "" || value === false
      ? fallback
      : value,
};

// ---------------------------------------------------------------------------
// Random values
// ---------------------------------------------------------------------------

const ALPHANUMERIC =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const PASSWORD_ALPHABET = ALPHANUMERIC + "!#$%&*+-=?@^_~";

const randomHelpers: Record<string, Helper> = {
  uuid: () => randomUUID(),
  password: (length) => customAlphabet(PASSWORD_ALPHABET, toCount("password", length))(),
  randomAlphaNum: (length) =>
    customAlphabet(ALPHANUMERIC, toCount("randomAlphaNum", length))(),
  randomBase64: (bytes) => randomBytes(toCount("randomBase64", bytes)).toString("base64"),
};

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const DATE_TOKEN_RE = /YYYY|MM|DD|HH|mm|ss/g;

/**
 * Format a date with YYYY, MM, DD, HH, mm and ss tokens (UTC).
 * Everything else in the pattern is copied as is.
 */
export function formatDate(date: Date, pattern: string): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  const parts: Record<string, string> = {
    YYYY: String(date.getUTCFullYear()),
    MM: pad(date.getUTCMonth() + 1),
    DD: pad(date.getUTCDate()),
    HH: pad(date.getUTCHours()),
    mm: pad(date.getUTCMinutes()),
    ss: pad(date.getUTCSeconds()),
  };
  return pattern.replace(DATE_TOKEN_RE, (token) => parts[token] ?? token);
}

function toDate(value: unknown): Date {
  if (value === undefined) return new Date();
  const date = value instanceof Date ? value : new Date(toText(value));
  if (Number.isNaN(date.getTime())) {
    throw new HelperError("date", `cannot read ${JSON.stringify(value)} as a date`);
  }
  return date;
}

const dateHelpers: Record<string, Helper> = {
  now: () => new Date().toISOString(),
  date: (pattern, value) => formatDate(toDate(value), toText(pattern)),
  year: () => new Date().getUTCFullYear(),
};

// ---------------------------------------------------------------------------
// Arithmetic and logic
// ---------------------------------------------------------------------------

const mathHelpers: Record<string, Helper> = {
  add: (...xs) => xs.reduce<number>((sum, x) => sum + toNumber("add", x), 0),
  sub: (a, b) => toNumber("sub", a) - toNumber("sub", b),
  mul: (...xs) => xs.reduce<number>((product, x) => product * toNumber("mul", x), 1),
  div: (a, b) => {
    const divisor = toNumber("div", b);
    if (divisor === 0) throw new HelperError("div", "division by zero");
    return toNumber("div", a) / divisor;
  },
  mod: (a, b) => {
    const divisor = toNumber("mod", b);
    if (divisor === 0) throw new HelperError("mod", "division by zero");
    return toNumber("mod", a) % divisor;
  },
  max: (...xs) => Math.max(...xs.map((x) => toNumber("max", x))),
  min: (...xs) => Math.min(...xs.map((x) => toNumber("min", x))),
};

const logicHelpers: Record<string, Helper> = {
  eq: (a, b) => a === b,
  ne: (a, b) => a !== b,
  not: (a) => !a,
  and: (...xs) => xs.every(Boolean),
  or: (...xs) => xs.some(Boolean),
};

// ---------------------------------------------------------------------------
// Environment and formatting
// ---------------------------------------------------------------------------

const FILESIZE_UNITS = ["B", "kB", "MB", "GB", "TB", "PB"];

/** 1536 → "1.5kB", using powers of 1000. */
export function formatFilesize(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (Math.abs(value) >= 1000 && unit < FILESIZE_UNITS.length - 1) {
    value /= 1000;
    unit++;
  }
  const rounded = Math.round(value * 10) / 10;
  return `${rounded}${FILESIZE_UNITS[unit]}`;
}

const environmentHelpers: Record<string, Helper> = {
  env: (name) => process.env[toText(name)] ?? "",
  hostname: () => hostname(),
  username: () => userInfo().username,
  formatFilesize: (bytes) => formatFilesize(toNumber("formatFilesize", bytes)),
  toBinary: (n) => toCount("toBinary", n).toString(2),
};

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export const HELPERS: Readonly<Record<string, Helper>> = {
  ...stringHelpers,
  ...randomHelpers,
  ...dateHelpers,
  ...mathHelpers,
  ...logicHelpers,
  ...environmentHelpers,
};

/**
 * Register every helper on a runtime. Handlebars passes its options object
 * last; it is dropped and binding lambdas are unwrapped before the call.
 */
export function registerHelpers(runtime: TemplateRuntime): void {
  for (const [name, helper] of Object.entries(HELPERS)) {
    runtime.registerHelper(name, (...args: unknown[]) =>
      helper(...args.slice(0, -1).map(unwrap))
    );
  }
}

/** Names of every helper the runtime knows, built-ins included. */
export function helperNames(runtime: TemplateRuntime): string[] {
  return Object.keys(runtime.helpers).sort();
}
