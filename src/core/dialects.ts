import { UnknownDialectError } from "./errors.js";
import type { Dialect } from "./types.js";

export type ClassifiedToken =
  | { kind: "timeout" }
  | { kind: "address"; address: string }
  | { kind: "time"; ms: number }
  | { kind: "name"; name: string }
  | { kind: "noise"; text: string };

export interface DialectRules {
  isTimeout(token: string): boolean;
  isAddress(token: string): boolean;
  isTime(token: string): boolean;
  isName(token: string): boolean;
}

const DECIMAL_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const OCTET_PATTERN = /^\d+$/;

const VERSION_BANNERS: Array<{ marker: string; dialect: Dialect }> = [
  { marker: "modern traceroute for linux", dialect: "modern" },
  { marker: "gnu inetutils", dialect: "inetutils" },
];

export function isIpv4Literal(text: string): boolean {
  const octets = text.split(".");
  if (octets.length !== 4) {
    return false;
  }

  return octets.every((octet) => OCTET_PATTERN.test(octet) && Number(octet) <= 255);
}

function isDecimal(text: string): boolean {
  return DECIMAL_PATTERN.test(text);
}

function isParenthesized(token: string): boolean {
  return token.length > 2 && token.startsWith("(") && token.endsWith(")");
}

function unwrap(token: string): string {
  return isParenthesized(token) ? token.slice(1, -1) : token;
}

function isTimeout(token: string): boolean {
  return token === "*";
}

export const DIALECT_RULES: Record<Dialect, DialectRules> = {
  modern: {
    isTimeout,
    isAddress: (token) => isParenthesized(token) && isIpv4Literal(unwrap(token)),
    isTime: isDecimal,
    isName: (token) => token !== "ms",
  },
  inetutils: {
    isTimeout,
    isAddress: isIpv4Literal,
    isTime: (token) => token.endsWith("ms") && isDecimal(token.slice(0, -2)),
    isName: (token) => isParenthesized(token) && !isIpv4Literal(unwrap(token)),
  },
};

export function isDialect(name: string): name is Dialect {
  return Object.hasOwn(DIALECT_RULES, name);
}

export function resolveDialect(name: string): Dialect {
  const normalized = name.trim().toLowerCase();
  if (!isDialect(normalized)) {
    throw new UnknownDialectError(name);
  }
  return normalized;
}

export function rulesFor(dialect: Dialect): DialectRules {
  if (!isDialect(dialect)) {
    throw new UnknownDialectError(String(dialect));
  }
  return DIALECT_RULES[dialect];
}

/**
 * Classifies one whitespace-delimited token. Every token lands in exactly one
 * kind: timeout, address, time and name are tried in that order, and anything
 * left over (the bare `ms` unit, stray punctuation) is noise.
 */
export function classifyToken(token: string, dialect: Dialect): ClassifiedToken {
  const rules = rulesFor(dialect);

  if (rules.isTimeout(token)) {
    return { kind: "timeout" };
  }
  if (rules.isAddress(token)) {
    return { kind: "address", address: unwrap(token) };
  }
  if (rules.isTime(token)) {
    return { kind: "time", ms: Number.parseFloat(token) };
  }
  if (rules.isName(token)) {
    return { kind: "name", name: unwrap(token) };
  }
  return { kind: "noise", text: token };
}

/**
 * Maps the first line of `traceroute --version` to the dialect its hop lines
 * are written in.
 */
export function dialectFromVersionBanner(banner: string): Dialect {
  const normalized = banner.trim().toLowerCase();
  const match = VERSION_BANNERS.find((entry) => normalized.includes(entry.marker));
  if (!match) {
    throw new UnknownDialectError(banner.trim());
  }
  return match.dialect;
}
