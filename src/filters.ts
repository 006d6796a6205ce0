import { Filtered } from "./commits.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { Commits } from "./types.js";

const DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

// YYYY-MM-DD at UTC midnight; rejects impossible calendar days such as 2024-02-30.
export function parseDay(s: string): Date {
  const m = DAY_RE.exec(s);
  if (!m) throw new ConfigError(`invalid date '${s}': expected YYYY-MM-DD`);
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(y, mo - 1, d));
  if (date.getUTCFullYear() !== y || date.getUTCMonth() !== mo - 1 || date.getUTCDate() !== d) {
    throw new ConfigError(`invalid date '${s}': no such day`);
  }
  return date;
}

export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (e) {
    throw new ConfigError(`invalid pattern '${pattern}': ${errorMessage(e)}`, { cause: e });
  }
}

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map(compilePattern);
}

/** Commits authored on or after `day` (YYYY-MM-DD). */
export function since(day: string, upstream: Commits): Commits {
  const start = parseDay(day).getTime();
  return new Filtered(upstream, (c) => c.date.getTime() >= start);
}

/** Drops commits whose author name matches any of `patterns`. */
export function notAuthoredByNames(patterns: readonly string[], upstream: Commits): Commits {
  const res = compilePatterns(patterns);
  return new Filtered(upstream, (c) => !res.some((re) => re.test(c.author.name)));
}

/** Drops commits whose author email matches any of `patterns`. */
export function notAuthoredByEmails(patterns: readonly string[], upstream: Commits): Commits {
  const res = compilePatterns(patterns);
  return new Filtered(upstream, (c) => !res.some((re) => re.test(c.author.email)));
}

// withMaxParents(1, ...) excludes merge commits.
export function withMaxParents(n: number, upstream: Commits): Commits {
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`invalid max parents '${n}': expected a non-negative integer`);
  }
  return new Filtered(upstream, (c) => c.numParents <= n);
}
