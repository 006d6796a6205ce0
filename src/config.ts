import path from "node:path";
import * as fss from "node:fs";
import YAML from "yaml";
import { ConfigError, errorMessage } from "./errors.js";

export const CONFIG_FILENAMES = [".pushlint.yml", ".pushlint.yaml"];

export type LintOptions = {
  path: string;
  msgFile?: string;
  since?: string;
  maxParents: number;
  excludeAuthorNames: string[];
  excludeAuthorEmails: string[];
  subjectRegex?: string;
  subjectMaxLength?: number;
  subjectMinLength?: number;
  bodyRegex?: string;
  bodyMaxLength?: number;
  bodyMinLength?: number;
  separator: string;
  verbose: boolean;
};

export const DEFAULT_OPTIONS: LintOptions = {
  path: ".",
  maxParents: 1,
  excludeAuthorNames: [],
  excludeAuthorEmails: [],
  separator: "\n",
  verbose: false,
};

export const OPTION_KEYS = [
  "path",
  "msgFile",
  "since",
  "maxParents",
  "excludeAuthorNames",
  "excludeAuthorEmails",
  "subjectRegex",
  "subjectMaxLength",
  "subjectMinLength",
  "bodyRegex",
  "bodyMaxLength",
  "bodyMinLength",
  "separator",
  "verbose",
] as const satisfies readonly (keyof LintOptions)[];

// Where to look and what to lint is decided per invocation, never by the checked-in file.
const CLI_ONLY_KEYS: readonly string[] = ["path", "msgFile"];
const FILE_KEYS = OPTION_KEYS.filter((k) => !CLI_ONLY_KEYS.includes(k));

class Doc {
  constructor(readonly where: string, private readonly values: Map<string, unknown>) {}

  private fail(key: string, expected: string) {
    return new ConfigError(`${this.where}: '${key}' must be ${expected}`);
  }

  private get(key: string) {
    const v = this.values.get(key);
    return v == null ? undefined : v;
  }

  string(key: string): string | undefined {
    const v = this.get(key);
    if (v === undefined || typeof v === "string") return v;
    // unquoted YAML scalars such as `since: 2024-01-01` stay strings, but numbers do not
    if (typeof v === "number") return String(v);
    throw this.fail(key, "a string");
  }

  count(key: string): number | undefined {
    const v = this.get(key);
    if (v === undefined) return v;
    if (typeof v !== "number" || !Number.isInteger(v) || v < 0) throw this.fail(key, "a non-negative integer");
    return v;
  }

  bool(key: string): boolean | undefined {
    const v = this.get(key);
    if (v === undefined || typeof v === "boolean") return v;
    throw this.fail(key, "true or false");
  }

  // a single pattern is accepted in place of a list
  strings(key: string): string[] | undefined {
    const v = this.get(key);
    if (v === undefined) return v;
    if (typeof v === "string") return [v];
    if (Array.isArray(v) && v.every((s): s is string => typeof s === "string")) return [...v];
    throw this.fail(key, "a list of strings");
  }
}

/**
 * Validates a parsed configuration document. Unknown keys are reported through
 * `warn` and dropped; `null` values leave the setting unset.
 */
export function normalizeConfig(
  raw: unknown,
  where: string,
  warn: (msg: string) => void = (m) => console.warn(m),
): Partial<LintOptions> {
  if (raw == null) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`${where}: expected a mapping of settings`);
  }
  const known = new Set<string>(FILE_KEYS);
  const values = new Map<string, unknown>();
  for (const [k, v] of Object.entries(raw)) {
    if (CLI_ONLY_KEYS.includes(k)) {
      warn(`pushlint: ${where}: '${k}' can only be given on the command line, ignored`);
      continue;
    }
    if (!known.has(k)) {
      warn(`pushlint: ${where}: unknown setting '${k}' ignored`);
      continue;
    }
    values.set(k, v);
  }
  const doc = new Doc(where, values);
  return {
    since: doc.string("since"),
    maxParents: doc.count("maxParents"),
    excludeAuthorNames: doc.strings("excludeAuthorNames"),
    excludeAuthorEmails: doc.strings("excludeAuthorEmails"),
    subjectRegex: doc.string("subjectRegex"),
    subjectMaxLength: doc.count("subjectMaxLength"),
    subjectMinLength: doc.count("subjectMinLength"),
    bodyRegex: doc.string("bodyRegex"),
    bodyMaxLength: doc.count("bodyMaxLength"),
    bodyMinLength: doc.count("bodyMinLength"),
    separator: doc.string("separator"),
    verbose: doc.bool("verbose"),
  };
}

export function loadConfigFile(file: string, warn?: (msg: string) => void): Partial<LintOptions> {
  let text: string;
  try {
    text = fss.readFileSync(file, "utf8");
  } catch (e) {
    throw new ConfigError(`cannot read config ${file}: ${errorMessage(e)}`, { cause: e });
  }
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (e) {
    throw new ConfigError(`cannot parse config ${file}: ${errorMessage(e)}`, { cause: e });
  }
  return normalizeConfig(doc, file, warn);
}

/**
 * Explicit path, then $PUSHLINT_CONFIG, then .pushlint.yml / .pushlint.yaml under `dir`.
 * Returns null when no file applies.
 */
export function resolveConfigPath(dir: string, explicit?: string, env = process.env): string | null {
  if (explicit) return path.resolve(explicit);
  const fromEnv = (env.PUSHLINT_CONFIG ?? "").trim();
  if (fromEnv) return path.resolve(fromEnv);
  for (const name of CONFIG_FILENAMES) {
    const p = path.resolve(dir, name);
    if (fss.existsSync(p)) return p;
  }
  return null;
}

function assign<K extends keyof LintOptions>(target: LintOptions, key: K, value: LintOptions[K] | undefined) {
  if (value !== undefined) target[key] = value;
}

/** Later layers win; `undefined` never overrides. */
export function mergeOptions(...layers: Partial<LintOptions>[]): LintOptions {
  const out: LintOptions = {
    ...DEFAULT_OPTIONS,
    excludeAuthorNames: [...DEFAULT_OPTIONS.excludeAuthorNames],
    excludeAuthorEmails: [...DEFAULT_OPTIONS.excludeAuthorEmails],
  };
  for (const layer of layers) {
    for (const k of OPTION_KEYS) assign(out, k, layer[k]);
  }
  return out;
}

// Flags as commander hands them over (camel-cased long option names).
export type CliFlags = {
  path?: string;
  config?: string;
  msgFile?: string;
  since?: string;
  maxParents?: number;
  exclAuthorNames?: string[];
  exclAuthorEmails?: string[];
  subjectRegex?: string;
  subjectMaxlen?: number;
  subjectMinlen?: number;
  bodyRegex?: string;
  bodyMaxlen?: number;
  bodyMinlen?: number;
  separator?: string;
  verbose?: boolean;
};

export function fromFlags(f: CliFlags): Partial<LintOptions> {
  return {
    path: f.path,
    msgFile: f.msgFile,
    since: f.since,
    maxParents: f.maxParents,
    excludeAuthorNames: f.exclAuthorNames,
    excludeAuthorEmails: f.exclAuthorEmails,
    subjectRegex: f.subjectRegex,
    subjectMaxLength: f.subjectMaxlen,
    subjectMinLength: f.subjectMinlen,
    bodyRegex: f.bodyRegex,
    bodyMaxLength: f.bodyMaxlen,
    bodyMinLength: f.bodyMinlen,
    separator: f.separator,
    verbose: f.verbose,
  };
}

/** Defaults, then the config file (if any), then command-line flags. */
export function resolveOptions(
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env,
  warn?: (msg: string) => void,
): LintOptions {
  const cli = fromFlags(flags);
  const dir = cli.path ?? DEFAULT_OPTIONS.path;
  const cfgPath = resolveConfigPath(dir, flags.config, env);
  const file = cfgPath ? loadConfigFile(cfgPath, warn) : {};
  return mergeOptions(file, cli);
}
