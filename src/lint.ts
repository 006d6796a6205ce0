import path from "node:path";
import * as fss from "node:fs";
import { InRepo, MsgIn } from "./commits.js";
import { PushlintError } from "./errors.js";
import { notAuthoredByEmails, notAuthoredByNames, since, withMaxParents } from "./filters.js";
import { GitRepository } from "./git.js";
import { collected } from "./issues.js";
import { printed } from "./report.js";
import {
  bodyMaxLengthRule,
  bodyMinLengthRule,
  bodyRegexRule,
  subjectMaxLengthRule,
  subjectMinLengthRule,
  subjectRegexRule,
} from "./rules/index.js";
import type { LintOptions } from "./config.js";
import type { Commits, Issue, MessageReader, Repository, Rule, Sink } from "./types.js";

export type LintDeps = {
  sink: Sink;
  repository?: (dir: string) => Repository;
  readMessage?: (file: string) => MessageReader;
  now?: () => Date;
  log?: (msg: string) => void;
};

export type LintOutcome =
  | { ok: true; issues: Issue[] }
  | { ok: false; error: PushlintError };

export function fileMessage(file: string): MessageReader {
  return () => fss.readFileSync(file);
}

export function buildRules(opts: LintOptions): Rule[] {
  const rules: Rule[] = [];
  if (opts.subjectRegex !== undefined) rules.push(subjectRegexRule(opts.subjectRegex));
  if (opts.subjectMaxLength !== undefined) rules.push(subjectMaxLengthRule(opts.subjectMaxLength));
  if (opts.subjectMinLength !== undefined) rules.push(subjectMinLengthRule(opts.subjectMinLength));
  if (opts.bodyRegex !== undefined) rules.push(bodyRegexRule(opts.bodyRegex));
  if (opts.bodyMaxLength !== undefined) rules.push(bodyMaxLengthRule(opts.bodyMaxLength));
  if (opts.bodyMinLength !== undefined) rules.push(bodyMinLengthRule(opts.bodyMinLength));
  return rules;
}

export function buildSource(opts: LintOptions, deps: Omit<LintDeps, "sink">): Commits {
  const log = deps.log ?? (() => {});
  if (opts.msgFile) {
    const file = path.resolve(opts.msgFile);
    log(`pushlint: linting message file ${file}`);
    return new MsgIn((deps.readMessage ?? fileMessage)(file), deps.now);
  }
  const dir = path.resolve(opts.path);
  log(`pushlint: linting history of ${dir}`);
  const repo = (deps.repository ?? ((d: string) => new GitRepository(d)))(dir);
  let source: Commits = new InRepo(repo);
  source = withMaxParents(opts.maxParents, source);
  if (opts.excludeAuthorEmails.length) source = notAuthoredByEmails(opts.excludeAuthorEmails, source);
  if (opts.excludeAuthorNames.length) source = notAuthoredByNames(opts.excludeAuthorNames, source);
  if (opts.since) source = since(opts.since, source);
  log(
    `pushlint: filters: max-parents=${opts.maxParents}` +
      (opts.excludeAuthorEmails.length ? ` excl-emails=${opts.excludeAuthorEmails.join(",")}` : "") +
      (opts.excludeAuthorNames.length ? ` excl-names=${opts.excludeAuthorNames.join(",")}` : "") +
      (opts.since ? ` since=${opts.since}` : ""),
  );
  return source;
}

/**
 * Assembles the pipeline, collects every issue and only then prints them.
 * Fatal conditions come back as `{ ok: false }` with nothing written to the sink.
 */
export function runLint(opts: LintOptions, deps: LintDeps): LintOutcome {
  const log = deps.log ?? (() => {});
  try {
    const rules = buildRules(opts);
    const source = buildSource(opts, deps);
    log(`pushlint: rules: ${rules.map((r) => r.name).join(", ") || "(none)"}`);
    const issues = collected(rules, source);
    printed(deps.sink, opts.separator, issues);
    log(`pushlint: ${issues.length} issue(s)`);
    return { ok: true, issues };
  } catch (e) {
    if (e instanceof PushlintError) return { ok: false, error: e };
    throw e;
  }
}
