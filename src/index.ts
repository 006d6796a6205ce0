export { Commit, SHORT_ID_LENGTH } from "./commit.js";
export { InRepo, MsgIn, Listed, Filtered, PLACEHOLDER_HASH } from "./commits.js";
export { since, notAuthoredByNames, notAuthoredByEmails, withMaxParents, parseDay } from "./filters.js";
export { createIssue, collected } from "./issues.js";
export { printed, fdSink } from "./report.js";
export * from "./rules/index.js";
export { GitRepository, parseLog } from "./git.js";
export { runLint, buildRules, buildSource, fileMessage } from "./lint.js";
export type { LintDeps, LintOutcome } from "./lint.js";
export { resolveOptions, mergeOptions, loadConfigFile, DEFAULT_OPTIONS } from "./config.js";
export type { LintOptions } from "./config.js";
export { PushlintError, ConfigError, RepositoryError, InputError, OutputError } from "./errors.js";
export type { Author, CommitRecord, Commits, Filter, Issue, Rule, Repository, MessageReader, Sink } from "./types.js";
