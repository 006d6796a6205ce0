#!/usr/bin/env node
import * as fss from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import { resolveOptions, type CliFlags, type LintOptions } from "./config.js";
import { PushlintError, errorMessage } from "./errors.js";
import { gitHooksDir } from "./git.js";
import { installHooks } from "./hooks/install.js";
import { runLint } from "./lint.js";
import { fdSink } from "./report.js";

const EXIT_OK = 0;
const EXIT_ISSUES = 1;
const EXIT_FATAL = 2;

// Resolve package version without JSON import attributes
let pkgVersion = "0.0.0";
try {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const pkg: unknown = JSON.parse(fss.readFileSync(pkgPath, "utf8"));
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") pkgVersion = pkg.version;
} catch {
  // running from an unpacked source tree
}

function count(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Expected a non-negative integer.");
  return Number(value);
}

const program = new Command();

program
  .name("pushlint")
  .description("Lint git commit messages in the current history or a pending message file")
  .version(pkgVersion);

program
  .command("lint", { isDefault: true })
  .description("Check commits reachable from HEAD (or one message file) and print the issues found")
  .option("--path <dir>", "path to the git repository")
  .option("-c, --config <file>", "YAML config file (default: .pushlint.yml under --path)")
  .option("--msg-file <file>", "lint only this commit message file (commit-msg hook)")
  .option("--since <yyyy-mm-dd>", "only commits authored on or after this day")
  .option("--max-parents <n>", "only commits with at most n parents (1 excludes merges)", count)
  .option("--excl-author-names <re...>", "skip commits whose author name matches")
  .option("--excl-author-emails <re...>", "skip commits whose author email matches")
  .option("--subject-regex <re>", "subject must match this regex")
  .option("--subject-maxlen <n>", "max subject length", count)
  .option("--subject-minlen <n>", "min subject length", count)
  .option("--body-regex <re>", "body must match this regex")
  .option("--body-maxlen <n>", "max body length", count)
  .option("--body-minlen <n>", "min body length", count)
  .option("--separator <text>", "text written after each issue")
  .option("-v, --verbose", "log pipeline details to stderr")
  .action((flags: CliFlags) => {
    let opts: LintOptions;
    try {
      opts = resolveOptions(flags);
    } catch (e) {
      if (!(e instanceof PushlintError)) throw e;
      console.error(`pushlint: ${e.message}`);
      process.exitCode = EXIT_FATAL;
      return;
    }
    const outcome = runLint(opts, {
      sink: fdSink(1),
      log: opts.verbose ? (m) => console.error(m) : undefined,
    });
    if (!outcome.ok) {
      console.error(`pushlint: ${outcome.error.message}`);
      process.exitCode = EXIT_FATAL;
      return;
    }
    process.exitCode = outcome.issues.length ? EXIT_ISSUES : EXIT_OK;
  });

program
  .command("install-hooks")
  .description("Install commit-msg and pre-push hooks that run pushlint")
  .option("--path <dir>", "path to the git repository", ".")
  .option("--force", "overwrite existing hooks")
  .action((opts: { path: string; force?: boolean }) => {
    try {
      for (const r of installHooks(gitHooksDir(opts.path), { force: opts.force })) {
        console.log(`hook ${r.status}: ${r.name}${r.status === "skipped" ? " (exists, use --force)" : ""}`);
      }
    } catch (e) {
      console.error(`pushlint: ${errorMessage(e).trim()}`);
      process.exitCode = EXIT_FATAL;
    }
  });

program.parseAsync(process.argv).catch((e) => {
  console.error("pushlint: fatal", e);
  process.exit(EXIT_FATAL);
});
