import { execFileSync } from "node:child_process";
import path from "node:path";
import { RepositoryError, errorMessage } from "./errors.js";
import type { CommitRecord, Repository } from "./types.js";

const FIELD_SEP = "\u001f";
const RECORD_SEP = "\u0000";
// hash, author date (strict ISO), author name, author email, parent hashes, raw message
const LOG_FORMAT = ["%H", "%aI", "%an", "%ae", "%P", "%B"].join("%x1f");

export function git(args: string[], opts?: { cwd?: string }) {
  return execFileSync("git", args, {
    stdio: "pipe",
    encoding: "utf8",
    cwd: opts?.cwd,
    maxBuffer: 512 * 1024 * 1024,
  });
}

export function gitHooksDir(cwd = ".") {
  // --git-path answers relative to cwd and honours core.hooksPath
  return path.resolve(cwd, git(["rev-parse", "--git-path", "hooks"], { cwd }).trim());
}

export function parseLog(raw: string): CommitRecord[] {
  const out: CommitRecord[] = [];
  for (const chunk of raw.split(RECORD_SEP)) {
    const rec = chunk.replace(/^\n/, "");
    if (!rec) continue;
    const [hash, iso, name, email, parents, ...rest] = rec.split(FIELD_SEP);
    if (!hash || iso === undefined || name === undefined || email === undefined || parents === undefined || rest.length === 0) {
      throw new RepositoryError(`malformed git log record: ${JSON.stringify(rec.slice(0, 80))}`);
    }
    const date = new Date(iso);
    if (Number.isNaN(date.getTime())) {
      throw new RepositoryError(`malformed author date '${iso}' on commit ${hash}`);
    }
    out.push({
      hash,
      message: rest.join(FIELD_SEP),
      date,
      numParents: parents.split(" ").filter(Boolean).length,
      author: { name, email },
    });
  }
  return out;
}

/** Reads history through the `git` executable found on PATH. */
export class GitRepository implements Repository {
  constructor(readonly cwd: string) {}

  head(): string {
    try {
      return git(["rev-parse", "--verify", "HEAD"], { cwd: this.cwd }).trim();
    } catch (e) {
      throw new RepositoryError(`cannot resolve HEAD in ${this.cwd}: ${errorMessage(e).trim()}`, { cause: e });
    }
  }

  log(from: string): CommitRecord[] {
    let raw: string;
    try {
      raw = git(["log", "-z", `--format=${LOG_FORMAT}`, from, "--"], { cwd: this.cwd });
    } catch (e) {
      throw new RepositoryError(`cannot walk history from ${from}: ${errorMessage(e).trim()}`, { cause: e });
    }
    return parseLog(raw);
  }
}
