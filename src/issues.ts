import type { Commit } from "./commit.js";
import type { Commits, Issue, Rule } from "./types.js";

export function createIssue(desc: string, commit: Commit): Issue {
  if (!desc) throw new RangeError("an issue needs a description");
  return Object.freeze({ desc, commit: commit.copy() });
}

/**
 * Applies every rule to every commit, in commit-then-rule order.
 * A commit may produce one issue per rule; nothing is deduplicated.
 */
export function collected(rules: readonly Rule[], source: Commits): Issue[] {
  const issues: Issue[] = [];
  for (const c of source.commits()) {
    for (const r of rules) {
      const issue = r.check(c);
      if (issue?.desc) issues.push(issue);
    }
  }
  return issues;
}
