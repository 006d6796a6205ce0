import type { Commit } from "./commit.js";

export type Author = {
  name: string;
  email: string;
};

// Shape of one history entry as handed over by a repository reader.
export type CommitRecord = {
  hash: string;
  message: string;
  date: Date;
  numParents: number;
  author: Author;
};

export interface Commits {
  /** Produces a fresh, ordered sequence on every call. */
  commits(): Commit[];
}

export type Filter = (commit: Commit) => boolean;

export type Issue = {
  readonly desc: string;
  readonly commit: Commit;
};

export interface Rule {
  name: string;
  check(commit: Commit): Issue | undefined;
}

export interface Repository {
  /** Full hash of the commit HEAD points at. */
  head(): string;
  /** Linear history reachable from `from`, newest first. */
  log(from: string): CommitRecord[];
}

export type MessageReader = () => Uint8Array | string;

export interface Sink {
  write(text: string): void;
}
