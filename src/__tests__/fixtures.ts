import { Commit } from "../commit.js";
import type { Commits, CommitRecord, Repository, Sink } from "../types.js";

export function makeCommit(overrides: Partial<CommitRecord> = {}): Commit {
  return new Commit({
    hash: "18045269d8d2fd8f53d01883c6c7b548d0b9e3ae",
    message: "first commit",
    date: new Date("2024-03-10T12:00:00Z"),
    numParents: 1,
    author: { name: "Test User", email: "test@example.com" },
    ...overrides,
  });
}

// 40-char hash whose first seven characters are `prefix` padded with zeros
export function hashOf(prefix: string): string {
  return prefix.padEnd(40, "0");
}

export class CountingSource implements Commits {
  calls = 0;
  constructor(private readonly items: Commit[]) {}
  commits(): Commit[] {
    this.calls++;
    return [...this.items];
  }
}

export class FakeRepository implements Repository {
  logCalls: string[] = [];
  constructor(
    private readonly records: CommitRecord[],
    private readonly headHash: string | Error = records[0]?.hash ?? new Error("reference not found"),
  ) {}
  head(): string {
    if (this.headHash instanceof Error) throw this.headHash;
    return this.headHash;
  }
  log(from: string): CommitRecord[] {
    this.logCalls.push(from);
    return this.records;
  }
}

export function memorySink(): Sink & { text: string; writes: number } {
  return {
    text: "",
    writes: 0,
    write(t: string) {
      this.text += t;
      this.writes++;
    },
  };
}
