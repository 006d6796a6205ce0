import { Commit } from "./commit.js";
import { InputError, PushlintError, RepositoryError, errorMessage } from "./errors.js";
import type { Commits, Filter, MessageReader, Repository } from "./types.js";

export const PLACEHOLDER_HASH = "fakehsh";

/** History reachable from the repository's HEAD, newest first. */
export class InRepo implements Commits {
  constructor(private readonly repository: Repository) {}

  commits(): Commit[] {
    try {
      const head = this.repository.head();
      return this.repository.log(head).map((r) => new Commit(r));
    } catch (e) {
      if (e instanceof PushlintError) throw e;
      throw new RepositoryError(`cannot read history: ${errorMessage(e)}`, { cause: e });
    }
  }
}

/**
 * A single synthetic commit wrapping a message that has not been committed yet
 * (e.g. the file handed to a commit-msg hook).
 */
export class MsgIn implements Commits {
  constructor(
    private readonly read: MessageReader,
    private readonly now: () => Date = () => new Date(),
  ) {}

  commits(): Commit[] {
    let raw: Uint8Array | string;
    try {
      raw = this.read();
    } catch (e) {
      throw new InputError(`failed to read commit message: ${errorMessage(e)}`, { cause: e });
    }
    const message = typeof raw === "string" ? raw : new TextDecoder("utf-8").decode(raw);
    return [
      new Commit({
        hash: PLACEHOLDER_HASH,
        message,
        date: this.now(),
        numParents: 0,
        author: { name: "", email: "" },
      }),
    ];
  }
}

export class Listed implements Commits {
  private readonly items: readonly Commit[];

  constructor(items: readonly Commit[]) {
    this.items = [...items];
  }

  commits(): Commit[] {
    return [...this.items];
  }
}

/** Keeps the upstream commits accepted by `filter`, in upstream order. */
export class Filtered implements Commits {
  constructor(
    private readonly upstream: Commits,
    private readonly filter: Filter,
  ) {}

  commits(): Commit[] {
    return this.upstream.commits().filter((c) => this.filter(c));
  }
}
