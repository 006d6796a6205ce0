import type { Author, CommitRecord } from "./types.js";

export const SHORT_ID_LENGTH = 7;

export class Commit {
  readonly hash: string;
  readonly message: string;
  readonly date: Date;
  readonly numParents: number;
  readonly author: Readonly<Author>;

  constructor(record: CommitRecord) {
    if (record.hash.length < SHORT_ID_LENGTH) {
      throw new RangeError(`commit hash '${record.hash}' is shorter than ${SHORT_ID_LENGTH} characters`);
    }
    this.hash = record.hash;
    this.message = record.message;
    this.date = new Date(record.date.getTime());
    this.numParents = record.numParents;
    this.author = Object.freeze({ name: record.author.name, email: record.author.email });
    Object.freeze(this);
  }

  shortId(): string {
    return this.hash.slice(0, SHORT_ID_LENGTH);
  }

  subject(): string {
    return this.message.split("\n")[0] ?? "";
  }

  // Everything after the first blank line. Paragraph breaks inside the body are dropped.
  body(): string {
    const parts = this.message.split("\n\n");
    return parts.length > 1 ? parts.slice(1).join("") : "";
  }

  copy(): Commit {
    return new Commit(this);
  }
}
