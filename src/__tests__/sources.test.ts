import { describe, it, expect } from "vitest";
import { InRepo, Listed, MsgIn, PLACEHOLDER_HASH } from "../commits.js";
import { InputError, RepositoryError } from "../errors.js";
import { parseLog } from "../git.js";
import { FakeRepository, hashOf, makeCommit } from "./fixtures.js";

const US = "\u001f";
const NUL = "\u0000";

describe("InRepo", () => {
  const records = [
    {
      hash: hashOf("bbbbbbb"),
      message: "second\n",
      date: new Date("2024-03-11T09:00:00Z"),
      numParents: 1,
      author: { name: "Test User", email: "test@example.com" },
    },
    {
      hash: hashOf("aaaaaaa"),
      message: "first\n",
      date: new Date("2024-03-10T09:00:00Z"),
      numParents: 0,
      author: { name: "Test User", email: "test@example.com" },
    },
  ];

  it("walks history from HEAD in repository order", () => {
    const repo = new FakeRepository(records);
    const out = new InRepo(repo).commits();
    expect(repo.logCalls).toEqual([hashOf("bbbbbbb")]);
    expect(out.map((c) => c.subject())).toEqual(["second", "first"]);
    expect(out[1]?.numParents).toBe(0);
  });

  it("propagates repository failures", () => {
    const repo = new FakeRepository([], new RepositoryError("cannot resolve HEAD"));
    expect(() => new InRepo(repo).commits()).toThrow(RepositoryError);
    expect(repo.logCalls).toEqual([]);
  });

  it("reports any reader failure as a RepositoryError", () => {
    const repo = new FakeRepository([], new Error("reference not found"));
    expect(() => new InRepo(repo).commits()).toThrow(RepositoryError);
    let cause: unknown;
    try {
      new InRepo(repo).commits();
    } catch (e) {
      cause = e instanceof RepositoryError ? e.cause : undefined;
    }
    expect(cause).toEqual(new Error("reference not found"));
  });

  it("rejects records without a usable hash", () => {
    const repo = new FakeRepository([{ ...records[0], hash: "abc" }], hashOf("abc"));
    expect(() => new InRepo(repo).commits()).toThrow(RepositoryError);
  });

  it("is re-readable with equal results", () => {
    const src = new InRepo(new FakeRepository(records));
    expect(src.commits()).toEqual(src.commits());
  });
});

describe("MsgIn", () => {
  const now = () => new Date("2024-07-01T10:00:00Z");

  it("wraps the message in a placeholder commit", () => {
    const [c, ...rest] = new MsgIn(() => Buffer.from("feat: add thing\n\nbody text\n"), now).commits();
    expect(rest).toEqual([]);
    expect(c?.hash).toBe(PLACEHOLDER_HASH);
    expect(c?.shortId()).toBe("fakehsh");
    expect(c?.subject()).toBe("feat: add thing");
    expect(c?.body()).toBe("body text\n");
    expect(c?.numParents).toBe(0);
    expect(c?.date.toISOString()).toBe("2024-07-01T10:00:00.000Z");
  });

  it("turns read failures into InputError", () => {
    const src = new MsgIn(() => {
      throw new Error("ENOENT: no such file");
    });
    expect(() => src.commits()).toThrow(InputError);
  });
});

describe("Listed", () => {
  it("hands out a fresh array each call", () => {
    const src = new Listed([makeCommit()]);
    const first = src.commits();
    first.pop();
    expect(src.commits()).toHaveLength(1);
  });
});

describe("parseLog", () => {
  const h1 = hashOf("1111111");
  const h2 = hashOf("2222222");
  const raw =
    [h1, "2024-03-11T10:15:00+02:00", "Jane Roe", "jane@example.com", `${h2} ${hashOf("3333333")}`, "Merge branch 'x'\n"].join(US) +
    NUL +
    [h2, "2024-03-10T08:00:00Z", "John Doe", "john@example.com", "", `fix: a${US}b\n\nbody\n`].join(US) +
    NUL;

  it("reads every record", () => {
    const out = parseLog(raw);
    expect(out).toHaveLength(2);
    expect(out[0]).toEqual({
      hash: h1,
      message: "Merge branch 'x'\n",
      date: new Date("2024-03-11T08:15:00Z"),
      numParents: 2,
      author: { name: "Jane Roe", email: "jane@example.com" },
    });
    expect(out[1]?.numParents).toBe(0);
    expect(out[1]?.message).toBe(`fix: a${US}b\n\nbody\n`);
  });

  it("returns nothing for empty output", () => {
    expect(parseLog("")).toEqual([]);
  });

  it("rejects truncated records", () => {
    expect(() => parseLog(`${h1}${US}2024-03-11T10:15:00Z${NUL}`)).toThrow(RepositoryError);
  });

  it("rejects unreadable dates", () => {
    expect(() => parseLog([h1, "yesterday", "a", "b", "", "msg"].join(US))).toThrow(RepositoryError);
  });
});
