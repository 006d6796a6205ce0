import fs from "node:fs";
import { OutputError, PushlintError, errorMessage } from "./errors.js";
import type { Issue, Sink } from "./types.js";

/** Writes `<shortId>: <desc><separator>` per issue. The separator also follows the last one. */
export function printed(sink: Sink, separator: string, issues: readonly Issue[]) {
  // every line is rendered before the first write
  const lines = issues.map((i) => `${i.commit.shortId()}: ${i.desc}${separator}`);
  for (const line of lines) {
    try {
      sink.write(line);
    } catch (e) {
      if (e instanceof PushlintError) throw e;
      throw new OutputError(`failed to write report: ${errorMessage(e)}`, { cause: e });
    }
  }
}

export function fdSink(fd: number): Sink {
  return {
    write(text) {
      fs.writeSync(fd, text);
    },
  };
}
