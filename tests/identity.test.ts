import { createHash } from "node:crypto";
import { describe, it, expect } from "vitest";
import { isThreadId, resolveThreadId } from "../src/agent/identity.js";
import { IdentityError } from "../src/errors.js";

describe("resolveThreadId", () => {
  it("is deterministic for the same triple", () => {
    expect(resolveThreadId("db.local", "alice", "shop")).toBe(resolveThreadId("db.local", "alice", "shop"));
  });

  it("hashes the JSON-encoded triple", () => {
    const expected = "thread_" + createHash("sha256").update('["db.local","alice","shop"]').digest("hex");
    expect(resolveThreadId("db.local", "alice", "shop")).toBe(expected);
  });

  it("separates triples that differ in any field", () => {
    const base = resolveThreadId("h", "u", "d");
    expect(resolveThreadId("h2", "u", "d")).not.toBe(base);
    expect(resolveThreadId("h", "u2", "d")).not.toBe(base);
    expect(resolveThreadId("h", "u", "d2")).not.toBe(base);
  });

  it("keeps field boundaries unambiguous", () => {
    expect(resolveThreadId("a:b", "c", "d")).not.toBe(resolveThreadId("a", "b:c", "d"));
  });

  it("gives every distinct triple its own id", () => {
    const alphabet = ["a", "b", ":", '"', "[", "]", ",", "\\", " ", "é"];
    let seed = 7;
    const next = () => {
      seed = (seed * 48271) % 2147483647;
      return seed;
    };
    const word = (maxLength: number) =>
      Array.from({ length: next() % (maxLength + 1) }, () => alphabet[next() % alphabet.length]).join("");

    const triples = new Map<string, [string, string, string]>();
    triples.set(JSON.stringify(["", "", "d"]), ["", "", "d"]);
    triples.set(JSON.stringify([":", "", "d"]), [":", "", "d"]);
    triples.set(JSON.stringify(["", ":", "d"]), ["", ":", "d"]);
    while (triples.size < 5000) {
      const triple: [string, string, string] = [word(4), word(4), `d${word(3)}`];
      triples.set(JSON.stringify(triple), triple);
    }

    const ids = [...triples.values()].map(([host, user, database]) => resolveThreadId(host, user, database));

    expect(new Set(ids).size).toBe(triples.size);
  });

  it("rejects an empty or blank database name", () => {
    expect(() => resolveThreadId("h", "u", "")).toThrow(IdentityError);
    expect(() => resolveThreadId("h", "u", "   ")).toThrow(IdentityError);
  });

  it("produces ids that isThreadId accepts", () => {
    expect(isThreadId(resolveThreadId("h", "u", "d"))).toBe(true);
    expect(isThreadId("thread_xyz")).toBe(false);
  });
});
