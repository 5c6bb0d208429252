import { describe, it, expect } from "vitest";
import { QueryHistory, closeDB, type QueryHistoryEntry } from "../src/db/index.js";
import { memoryStores } from "./helpers.js";

function entry(overrides: Partial<QueryHistoryEntry> = {}): QueryHistoryEntry {
  return {
    threadId: "thread_test",
    messageId: "msg-1",
    sqlText: "SELECT 1",
    executionMs: 2.4,
    rowsAffected: 1,
    success: true,
    errorMessage: null,
    ...overrides,
  };
}

describe("QueryHistory", () => {
  it("records attempts in order", () => {
    const { stores, clock } = memoryStores();
    stores.history.record(entry({ sqlText: "SELECT bad", success: false, rowsAffected: 0, errorMessage: "no such column: bad" }));
    stores.history.record(entry({ sqlText: "SELECT 1" }));

    const rows = stores.history.list("thread_test");
    expect(rows.map((r) => [r.sqlText, r.success, r.errorMessage])).toEqual([
      ["SELECT bad", false, "no such column: bad"],
      ["SELECT 1", true, null],
    ]);
    expect(rows[1].executionMs).toBe(2);
    expect(rows[1].executedAt).toBe(clock.now());
  });

  it("caps the listing to the most recent entries", () => {
    const { stores } = memoryStores();
    for (let i = 1; i <= 5; i++) {
      stores.history.record(entry({ sqlText: `SELECT ${i}` }));
    }
    expect(stores.history.list("thread_test", 2).map((r) => r.sqlText)).toEqual(["SELECT 4", "SELECT 5"]);
  });

  it("does not require a live session", () => {
    const { stores } = memoryStores();
    expect(stores.history.record(entry({ threadId: "thread_gone" }))).toBe(true);
  });

  it("swallows write failures and reports them", () => {
    const { db } = memoryStores();
    const history = new QueryHistory(db);
    closeDB(db);

    expect(history.record(entry())).toBe(false);
  });
});
