import { createHash } from "node:crypto";
import { IdentityError } from "../errors.js";

export type ThreadId = string;

export interface ConnectionIdentity {
  host: string;
  user: string;
  database: string;
}

const THREAD_PREFIX = "thread_";

/**
 * Derive the stable thread id for a (host, user, database) triple.
 *
 * The triple is encoded as a JSON array before hashing so field boundaries
 * stay unambiguous: `("a:b", "c")` and `("a", "b:c")` hash differently.
 */
export function resolveThreadId(host: string, user: string, database: string): ThreadId {
  if (database.trim().length === 0) {
    throw new IdentityError("Database name must not be empty");
  }
  const digest = createHash("sha256").update(JSON.stringify([host, user, database])).digest("hex");
  return `${THREAD_PREFIX}${digest}`;
}

export function isThreadId(value: string): boolean {
  return /^thread_[0-9a-f]{64}$/.test(value);
}
