import "dotenv/config";
import * as readline from "node:readline/promises";
import inquirer from "inquirer";
import { loadConfig, type Config } from "./src/config/env.js";
import { logger } from "./src/utils/logger.js";
import { closeDB, createStores, initDB, type Stores } from "./src/db/index.js";
import { ChatSession, type ChatDeps, type TurnResult } from "./src/agent/session.js";
import { formatHealReport } from "./src/agent/executor.js";
import { GatewayGenerator } from "./src/agent/generator.js";
import type { ConnectionIdentity } from "./src/agent/identity.js";
import { MySqlTarget } from "./src/target/mysql.js";
import { SqliteTarget } from "./src/target/sqlite.js";
import type { ExecutionResult, TargetDatabase } from "./src/target/types.js";
import { errorMessage } from "./src/errors.js";
import { ThreadLock } from "./src/utils/threadLock.js";
import { askYesNo } from "./src/utils/ask.js";

/**
 * Main entry point: converse with one relational database at a time
 */

const HELP = `Commands:
  /refresh   re-read the database schema
  /history   show recent messages
  /queries   show recent query attempts
  /purge     wipe this database's chat history
  /exit      quit
Press Ctrl+C while a turn is running to cancel it.`;

function openTarget(config: Config, database: string): TargetDatabase {
  if (config.target.dialect === "sqlite") {
    return new SqliteTarget(database);
  }
  return new MySqlTarget({
    host: config.target.host,
    port: config.target.port,
    user: config.target.user,
    password: config.target.password,
    database,
    poolSize: config.target.poolSize,
  });
}

/**
 * Plain-text table in the style of the mysql client
 */
function formatResult(result: ExecutionResult): string {
  if (result.columns.length === 0) {
    const word = result.rowsAffected === 1 ? "row" : "rows";
    return `Query OK, ${result.rowsAffected} ${word} affected`;
  }
  if (result.rows.length === 0) {
    return "Empty set";
  }

  const cell = (value: ExecutionResult["rows"][number][number]) => (value === null ? "NULL" : String(value));
  const widths = result.columns.map((c, i) =>
    Math.max(c.length, ...result.rows.map((row) => cell(row[i] ?? null).length))
  );
  const sep = "+" + widths.map((w) => "-".repeat(w + 2)).join("+") + "+";
  const line = (values: string[]) => "|" + values.map((v, i) => ` ${v.padEnd(widths[i])} `).join("|") + "|";

  const word = result.rows.length === 1 ? "row" : "rows";
  return [
    sep,
    line(result.columns),
    sep,
    ...result.rows.map((row) => line(row.map((v) => cell(v)))),
    sep,
    `${result.rows.length} ${word} in set`,
  ].join("\n");
}

function printHealReport(turn: TurnResult) {
  const report = formatHealReport(turn.attempts);
  if (report) console.log(`\n${report}`);
}

function confirmDestructive(rl: readline.Interface, sql: string, signal: AbortSignal): Promise<boolean> {
  console.log(`\nThis statement changes or removes data:\n\n${sql}\n`);
  return askYesNo(rl, "Run it?", signal);
}

function printTurn(turn: TurnResult) {
  switch (turn.status) {
    case "succeeded":
      if (turn.assistantMessage) console.log(`\n${turn.assistantMessage.content}`);
      console.log(`\n${turn.sql}\n`);
      if (turn.result) console.log(formatResult(turn.result));
      printHealReport(turn);
      break;
    case "exhausted":
      console.log(`\nQuery failed after ${turn.attempts.length} attempts.`);
      if (turn.sql) console.log(`Last SQL: ${turn.sql}`);
      console.log(`ERROR: ${turn.error}`);
      printHealReport(turn);
      break;
    case "declined":
      console.log(`\nNot run:\n${turn.sql}`);
      break;
    case "answered":
      if (turn.assistantMessage) console.log(`\n${turn.assistantMessage.content}`);
      break;
    case "cancelled":
      console.log("\n(cancelled)");
      break;
  }
  console.log("");
}

/**
 * Show interactive session selector. Only threads for the configured host
 * and user are offered, since those are the credentials we connect with.
 */
async function selectDatabase(stores: Stores, config: Config): Promise<ConnectionIdentity> {
  const sessions = stores.sessions.listFor(config.target.host, config.target.user, 10);

  const choices: Array<{ name: string; value: string }> = [{ name: "Connect to another database", value: "new" }];
  for (const session of sessions) {
    const date = new Date(session.lastActiveAt).toLocaleString();
    const count = stores.messages.count(session.threadId);
    choices.push({
      name: `${session.database} @ ${session.host} (${count} messages, last active ${date})`,
      value: session.threadId,
    });
  }

  if (config.target.database && sessions.length === 0) {
    return { host: config.target.host, user: config.target.user, database: config.target.database };
  }

  const { threadId } = await inquirer.prompt<{ threadId: string }>([
    { type: "list", name: "threadId", message: "Select a database:", choices },
  ]);

  const existing = sessions.find((s) => s.threadId === threadId);
  if (existing) {
    return { host: existing.host, user: existing.user, database: existing.database };
  }

  const { database } = await inquirer.prompt<{ database: string }>([
    {
      type: "input",
      name: "database",
      message: config.target.dialect === "sqlite" ? "SQLite file path:" : "Database name:",
      default: config.target.database,
      validate: (value: string) => value.trim().length > 0 || "A database name is required",
    },
  ]);

  return { host: config.target.host, user: config.target.user, database: database.trim() };
}

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  const db = initDB(config.dbPath);
  const stores = createStores(db);

  const identity = await selectDatabase(stores, config);
  const target = openTarget(config, identity.database);

  const deps: ChatDeps = {
    ...stores,
    generator: new GatewayGenerator({ apiKey: config.apiKey, model: config.model }),
    target,
    lock: new ThreadLock(),
  };

  const chat = ChatSession.open(deps, {
    maxRetries: config.executor.maxRetries,
    generationTimeoutMs: config.executor.generationTimeoutMs,
    executionTimeoutMs: config.executor.executionTimeoutMs,
    windowSize: config.memory.windowSize,
    keepTail: config.memory.keepTail,
    maxSummaryLength: config.memory.maxSummaryLength,
    schemaMaxAgeMs: config.schemaMaxAgeMs,
  }, identity);

  const state = chat.getState();
  console.log(`\nConnected to ${identity.database} (${state.messageCount} messages in this thread)`);
  console.log(HELP + "\n");

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let inFlight: AbortController | null = null;
  rl.on("SIGINT", () => {
    if (inFlight) {
      inFlight.abort();
    } else {
      rl.close();
    }
  });

  try {
    for (;;) {
      let input: string;
      try {
        input = (await rl.question("> ")).trim();
      } catch {
        // readline closed (Ctrl+C / Ctrl+D at the prompt)
        break;
      }
      if (!input) continue;

      if (input === "/exit" || input === "/quit") break;

      if (input === "/help") {
        console.log(HELP);
        continue;
      }

      if (input === "/refresh") {
        try {
          const cached = await chat.refreshSchema();
          console.log(`Schema refreshed: ${cached.tableCount} tables`);
        } catch (error) {
          console.log(`Schema refresh failed: ${errorMessage(error)}`);
        }
        continue;
      }

      if (input === "/history") {
        for (const msg of chat.history(20)) {
          console.log(`#${msg.sequenceNo} [${msg.role}] ${msg.content}${msg.sqlText ? `\n    ${msg.sqlText}` : ""}`);
        }
        continue;
      }

      if (input === "/queries") {
        for (const q of chat.queries(20)) {
          const status = q.success ? "ok" : `error: ${q.errorMessage}`;
          console.log(`${new Date(q.executedAt).toLocaleTimeString()} ${q.executionMs}ms ${status}\n    ${q.sqlText}`);
        }
        continue;
      }

      if (input === "/purge") {
        if (await askYesNo(rl, `Delete all chat history for ${identity.database}?`)) {
          await chat.purge();
          console.log("History purged.");
        }
        continue;
      }

      const controller = new AbortController();
      inFlight = controller;
      try {
        const turn = await chat.send(input, {
          signal: controller.signal,
          confirm: (sql) => confirmDestructive(rl, sql, controller.signal),
        });
        printTurn(turn);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Turn failed");
        console.log(`\nError: ${errorMessage(error)}\n`);
      } finally {
        inFlight = null;
      }
    }
  } finally {
    rl.close();
    await target.close();
    closeDB(db);
  }
}

main().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, "Fatal error");
  process.exit(1);
});
