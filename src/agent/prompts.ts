import type { Message } from "../db/messages.js";
import type { SchemaSnapshot } from "../target/types.js";

/**
 * System prompt for the SQL-writing model
 */
export function sqlWriterSystemPrompt(dialect: "mysql" | "sqlite", database: string): string {
  const flavour = dialect === "mysql" ? "MySQL" : "SQLite";
  return `You are a database assistant connected to the ${flavour} database \`${database}\`.

When the user asks for something the database can answer or change:
1. Write one short sentence saying what you will do
2. Put exactly ONE ${flavour} statement in a \`\`\`sql block
3. Use only tables and columns that appear in the schema

When the user asks a general question that needs no query, answer in plain text without a sql block.

Never invent table or column names. Prefer explicit column lists over SELECT * for wide tables.`;
}

/**
 * Extra context handed to generation after a failed attempt. The database
 * error goes in verbatim.
 */
export function buildCorrectionContext(failedSql: string, errorMessage: string): string {
  return `## Previous Attempt Failed

The following SQL failed:

\`\`\`sql
${failedSql}
\`\`\`

Database error:
${errorMessage}

Read the error, check the schema for correct names, and reply with the CORRECTED statement in a \`\`\`sql block preceded by one line describing the fix. Keep the query's intent identical; only fix the error.`;
}

const ROLE_LABELS: Record<Message["role"], string> = {
  user: "User",
  assistant: "Assistant",
  system: "System",
  tool: "Tool",
};

const MAX_FOLDED_MESSAGE_CHARS = 2000;

/**
 * One transcript line per message, with extracted SQL appended
 */
export function formatTranscript(messages: Message[], maxChars?: number): string {
  return messages
    .map((msg) => {
      let text = msg.content.trim();
      if (maxChars !== undefined && text.length > maxChars) {
        text = text.substring(0, maxChars) + "...[truncated]";
      }
      if (msg.sqlText) {
        text += `\n[SQL: ${msg.sqlText.trim()}]`;
      }
      return `${ROLE_LABELS[msg.role]}: ${text}`;
    })
    .join("\n");
}

/**
 * Build the compaction prompt with structured template
 */
export function buildCompactionPrompt(existingSummary: string | undefined, messages: Message[]): string {
  const hasExistingSummary = existingSummary !== undefined && existingSummary.trim().length > 0;

  let prompt = `You are compacting the history of a conversation about a relational database to save context space. `;

  if (hasExistingSummary) {
    prompt += `There is an existing summary from previous compactions, and new messages that need to be merged into it.\n\n`;
    prompt += `## Existing Summary\n\n${existingSummary}\n\n`;
  } else {
    prompt += `This is the first compaction.\n\n`;
  }

  prompt += `## Messages to Compact\n\n`;
  prompt += formatTranscript(messages, MAX_FOLDED_MESSAGE_CHARS);

  prompt += `\n\n## Task

Create a NEW summary that ${hasExistingSummary ? "MERGES the existing summary with the new messages" : "summarizes all the messages"}. Use this structure:

# Goal
[What the user is trying to learn or change in the database]

# Tables and Columns Discussed
[Names the user worked with, with any meaning they clarified]

# Queries and Results
[Important statements run and what they returned or changed]

# Facts / Constraints
[Data facts, business rules, preferences the user stated]

# Open Questions
[Unresolved requests or pending decisions]

RULES:
1. Keep it dense; preserve table names, column names, numbers and SQL fragments exactly
2. ${hasExistingSummary ? "Do not drop facts from the existing summary unless the new messages contradict them" : "Extract the key information from the messages"}
3. Write "None" for empty sections
4. Output only the summary, no preamble

Generate the summary now:`;

  return prompt;
}

/**
 * Compact text rendering of a schema snapshot for prompts
 */
export function formatSchemaForPrompt(snapshot: SchemaSnapshot): string {
  if (snapshot.tables.length === 0) {
    return `Database ${snapshot.database} has no tables.`;
  }

  const lines = [`Database ${snapshot.database} (${snapshot.tables.length} tables)`];
  for (const table of snapshot.tables) {
    const columns = table.columns.map((c) => {
      let def = `${c.name} ${c.type}`;
      if (c.primaryKey) def += " PK";
      else if (!c.nullable) def += " NOT NULL";
      return def;
    });
    lines.push(`table ${table.name}(${columns.join(", ")})`);
    for (const fk of table.foreignKeys) {
      lines.push(`  ${table.name}.${fk.column} -> ${fk.referencedTable}.${fk.referencedColumn}`);
    }
  }
  if (snapshot.views.length > 0) {
    lines.push(`views: ${snapshot.views.join(", ")}`);
  }
  return lines.join("\n");
}

const SQL_START =
  /^(SELECT|INSERT|UPDATE|DELETE|REPLACE|CREATE|DROP|ALTER|TRUNCATE|SHOW|DESCRIBE|DESC|EXPLAIN|WITH|USE|PRAGMA)\b/i;

/**
 * Remove chain-of-thought blocks some models emit
 */
export function stripThinking(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/g, "").trim();
}

/**
 * Pull the statement out of a model reply: the first ```sql block, else a
 * bare fenced block or a whole reply that reads as SQL. Null when the reply
 * carries no statement.
 */
export function extractSql(reply: string): string | null {
  const text = stripThinking(reply);

  const tagged = text.match(/```sql\s*([\s\S]*?)```/i);
  if (tagged) {
    const sql = tagged[1].trim();
    return sql.length > 0 ? sql : null;
  }

  const bare = text.match(/```\s*\n([\s\S]*?)```/);
  if (bare && SQL_START.test(bare[1].trim())) {
    return bare[1].trim();
  }

  if (SQL_START.test(text) && !text.includes("\n\n")) {
    return text;
  }

  return null;
}

/**
 * The prose around the statement, for the assistant message body
 */
export function explanationText(reply: string): string {
  return stripThinking(reply)
    .replace(/```[a-z]*\s*[\s\S]*?```/gi, "")
    .trim();
}

const DESTRUCTIVE_KEYWORDS = new Set(["DELETE", "DROP", "TRUNCATE", "UPDATE"]);

/**
 * Whether a statement deletes or rewrites data, judged by its leading keyword
 * once comments are skipped
 */
export function isDestructive(sql: string): boolean {
  const body = sql.replace(/^(?:\s+|--[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/)+/, "");
  const keyword = body.match(/^[A-Za-z]+/);
  return keyword !== null && DESTRUCTIVE_KEYWORDS.has(keyword[0].toUpperCase());
}
