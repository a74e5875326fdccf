/**
 * Splits a SQL script into executable statements.
 *
 * Lines are trimmed; blank lines and `--` comment lines are dropped. A statement
 * ends at a line ending in `;`, except inside `CREATE TRIGGER ... BEGIN ... END;`
 * where only the `END;` line closes it. Trailing text without a terminator is
 * emitted with `;` appended.
 */
export function splitSqlStatements(sql: string): string[] {
  const lines = sql
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("--"));

  const statements: string[] = [];
  let buffer: string[] = [];
  let inTrigger = false;

  const flush = () => {
    statements.push(buffer.join("\n"));
    buffer = [];
  };

  for (const line of lines) {
    const upper = line.toUpperCase();
    if (!inTrigger && upper.startsWith("CREATE TRIGGER")) {
      inTrigger = true;
    }

    buffer.push(line);

    if (inTrigger) {
      if (upper === "END;" || upper.endsWith(" END;")) {
        flush();
        inTrigger = false;
      }
      continue;
    }

    if (line.endsWith(";")) {
      flush();
    }
  }

  const tail = buffer.join("\n").trim();
  if (tail.length > 0) {
    statements.push(tail.endsWith(";") ? tail : `${tail};`);
  }

  return statements;
}
