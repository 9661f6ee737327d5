// Single-word LookML parameters such as `from: users`.
export function readWordParameter(text: string, parameter: string): string | undefined {
  const match = text.match(new RegExp(String.raw`\b${parameter}:\s+(\w+)`));
  return match?.[1];
}

export function readFromTarget(text: string): string | undefined {
  return readWordParameter(text, 'from');
}

/** Bodies of every `sql:` clause (not `sql_on:` and friends) up to their `;;`. */
export function readSqlClauses(text: string): string[] {
  return Array.from(text.matchAll(/\bsql:\s*([\s\S]*?);;/g), (match) => match[1]);
}
