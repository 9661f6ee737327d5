/**
 * Best-effort extraction of dotted table identifiers from SQL and Liquid text.
 *
 * Identifiers are returned exactly as written: 3-part `project.dataset.table`,
 * 2-part `dataset.table` or a bare `table`. Nothing here ever adds a project
 * or dataset prefix.
 */

interface TablePattern {
  regex: RegExp;
  /** Capture groups joined with dots to form the identifier. */
  groups: number;
}

// Liquid conditionals, with or without whitespace-control dashes.
const LIQUID_IF_BLOCK = /\{%-?\s*if\b[^%]*-?%\}[\s\S]*?\{%-?\s*endif\s*-?%\}/gi;
// Fallback for truncated captures: an opening tag and the text up to the next brace.
const LIQUID_IF_PARTIAL = /\{%-?\s*if\b[^}]+\}[^{]+/gi;

const LIQUID_PATTERNS: TablePattern[] = [
  { regex: /`([^`\s]+\.[^`\s]+\.[^`\s]+)`/g, groups: 1 },
  { regex: /`([^`\s]+\.[^`\s]+)`/g, groups: 1 },
  { regex: /\b(?:FROM|JOIN)\s+`?([\w-]+\.[\w-]+\.[\w*-]+)`?(?![\w*.-])/gi, groups: 1 },
  { regex: /\b(?:FROM|JOIN)\s+`?([\w-]+\.[\w*-]+)`?(?![\w*.-])/gi, groups: 1 },
];

const SQL_PATTERNS: TablePattern[] = [
  // `project-name`.dataset.table
  { regex: /`([^`\s]+)`\s*\.\s*([\w-]+)\.([\w*-]+)/g, groups: 3 },
  // `project`.`dataset`.`table`
  { regex: /`([^`.\s]+)`\s*\.\s*`([^`.\s]+)`\s*\.\s*`([^`.\s]+)`/g, groups: 3 },
  // `project.dataset.table` and `dataset.table`
  { regex: /`([^`\s]+\.[^`\s]+\.[^`\s]+)`/g, groups: 1 },
  { regex: /`([^`\s]+\.[^`\s]+)`/g, groups: 1 },
  // FROM/JOIN project.dataset.table [AS] [alias]
  { regex: /\b(?:FROM|JOIN)\s+([\w-]+\.[\w-]+\.[\w*-]+)(?![\w*.-])/gi, groups: 1 },
  // FROM/JOIN dataset.table [AS] [alias]
  { regex: /\b(?:FROM|JOIN)\s+([\w-]+\.[\w*-]+)(?![\w*.-])/gi, groups: 1 },
  // FROM/JOIN `table_reference`
  { regex: /\b(?:FROM|JOIN)\s+`([^`\s]+)`(?!\s*\.)/gi, groups: 1 },
  // UNNEST((SELECT ... FROM project.dataset.table))
  { regex: /\bUNNEST\(\(SELECT .*? FROM\s+`?([^`\s(){}$,;]+\.[^`\s(){}$,;]+\.[^`\s(){}$,;]+)`?/gi, groups: 1 },
  { regex: /\bUNNEST\(\(SELECT .*? FROM\s+`?([^`\s(){}$,;]+\.[^`\s(){}$,;]+)`?/gi, groups: 1 },
  // WITH cte AS (... FROM project.dataset.table
  { regex: /\bWITH\s+\w+\s+AS\s*\(.*?FROM\s+`?([^`\s(){}$,;]+\.[^`\s(){}$,;]+\.[^`\s(){}$,;]+)`?/gi, groups: 1 },
  { regex: /\bWITH\s+\w+\s+AS\s*\(.*?FROM\s+`?([^`\s(){}$,;]+\.[^`\s(){}$,;]+)`?/gi, groups: 1 },
];

const DIRECT_THREE_PART = /^`?([\w-]+)`?\s*\.\s*`?([\w-]+)`?\s*\.\s*`?([\w*-]+)`?$/;
const DIRECT_TWO_PART = /^`?([\w-]+)`?\s*\.\s*`?([\w*-]+)`?$/;

/**
 * Strips double quotes, turns SQL comments into whitespace and collapses
 * whitespace runs. Applying it twice gives the same text as applying it once.
 */
export function normalizeSql(text: string): string {
  return text
    .replace(/"/g, '')
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/--[^\n]*/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function collect(text: string, patterns: readonly TablePattern[], into: string[]): void {
  for (const { regex, groups } of patterns) {
    for (const match of text.matchAll(regex)) {
      const parts = match.slice(1, groups + 1);
      if (parts.some((part) => !part)) {
        continue;
      }
      const identifier = parts.join('.');
      if (!into.includes(identifier)) {
        into.push(identifier);
      }
    }
  }
}

/** Table identifiers found inside `{% if %}` regions, every branch included. */
export function extractLiquidTableRefs(text: string): string[] {
  const normalized = normalizeSql(text);
  let regions = Array.from(normalized.matchAll(LIQUID_IF_BLOCK), (match) => match[0]);
  if (regions.length === 0) {
    regions = Array.from(normalized.matchAll(LIQUID_IF_PARTIAL), (match) => match[0]);
  }

  const tables: string[] = [];
  for (const region of regions) {
    collect(region, LIQUID_PATTERNS, tables);
  }
  return tables;
}

export function extractSqlTableRefs(text: string): string[] {
  const tables: string[] = [];
  collect(normalizeSql(text), SQL_PATTERNS, tables);
  return tables;
}

/** `x_streaming` → `x`, `x_20230101` → `x`; unchanged otherwise. */
export function baseTableForm(identifier: string): string {
  return identifier.replace(/_streaming$/, '').replace(/_\d{8}$/, '');
}

/**
 * Union of the Liquid and plain SQL passes in first-seen order, followed by
 * the suffix-stripped base form of every streaming or date-partitioned name.
 */
export function extractTableRefs(sql: string): string[] {
  const tables = extractLiquidTableRefs(sql);
  for (const table of extractSqlTableRefs(sql)) {
    if (!tables.includes(table)) {
      tables.push(table);
    }
  }

  const baseForms: string[] = [];
  for (const table of tables) {
    const base = baseTableForm(table);
    if (base !== table && !tables.includes(base) && !baseForms.includes(base)) {
      baseForms.push(base);
    }
  }
  return [...tables, ...baseForms];
}

/**
 * Reads a `sql_table_name` value that is nothing but a 2- or 3-part table
 * identifier, in any mix of backtick and double quote styles.
 */
export function parseDirectTableName(definition: string): string | undefined {
  const normalized = definition.replace(/"/g, '').trim();

  const wholeQuoted = normalized.match(/^`([^`\s]+)`$/);
  const candidate = wholeQuoted ? wholeQuoted[1] : normalized;

  const threePart = candidate.match(DIRECT_THREE_PART);
  if (threePart) {
    return `${threePart[1]}.${threePart[2]}.${threePart[3]}`;
  }
  const twoPart = candidate.match(DIRECT_TWO_PART);
  if (twoPart) {
    return `${twoPart[1]}.${twoPart[2]}`;
  }
  return undefined;
}

export function tableSegments(identifier: string): string[] {
  return identifier.split('.');
}

export function terminalSegment(identifier: string): string {
  const segments = tableSegments(identifier);
  return segments[segments.length - 1] ?? identifier;
}

export function isCompleteTableName(identifier: string): boolean {
  const segments = tableSegments(identifier);
  return segments.length === 3 && segments.every((segment) => segment.length > 0);
}
