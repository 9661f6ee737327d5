import { blockBody, findBlocks, stripCommentLines } from './block_scanner';
import type { AnalysisWarning, SourceDefinition, SourceFile } from './types';

export interface SourceDefinitionScan {
  definitions: ReadonlyMap<string, SourceDefinition>;
  warnings: AnalysisWarning[];
}

const SQL_TABLE_NAME = /\bsql_table_name\s*:\s*([\s\S]*?);;/;
const SQL_TABLE_NAME_SINGLE = /\bsql_table_name\s*:\s*([^;]+);/;
const EXPLORE_SOURCE = /\bexplore_source\s*:\s*(\w+)/;

// `;;` is canonical; the rest are older or hand-written terminators.
const DERIVED_SQL_CLAUSES = [
  /\bsql\s*:\s*([\s\S]*?);;/,
  /\bsql\s*:\s*\{\{\{([^}]+)\}\}\}/,
  /\bsql\s*:\s*"""([\s\S]+?)"""/,
  /\bsql\s*:\s*\{([\s\S]+?)\}/,
  /\bsql\s*:\s*"([^"]+)"/,
];

const NO_DEFINITION = 'No sql_table_name or derived_table found';

function matchDerivedSql(text: string): string | undefined {
  for (const clause of DERIVED_SQL_CLAUSES) {
    const match = text.match(clause);
    if (match?.[1] !== undefined) {
      return match[1].trim();
    }
  }
  return undefined;
}

function fromDerivedText(text: string): SourceDefinition | undefined {
  const exploreSource = text.match(EXPLORE_SOURCE);
  if (exploreSource) {
    return {
      kind: 'explore_source',
      definition: `explore_source: ${exploreSource[1]}`,
      exploreName: exploreSource[1],
    };
  }

  const sql = matchDerivedSql(text);
  if (sql !== undefined) {
    return { kind: 'derived_table_sql', definition: sql };
  }
  return undefined;
}

/**
 * Classifies the defining clause of one view. `viewBody` must already have its
 * comment lines stripped.
 */
export function classifyDefiningClause(
  viewBody: string,
  viewName: string,
  filePath?: string
): { definition: SourceDefinition; warnings: AnalysisWarning[] } {
  const warnings: AnalysisWarning[] = [];

  const tableName = viewBody.match(SQL_TABLE_NAME) ?? viewBody.match(SQL_TABLE_NAME_SINGLE);
  if (tableName) {
    return { definition: { kind: 'sql_table_name', definition: tableName[1].trim() }, warnings };
  }

  const { blocks, unterminated } = findBlocks(viewBody, 'derived_table');
  const [derivedTable] = blocks;
  if (derivedTable) {
    const definition = fromDerivedText(blockBody(viewBody, derivedTable));
    if (definition) {
      return { definition, warnings };
    }
    return { definition: { kind: 'unknown', definition: 'derived_table without sql or explore_source' }, warnings };
  }

  const [truncated] = unterminated;
  if (truncated) {
    warnings.push({
      code: 'BlockUnterminated',
      message: `derived_table in view ${viewName} has no closing brace`,
      filePath,
      name: viewName,
    });
    // The closing brace is missing, so read up to the first `;;` after the header instead.
    const tail = viewBody.slice(truncated.headerStart);
    const terminator = tail.indexOf(';;');
    const definition = fromDerivedText(terminator === -1 ? tail : tail.slice(0, terminator + 2));
    if (definition) {
      return { definition, warnings };
    }
  }

  return { definition: { kind: 'unknown', definition: NO_DEFINITION }, warnings };
}

/**
 * Pulls the defining clause of every view declared in the view files. When a
 * view is declared more than once, the first definition that is not `unknown`
 * wins.
 */
export function extractSourceDefinitions(viewFiles: readonly SourceFile[]): SourceDefinitionScan {
  const definitions = new Map<string, SourceDefinition>();
  const warnings: AnalysisWarning[] = [];

  for (const file of viewFiles) {
    const text = stripCommentLines(file.text);
    const { blocks, unterminated } = findBlocks(text, 'view');

    for (const block of unterminated) {
      warnings.push({
        code: 'BlockUnterminated',
        message: `view ${block.name} has no closing brace`,
        filePath: file.path,
        name: block.name,
      });
    }

    for (const block of blocks) {
      const existing = definitions.get(block.name);
      if (existing && existing.kind !== 'unknown') {
        continue;
      }
      const result = classifyDefiningClause(blockBody(text, block), block.name, file.path);
      warnings.push(...result.warnings);
      if (!existing || result.definition.kind !== 'unknown') {
        definitions.set(block.name, result.definition);
      }
    }
  }

  return { definitions, warnings };
}
