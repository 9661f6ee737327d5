import type { Logger } from '../utils/logger';
import {
  extractTableRefs,
  isCompleteTableName,
  parseDirectTableName,
  tableSegments,
  terminalSegment,
} from './table_references';
import {
  hasTables,
  type CitationType,
  type ProjectSettings,
  type SourceDefinition,
  type TieBreakRule,
  type View,
  type ViewRegistry,
} from './types';

export interface ClassificationInput {
  /** The view as it stands after the first alias pass. */
  view: View;
  definition?: SourceDefinition;
  unnestViews: ReadonlySet<string>;
  /** Views classified so far; `parent__child` views look their parent up here. */
  registry: ViewRegistry;
  settings: ProjectSettings;
}

export interface PrimaryTableChoice {
  primaryTable: string;
  additionalTables: string[];
  tieBreak?: TieBreakRule;
  /** Set when name matching and the shortest-name rule pick different tables. */
  disagreement?: { nameMatch: string; shortest: string };
}

const MODEL_PREFIX = /^(?:fact_|dim_)/;
const NESTED_SEPARATOR = '__';

function stripModelPrefix(name: string): string {
  return name.toLowerCase().replace(MODEL_PREFIX, '');
}

function isSelfReferential(candidate: string): boolean {
  const segments = tableSegments(candidate);
  return segments.length === 3 && segments[0] === segments[2];
}

function namesOverlap(viewName: string, candidate: string): boolean {
  const view = stripModelPrefix(viewName);
  const table = stripModelPrefix(terminalSegment(candidate));
  if (!view || !table) {
    return false;
  }
  return table.includes(view) || view.includes(table);
}

function shortestTerminal(candidates: readonly string[]): string {
  return candidates.reduce((best, candidate) =>
    terminalSegment(candidate).length < terminalSegment(best).length ? candidate : best
  );
}

/**
 * Complete 3-part identifiers other than the primary, without temp tables
 * (`_` prefixed) and without case-insensitive duplicates.
 */
export function selectAdditionalTables(primaryTable: string, candidates: readonly string[]): string[] {
  const seen = new Set([primaryTable.toLowerCase()]);
  const additional: string[] = [];
  for (const candidate of candidates) {
    const key = candidate.toLowerCase();
    if (seen.has(key) || !isCompleteTableName(candidate) || terminalSegment(candidate).startsWith('_')) {
      continue;
    }
    seen.add(key);
    additional.push(candidate);
  }
  return additional;
}

/**
 * Picks the primary table among SQL-derived candidates:
 * drop `a.b.a` self-references when something else is left, then prefer a
 * table whose name overlaps the view's name, then the shortest table name.
 */
export function choosePrimaryTable(viewName: string, candidates: readonly string[]): PrimaryTableChoice {
  const [first] = candidates;
  if (first === undefined) {
    return { primaryTable: '', additionalTables: [] };
  }

  const kept = candidates.filter((candidate) => !isSelfReferential(candidate));
  const pool = kept.length > 0 ? kept : [...candidates];
  if (pool.length === 1) {
    const [only] = pool;
    return { primaryTable: only, additionalTables: selectAdditionalTables(only, pool) };
  }

  const shortest = shortestTerminal(pool);
  const nameMatch = pool.find((candidate) => namesOverlap(viewName, candidate));
  const primaryTable = nameMatch ?? shortest;

  return {
    primaryTable,
    additionalTables: selectAdditionalTables(primaryTable, pool),
    tieBreak: nameMatch === undefined ? 'shortest_name' : 'name_match',
    disagreement: nameMatch !== undefined && nameMatch !== shortest ? { nameMatch, shortest } : undefined,
  };
}

function withTables(
  view: View,
  citationType: CitationType,
  primaryTable: string,
  additionalTables: string[] = []
): View {
  return { ...view, citationType, primaryTable, additionalTables, derivedFrom: undefined, tieBreak: undefined };
}

function synthesizedTable(name: string, settings: ProjectSettings): string {
  if (name.endsWith('_snapshot')) {
    return `${settings.snapshotProject}.${settings.snapshotDataset}.${name}`;
  }
  if (MODEL_PREFIX.test(name)) {
    return `${settings.defaultProject}.${settings.defaultDataset}.${name.replace(/_v2$/, '')}`;
  }
  return `${settings.defaultProject}.${settings.defaultDataset}.${name}`;
}

function withDefinition(input: ClassificationInput): View {
  return { ...input.view, sourceDefinition: input.definition ?? input.view.sourceDefinition };
}

/**
 * The checks backed by the view's own text: `explore_source`, a direct
 * `sql_table_name`, alias status, unnest joins and tables extracted from SQL.
 * Returns undefined when none of them applies.
 */
export function classifyFromEvidence(input: ClassificationInput, logger?: Logger): View | undefined {
  const { definition, unnestViews } = input;
  const view = withDefinition(input);
  const { name } = view;

  if (definition?.kind === 'explore_source') {
    return withTables(view, 'derived_explore', '');
  }

  if (definition?.kind === 'sql_table_name') {
    const direct = parseDirectTableName(definition.definition);
    if (direct !== undefined) {
      return withTables(view, 'native', direct);
    }
  }

  if (view.citationType === 'derived_from') {
    return view;
  }

  if (unnestViews.has(name)) {
    return withTables(view, 'unnest', '');
  }

  if (definition?.kind === 'sql_table_name' || definition?.kind === 'derived_table_sql') {
    const candidates = extractTableRefs(definition.definition);
    if (candidates.length > 0) {
      const choice = choosePrimaryTable(name, candidates);
      if (choice.disagreement) {
        logger?.debug(
          `View ${name}: name match picked ${choice.disagreement.nameMatch} over shortest name ${choice.disagreement.shortest}`
        );
      }
      const citationType = definition.kind === 'sql_table_name' ? 'native' : 'derived_sql';
      return { ...withTables(view, citationType, choice.primaryTable, choice.additionalTables), tieBreak: choice.tieBreak };
    }
  }

  return undefined;
}

/**
 * Inference from the name alone: a `parent__child` view copies its parent's
 * tables, anything else gets a table named after it.
 */
export function classifyFromName(input: ClassificationInput): View {
  const { registry, settings } = input;
  const view = withDefinition(input);
  const { name } = view;

  const separator = name.indexOf(NESTED_SEPARATOR);
  if (separator > 0) {
    const parent = registry.get(name.slice(0, separator));
    if (hasTables(parent)) {
      return withTables(view, 'nested', parent.primaryTable, [...parent.additionalTables]);
    }
  }

  return withTables(view, 'derived', synthesizedTable(name, settings));
}

/**
 * Decides the citation type and tables of one view. The checks run in a fixed
 * order and the first one that applies decides.
 */
export function classifyView(input: ClassificationInput, logger?: Logger): View {
  return classifyFromEvidence(input, logger) ?? classifyFromName(input);
}
