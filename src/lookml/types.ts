/**
 * Shared model for the table-provenance engine.
 *
 * Every stage of the pipeline takes plain values of these types and returns new
 * ones; nothing here is mutated after a stage hands it on.
 */

export interface SourceFile {
  path: string;
  text: string;
}

/** Files split the way the engine consumes them. Both lists are de-duplicated and order-stable. */
export interface ProjectCorpus {
  modelFiles: SourceFile[];
  viewFiles: SourceFile[];
}

export type BlockKind = 'view' | 'explore' | 'join' | 'derived_table';

/**
 * A bracketed region of some text. `bodyStart` is the offset right after the
 * opening `{`, `end` the offset of the matching `}`.
 */
export interface Block {
  kind: BlockKind;
  name: string;
  headerStart: number;
  bodyStart: number;
  end: number;
}

export const CITATION_TYPES = [
  'native',
  'derived',
  'derived_sql',
  'derived_explore',
  'derived_from',
  'nested',
  'unnest',
] as const;

export type CitationType = (typeof CITATION_TYPES)[number];

export type SourceDefinitionKind = 'sql_table_name' | 'explore_source' | 'derived_table_sql' | 'unknown';

export type SourceDefinition =
  | { kind: 'sql_table_name'; definition: string }
  | { kind: 'explore_source'; definition: string; exploreName: string }
  | { kind: 'derived_table_sql'; definition: string }
  | { kind: 'unknown'; definition: string };

export type TieBreakRule = 'name_match' | 'shortest_name';

export interface View {
  name: string;
  citationType: CitationType;
  /** Empty string when the view has no table. */
  primaryTable: string;
  additionalTables: string[];
  derivedFrom?: string;
  sourceDefinition?: SourceDefinition;
  /** Set when the primary table was picked among several SQL-derived candidates. */
  tieBreak?: TieBreakRule;
  definedIn?: string;
}

export interface Explore {
  name: string;
  model: string;
  filePath: string;
  baseView: string;
  views: ReadonlySet<string>;
}

export interface AliasRelation {
  alias: string;
  base: string;
  site: 'explore' | 'join';
  filePath: string;
}

export type AnalysisWarningCode = 'FileUnreadable' | 'BlockUnterminated';

export interface AnalysisWarning {
  code: AnalysisWarningCode;
  message: string;
  filePath?: string;
  name?: string;
}

/** Read-only for the duration of a run and passed explicitly to every call that synthesizes names. */
export interface ProjectSettings {
  defaultProject: string;
  defaultDataset: string;
  snapshotProject: string;
  snapshotDataset: string;
}

export type ViewRegistry = ReadonlyMap<string, View>;

export interface AnalysisResult {
  views: ViewRegistry;
  explores: ReadonlyMap<string, Explore>;
  aliases: AliasRelation[];
  unnestViews: ReadonlySet<string>;
  warnings: AnalysisWarning[];
}

export function createView(name: string, overrides: Partial<Omit<View, 'name'>> = {}): View {
  return {
    name,
    citationType: 'native',
    primaryTable: '',
    additionalTables: [],
    ...overrides,
  };
}

export function hasTables(view: View | undefined): view is View {
  return view !== undefined && (view.primaryTable !== '' || view.additionalTables.length > 0);
}
