export * from './types';
export { findBlockEnd, findBlocks, stripCommentLines } from './block_scanner';
export { discoverSourceFiles, loadProjectCorpus, CONVENTIONAL_PATTERNS } from './source_files';
export type { DiscoveredFiles, LoadOptions, CorpusLoad } from './source_files';
export { buildViewRegistry } from './view_registry';
export { buildExploreGraph, owningModel, UNKNOWN_MODEL } from './explore_graph';
export type { ExploreGraph } from './explore_graph';
export { resolveAliases } from './alias_resolver';
export { extractSourceDefinitions, classifyDefiningClause } from './source_definitions';
export { extractTableRefs, normalizeSql, parseDirectTableName } from './table_references';
export { classifyView, choosePrimaryTable, selectAdditionalTables } from './citation_classifier';
export { analyzeProject } from './analyzer';
