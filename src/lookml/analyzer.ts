import { countBy } from 'lodash';
import type { Logger } from '../utils/logger';
import { resolveAliases } from './alias_resolver';
import { classifyFromEvidence, classifyFromName, type ClassificationInput } from './citation_classifier';
import { buildExploreGraph } from './explore_graph';
import { extractSourceDefinitions } from './source_definitions';
import {
  createView,
  type AnalysisResult,
  type ProjectCorpus,
  type ProjectSettings,
  type View,
  type ViewRegistry,
} from './types';
import { buildViewRegistry } from './view_registry';

function isNestedName(name: string): boolean {
  return name.includes('__');
}

/**
 * Runs the whole engine over an in-memory corpus:
 *
 * 1. register views and the aliases declared in models
 * 2. read each view's defining clause
 * 3. walk the explores for view sets, aliases and unnest joins
 * 4. classify every view that its own text can decide
 * 5. give the remaining aliases their bases' tables
 * 6. infer the rest from names, `parent__child` views after their parents
 *
 * Never throws on malformed input; problems come back as warnings.
 */
export function analyzeProject(corpus: ProjectCorpus, settings: ProjectSettings, logger?: Logger): AnalysisResult {
  const registry = new Map(buildViewRegistry(corpus));
  const sources = extractSourceDefinitions(corpus.viewFiles);

  const directlySourced = new Set(
    Array.from(sources.definitions)
      .filter(([, definition]) => definition.kind !== 'unknown')
      .map(([name]) => name)
  );
  const graph = buildExploreGraph(corpus, directlySourced);

  // Undeclared alias bases stay out: they would get a guessed table the alias must not inherit.
  for (const { alias, filePath } of graph.aliases) {
    if (!registry.has(alias)) {
      registry.set(alias, createView(alias, { definedIn: filePath }));
    }
  }
  logger?.info(`Registered ${registry.size} views across ${graph.explores.size} explores`);

  const aliased = resolveAliases(registry, graph.aliases, logger);

  const inputFor = (view: View, current: ViewRegistry): ClassificationInput => ({
    view,
    definition: sources.definitions.get(view.name),
    unnestViews: graph.unnestViews,
    registry: current,
    settings,
  });

  const evidenced = new Map<string, View>(aliased);
  const pending: string[] = [];
  for (const [name, view] of aliased) {
    const classified = classifyFromEvidence(inputFor(view, aliased), logger);
    if (classified) {
      evidenced.set(name, classified);
    } else {
      pending.push(name);
    }
  }

  // Aliases copy their bases' tables before any name-based inference.
  const stillAliases = graph.aliases.filter((relation) => evidenced.get(relation.alias)?.citationType === 'derived_from');
  const views = new Map<string, View>(resolveAliases(evidenced, stillAliases));

  for (const name of [...pending.filter((entry) => !isNestedName(entry)), ...pending.filter(isNestedName)]) {
    const view = views.get(name) ?? createView(name);
    views.set(name, classifyFromName(inputFor(view, views)));
  }

  const warnings = [...sources.warnings, ...graph.warnings];
  for (const warning of warnings) {
    logger?.warn(warning.message, { code: warning.code, filePath: warning.filePath, name: warning.name });
  }

  const counts = countBy(Array.from(views.values()), (view) => view.citationType);
  logger?.info(
    `Classified ${views.size} views (${Object.entries(counts)
      .map(([type, count]) => `${type}: ${count}`)
      .join(', ')})`
  );
  logger?.info(`Found ${graph.aliases.length} alias relations and ${graph.unnestViews.size} unnest views`);

  return {
    views,
    explores: graph.explores,
    aliases: graph.aliases,
    unnestViews: graph.unnestViews,
    warnings,
  };
}
