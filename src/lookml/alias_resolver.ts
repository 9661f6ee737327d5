import type { Logger } from '../utils/logger';
import { createView, hasTables, type AliasRelation, type View, type ViewRegistry } from './types';

interface ResolvedTables {
  primaryTable: string;
  additionalTables: string[];
}

const NO_TABLES: ResolvedTables = { primaryTable: '', additionalTables: [] };

/** One base per alias; the first relation seen wins. */
export function aliasTargets(relations: readonly AliasRelation[], logger?: Logger): Map<string, string> {
  const targets = new Map<string, string>();
  for (const relation of relations) {
    const existing = targets.get(relation.alias);
    if (existing === undefined) {
      targets.set(relation.alias, relation.base);
    } else if (existing !== relation.base) {
      logger?.debug(
        `Alias ${relation.alias} also declared from ${relation.base} in ${relation.filePath}; keeping ${existing}`
      );
    }
  }
  return targets;
}

function tablesOf(
  name: string,
  registry: ViewRegistry,
  targets: ReadonlyMap<string, string>,
  seen: Set<string>
): ResolvedTables {
  // Chains of aliases inherit from the end of the chain.
  const base = targets.get(name);
  if (base !== undefined) {
    if (seen.has(name)) {
      return NO_TABLES;
    }
    seen.add(name);
    return tablesOf(base, registry, targets, seen);
  }

  const view = registry.get(name);
  if (!hasTables(view)) {
    return NO_TABLES;
  }
  return { primaryTable: view.primaryTable, additionalTables: [...view.additionalTables] };
}

/**
 * Marks every alias as `derived_from` its base and gives it a copy of the
 * base's tables, or no tables at all when the base is unknown or tableless.
 * Returns a new registry; the input is left untouched.
 */
export function resolveAliases(
  registry: ViewRegistry,
  relations: readonly AliasRelation[],
  logger?: Logger
): ViewRegistry {
  const targets = aliasTargets(relations, logger);
  const resolved = new Map<string, View>(registry);

  for (const [alias, base] of targets) {
    const existing = registry.get(alias) ?? createView(alias);
    const tables = tablesOf(base, registry, targets, new Set([alias]));
    resolved.set(alias, {
      ...existing,
      citationType: 'derived_from',
      derivedFrom: base,
      primaryTable: tables.primaryTable,
      additionalTables: [...tables.additionalTables],
    });
  }

  return resolved;
}
