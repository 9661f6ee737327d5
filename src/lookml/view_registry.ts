import { bodySpan, findBlocks, ownText, stripCommentLines } from './block_scanner';
import { readFromTarget } from './parameters';
import { createView, type ProjectCorpus, type View, type ViewRegistry } from './types';

// Joins are matched twice to tolerate formatting variants. The first pattern
// allows one level of nested braces and wins when both capture the same join.
const JOIN_PATTERNS = [
  /\bjoin:\s+(\w+)\s+\{([^{}]*(?:\{[^{}]*\}[^{}]*)*)\}/g,
  /\bjoin:\s+(\w+)\s+\{([^}]+)\}/g,
];

function collectJoins(exploreBody: string): Map<string, string> {
  const joins = new Map<string, string>();
  for (const pattern of JOIN_PATTERNS) {
    for (const match of exploreBody.matchAll(pattern)) {
      if (!joins.has(match[1])) {
        joins.set(match[1], match[2]);
      }
    }
  }
  return joins;
}

/**
 * Collects every declared view name and its defining file, plus the alias names
 * introduced by explores and joins in model files. Names that show up only in a
 * join are registered with default fields. Truncated explores are reported by
 * the explore graph, which scans the same blocks.
 */
export function buildViewRegistry(corpus: ProjectCorpus): ViewRegistry {
  const views = new Map<string, View>();

  for (const file of corpus.viewFiles) {
    const text = stripCommentLines(file.text);
    const { blocks, unterminated } = findBlocks(text, 'view');
    for (const { name } of [...blocks, ...unterminated]) {
      if (!views.has(name)) {
        views.set(name, createView(name, { definedIn: file.path }));
      }
    }
  }

  for (const file of corpus.modelFiles) {
    const text = stripCommentLines(file.text);
    for (const explore of findBlocks(text, 'explore').blocks) {
      const topLevelJoins = findBlocks(text, 'join', bodySpan(explore)).blocks;
      const base = readFromTarget(ownText(text, explore, topLevelJoins));
      if (base && base !== explore.name && !views.has(explore.name)) {
        views.set(
          explore.name,
          createView(explore.name, { citationType: 'derived_from', derivedFrom: base, definedIn: file.path })
        );
      }

      const exploreBody = text.slice(explore.bodyStart, explore.end);
      for (const [joinName, joinContent] of collectJoins(exploreBody)) {
        const existing = views.get(joinName) ?? createView(joinName, { definedIn: file.path });
        // Nested join bodies are dropped so their `from:` is not read as this join's.
        const target = readFromTarget(joinContent.replace(/\{[^{}]*\}/g, ''));

        if (target && target !== joinName && existing.citationType !== 'derived_from') {
          views.set(joinName, { ...existing, citationType: 'derived_from', derivedFrom: target });
        } else if (!views.has(joinName)) {
          views.set(joinName, existing);
        }
      }
    }
  }

  return views;
}
