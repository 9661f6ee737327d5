import path from 'path';
import { bodySpan, findBlocks, ownText, stripCommentLines, type Span } from './block_scanner';
import { readFromTarget, readSqlClauses } from './parameters';
import type { AliasRelation, AnalysisWarning, Block, Explore, ProjectCorpus, SourceFile } from './types';

export interface ExploreGraph {
  explores: ReadonlyMap<string, Explore>;
  aliases: AliasRelation[];
  unnestViews: ReadonlySet<string>;
  warnings: AnalysisWarning[];
}

export const UNKNOWN_MODEL = 'unknown_model';

const UNNEST_CALL = /unnest\(/i;

/**
 * `orders.model.lkml` belongs to model `orders`. Any other `.lkml` file under
 * a `models/` directory is named after its basename.
 */
export function owningModel(filePath: string): string {
  const base = path.basename(filePath);
  if (base.endsWith('.model.lkml')) {
    return base.slice(0, -'.model.lkml'.length);
  }
  const segments = filePath.split(/[\\/]/);
  if (segments.slice(0, -1).includes('models') && base.endsWith('.lkml')) {
    return base.slice(0, -'.lkml'.length);
  }
  return UNKNOWN_MODEL;
}

interface GraphBuilder {
  explores: Map<string, Explore>;
  aliases: AliasRelation[];
  unnestViews: Set<string>;
  warnings: AnalysisWarning[];
  directlySourced: ReadonlySet<string>;
}

function truncated(kind: string, name: string, filePath: string): AnalysisWarning {
  return {
    code: 'BlockUnterminated',
    message: `${kind} ${name} has no closing brace`,
    filePath,
    name,
  };
}

function visitJoins(
  builder: GraphBuilder,
  text: string,
  span: Span,
  filePath: string,
  views: Set<string>
): Block[] {
  const { blocks, unterminated } = findBlocks(text, 'join', span);
  for (const join of unterminated) {
    builder.warnings.push(truncated('join', join.name, filePath));
  }

  for (const join of blocks) {
    views.add(join.name);

    const children = visitJoins(builder, text, bodySpan(join), filePath, views);
    const own = ownText(text, join, children);

    const target = readFromTarget(own);
    if (target && target !== join.name) {
      builder.aliases.push({ alias: join.name, base: target, site: 'join', filePath });
    }

    const unnests = readSqlClauses(own).some((clause) => UNNEST_CALL.test(clause));
    if (unnests && !builder.directlySourced.has(join.name)) {
      builder.unnestViews.add(join.name);
    }
  }
  return blocks;
}

function scanFile(builder: GraphBuilder, file: SourceFile): void {
  const text = stripCommentLines(file.text);
  const { blocks, unterminated } = findBlocks(text, 'explore');

  for (const explore of unterminated) {
    builder.warnings.push(truncated('explore', explore.name, file.path));
  }

  for (const explore of blocks) {
    if (builder.explores.has(explore.name)) {
      continue;
    }

    const views = new Set<string>();
    const joins = visitJoins(builder, text, bodySpan(explore), file.path, views);

    const target = readFromTarget(ownText(text, explore, joins));
    const baseView = target ?? explore.name;
    if (baseView !== explore.name) {
      builder.aliases.push({ alias: explore.name, base: baseView, site: 'explore', filePath: file.path });
    }

    builder.explores.set(explore.name, {
      name: explore.name,
      model: owningModel(file.path),
      filePath: file.path,
      baseView,
      views: new Set([baseView, ...views]),
    });
  }
}

/**
 * Walks every explore in the corpus, joins at any depth included.
 *
 * `directlySourced` names the views whose own definition already gives them a
 * table or another explore; a join on such a view is never marked as unnest.
 * An explore defined twice keeps its first definition.
 */
export function buildExploreGraph(corpus: ProjectCorpus, directlySourced: ReadonlySet<string>): ExploreGraph {
  const builder: GraphBuilder = {
    explores: new Map(),
    aliases: [],
    unnestViews: new Set(),
    warnings: [],
    directlySourced,
  };

  for (const file of [...corpus.modelFiles, ...corpus.viewFiles]) {
    scanFile(builder, file);
  }

  const { explores, aliases, unnestViews, warnings } = builder;
  return { explores, aliases, unnestViews, warnings };
}
