import type { Block, BlockKind } from './types';

/**
 * Brace-depth scanning over raw LookML text.
 *
 * Braces inside SQL strings or Liquid tags count like any other brace. An
 * unbalanced block is reported as unterminated, never thrown.
 */

export interface Span {
  start: number;
  end: number;
}

export interface UnterminatedBlock {
  kind: BlockKind;
  name: string;
  headerStart: number;
}

export interface BlockScan {
  blocks: Block[];
  unterminated: UnterminatedBlock[];
}

const HEADER_PATTERNS: Record<BlockKind, string> = {
  view: String.raw`\bview:\s+(\w+)\s+\{`,
  explore: String.raw`\bexplore:\s+(\w+)\s+\{`,
  join: String.raw`\bjoin:\s+(\w+)\s+\{`,
  derived_table: String.raw`\bderived_table\s*:\s*\{`,
};

const COMMENT_LINE = /^\s*#/;

/**
 * Returns the offset of the `}` closing the block whose body starts at
 * `bodyStart`, or undefined when depth never returns to zero before `limit`.
 */
export function findBlockEnd(text: string, bodyStart: number, limit: number = text.length): number | undefined {
  let depth = 1;
  for (let i = bodyStart; i < limit; i++) {
    const char = text[i];
    if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return undefined;
}

/**
 * Finds the outermost blocks of one kind inside `span`. Blocks nested in a
 * found block are not returned; scan the parent's body again to get them.
 */
export function findBlocks(text: string, kind: BlockKind, span: Span = { start: 0, end: text.length }): BlockScan {
  const header = new RegExp(HEADER_PATTERNS[kind], 'g');
  const blocks: Block[] = [];
  const unterminated: UnterminatedBlock[] = [];

  header.lastIndex = span.start;
  let match: RegExpExecArray | null;
  while ((match = header.exec(text)) !== null) {
    const bodyStart = match.index + match[0].length;
    if (bodyStart > span.end) {
      break;
    }

    const name = match[1] ?? '';
    const end = findBlockEnd(text, bodyStart, span.end);
    if (end === undefined) {
      unterminated.push({ kind, name, headerStart: match.index });
      header.lastIndex = bodyStart;
      continue;
    }

    blocks.push({ kind, name, headerStart: match.index, bodyStart, end });
    header.lastIndex = end + 1;
  }

  return { blocks, unterminated };
}

export function bodySpan(block: Block): Span {
  return { start: block.bodyStart, end: block.end };
}

export function blockBody(text: string, block: Block): string {
  return text.slice(block.bodyStart, block.end);
}

/** The block's body with the given child blocks cut out, headers included. */
export function ownText(text: string, block: Block, children: readonly Block[]): string {
  let result = '';
  let cursor = block.bodyStart;
  const ordered = [...children].sort((a, b) => a.headerStart - b.headerStart);
  for (const child of ordered) {
    if (child.headerStart < cursor || child.end > block.end) {
      continue;
    }
    result += text.slice(cursor, child.headerStart);
    cursor = child.end + 1;
  }
  return result + text.slice(cursor, block.end);
}

/** Blanks every line whose first non-blank character starts a `#` comment. */
export function stripCommentLines(text: string): string {
  return text
    .split('\n')
    .map((line) => (COMMENT_LINE.test(line) ? '' : line))
    .join('\n');
}
