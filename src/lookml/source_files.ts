import { glob } from 'glob';
import { promises as fs } from 'fs';
import path from 'path';
import PQueue from 'p-queue';
import type { AnalysisWarning, ProjectCorpus, SourceFile } from './types';

const VIEW_FILE_PATTERNS = ['views/**/*.view.lkml', '**/*.view.lkml'];

const MODEL_FILE_PATTERNS = [
  'models/*.lkml',
  '*.model.lkml',
  '*model*.lkml',
  '*.lkml',
  '**/*.model.lkml',
  '**/*.explore.lkml',
];

/** Patterns of the conventional layout; anything else is found by the catch-all searches. */
export const CONVENTIONAL_PATTERNS = {
  views: VIEW_FILE_PATTERNS[0],
  models: MODEL_FILE_PATTERNS[0],
};

export interface DiscoveredFiles {
  modelFiles: string[];
  viewFiles: string[];
}

export interface LoadOptions {
  concurrency: number;
  onFileRead?: (filePath: string) => void;
}

export interface CorpusLoad {
  corpus: ProjectCorpus;
  warnings: AnalysisWarning[];
}

/** Runs each pattern in turn and keeps the first position of every path. */
async function findInOrder(root: string, patterns: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  const seen = new Set<string>();
  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd: root, nodir: true, posix: true, ignore: ['node_modules/**', '**/node_modules/**'] });
    for (const match of matches.sort()) {
      if (!seen.has(match)) {
        seen.add(match);
        found.push(match);
      }
    }
  }
  return found;
}

/** Paths are relative to `root` and use forward slashes. */
export async function discoverSourceFiles(root: string): Promise<DiscoveredFiles> {
  const viewFiles = await findInOrder(root, VIEW_FILE_PATTERNS);
  const modelFiles = (await findInOrder(root, MODEL_FILE_PATTERNS)).filter((file) => !file.endsWith('.view.lkml'));
  return { modelFiles, viewFiles };
}

async function readAll(
  root: string,
  files: readonly string[],
  queue: PQueue,
  warnings: AnalysisWarning[],
  onFileRead?: (filePath: string) => void
): Promise<SourceFile[]> {
  const results = await Promise.all(
    files.map((file) =>
      queue.add(async (): Promise<SourceFile | undefined> => {
        try {
          const text = await fs.readFile(path.join(root, file), 'utf-8');
          return { path: file, text };
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          warnings.push({ code: 'FileUnreadable', message: `Could not read ${file}: ${reason}`, filePath: file });
          return undefined;
        } finally {
          onFileRead?.(file);
        }
      })
    )
  );
  return results.filter((file): file is SourceFile => file !== undefined);
}

/**
 * Reads every discovered file. Reads run concurrently; the returned lists keep
 * discovery order whatever order the reads finish in.
 */
export async function loadProjectCorpus(
  root: string,
  discovered: DiscoveredFiles,
  options: LoadOptions
): Promise<CorpusLoad> {
  const queue = new PQueue({ concurrency: options.concurrency });
  const warnings: AnalysisWarning[] = [];

  const [modelFiles, viewFiles] = await Promise.all([
    readAll(root, discovered.modelFiles, queue, warnings, options.onFileRead),
    readAll(root, discovered.viewFiles, queue, warnings, options.onFileRead),
  ]);

  // Warnings follow discovery order too.
  const order = [...discovered.modelFiles, ...discovered.viewFiles];
  warnings.sort((a, b) => order.indexOf(a.filePath ?? '') - order.indexOf(b.filePath ?? ''));

  return { corpus: { modelFiles, viewFiles }, warnings };
}
