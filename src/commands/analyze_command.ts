import { Command, Option } from 'commander';
import cliProgress from 'cli-progress';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { analysisConfig, projectConfig } from '../config';
import {
  analyzeProject,
  discoverSourceFiles,
  loadProjectCorpus,
  type AnalysisResult,
  type CorpusLoad,
  type DiscoveredFiles,
  type ProjectSettings,
} from '../lookml';
import { EXPORT_ACTIVE_FILE, EXPORT_ALL_FILE, buildExportCommands, writeExportCommands } from '../report/export_commands';
import { loadExploreUsage } from '../report/usage';
import {
  VIEW_REPORT_FILE,
  buildViewReport,
  logReportSummary,
  writeViewReport,
  type ViewReportRow,
} from '../report/view_report';
import { createLogger, type Logger } from '../utils/logger';

const nonEmpty = z.string().trim().min(1);

export const analyzeOptionsSchema = z.object({
  outputDir: nonEmpty,
  exploreUsageFile: nonEmpty.optional(),
  exportGsBucket: nonEmpty.optional(),
  defaultProject: nonEmpty,
  defaultDataset: nonEmpty,
  snapshotProject: nonEmpty,
  snapshotDataset: nonEmpty,
  includeSourceInfo: z.boolean().default(false),
  concurrency: z.number().int().positive(),
});

export type AnalyzeOptions = z.infer<typeof analyzeOptionsSchema>;

export interface AnalyzeOutcome {
  result: AnalysisResult;
  rows: ViewReportRow[];
  /** Absolute paths of every file written. */
  outputFiles: string[];
}

export function parseAnalyzeOptions(raw: unknown): AnalyzeOptions {
  const parsed = analyzeOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid options: ${problems.join('; ')}`);
  }
  return parsed.data;
}

function logDirectorySummary(discovered: DiscoveredFiles, logger: Logger) {
  const conventionalViews = discovered.viewFiles.filter((file) => file.startsWith('views/')).length;
  const conventionalModels = discovered.modelFiles.filter((file) => /^models\/[^/]+$/.test(file)).length;
  logger.info(
    `Found ${discovered.viewFiles.length} view files (${conventionalViews} under views/, ` +
      `${discovered.viewFiles.length - conventionalViews} elsewhere)`
  );
  logger.info(
    `Found ${discovered.modelFiles.length} model files (${conventionalModels} under models/, ` +
      `${discovered.modelFiles.length - conventionalModels} elsewhere)`
  );
}

function createProgressBar(): cliProgress.SingleBar | undefined {
  if (!process.stdout.isTTY || process.env.NODE_ENV === 'test') {
    return undefined;
  }
  return new cliProgress.SingleBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} | {percentage}% | {value}/{total} | Reading LookML files',
    },
    cliProgress.Presets.shades_classic
  );
}

async function readCorpus(root: string, discovered: DiscoveredFiles, concurrency: number): Promise<CorpusLoad> {
  const progressBar = createProgressBar();
  progressBar?.start(discovered.modelFiles.length + discovered.viewFiles.length, 0);
  try {
    return await loadProjectCorpus(root, discovered, {
      concurrency,
      onFileRead: () => progressBar?.increment(),
    });
  } finally {
    progressBar?.stop();
  }
}

/**
 * Analyzes a LookML project directory and writes `view_analysis.csv`, plus the
 * export scripts when a bucket is given. Output paths are resolved against the
 * current working directory.
 */
export async function analyze(lookerPath: string, rawOptions: unknown): Promise<AnalyzeOutcome> {
  const options = parseAnalyzeOptions(rawOptions);
  const root = path.resolve(lookerPath);

  const stats = await fs.stat(root).catch(() => undefined);
  if (!stats?.isDirectory()) {
    throw new Error(`LookML project directory not found: ${root}`);
  }

  const settings: ProjectSettings = {
    defaultProject: options.defaultProject,
    defaultDataset: options.defaultDataset,
    snapshotProject: options.snapshotProject,
    snapshotDataset: options.snapshotDataset,
  };
  const logger = createLogger({ project: path.basename(root) });
  logger.info(`Analyzing LookML project: ${root}`, { ...settings });

  const discovered = await discoverSourceFiles(root);
  logDirectorySummary(discovered, logger);

  const load = await readCorpus(root, discovered, options.concurrency);
  for (const warning of load.warnings) {
    logger.warn(warning.message, { code: warning.code, filePath: warning.filePath });
  }

  const analysis = analyzeProject(load.corpus, settings, logger);
  const result: AnalysisResult = { ...analysis, warnings: [...load.warnings, ...analysis.warnings] };
  if (result.views.size === 0) {
    logger.warn(`No views found under ${root}; check that it is the root of a LookML project`);
  }

  const usage = options.exploreUsageFile
    ? await loadExploreUsage(path.resolve(options.exploreUsageFile), logger)
    : undefined;
  if (!usage) {
    logger.info('No explore usage file given; calculated_usage will be NULL');
  }

  const outputDir = path.resolve(options.outputDir);
  await fs.mkdir(outputDir, { recursive: true });
  const outputFiles: string[] = [];

  const rows = buildViewReport(result, usage);
  const reportFile = path.join(outputDir, VIEW_REPORT_FILE);
  await writeViewReport(reportFile, rows, options.includeSourceInfo);
  outputFiles.push(reportFile);
  logger.info(`View report written to ${reportFile}`);
  logReportSummary(rows, logger);

  if (options.exportGsBucket) {
    const commands = buildExportCommands(rows, options.exportGsBucket, settings);
    const allFile = path.join(outputDir, EXPORT_ALL_FILE);
    await writeExportCommands(allFile, commands.all);
    outputFiles.push(allFile);

    if (usage) {
      const activeFile = path.join(outputDir, EXPORT_ACTIVE_FILE);
      await writeExportCommands(activeFile, commands.active);
      outputFiles.push(activeFile);
    }
    logger.info(`Generated export commands for ${commands.all.length} tables (${commands.active.length} active)`);
  } else {
    logger.info('No export bucket given, skipping export commands');
  }

  return { result, rows, outputFiles };
}

export const analyzeCommand = new Command('analyze')
  .description('Resolve the warehouse tables behind every view of a LookML project')
  .argument('<lookerPath>', 'Root directory of the LookML project')
  .addOption(new Option('--output-dir <dir>', 'Directory the report is written to').default(analysisConfig.outputDir))
  .addOption(new Option('--explore-usage-file <file>', 'CSV of explore usage (explore name, _, query count)'))
  .addOption(new Option('--export-gs-bucket <bucket>', 'GCS bucket to generate EXPORT DATA commands for'))
  .addOption(new Option('--default-project <project>', 'Project for synthesized table names').default(projectConfig.defaultProject))
  .addOption(new Option('--default-dataset <dataset>', 'Dataset for synthesized table names').default(projectConfig.defaultDataset))
  .addOption(new Option('--snapshot-project <project>', 'Project for *_snapshot views').default(projectConfig.snapshotProject))
  .addOption(new Option('--snapshot-dataset <dataset>', 'Dataset for *_snapshot views').default(projectConfig.snapshotDataset))
  .addOption(new Option('--include-source-info', 'Add source_type and source_definition columns').default(false))
  .addOption(
    new Option('--concurrency <number>', 'Number of files read in parallel')
      .default(analysisConfig.readConcurrency)
      .argParser((value) => parseInt(value, 10))
  )
  .action(async (lookerPath: string, options: unknown) => {
    await analyze(lookerPath, options);
  });
