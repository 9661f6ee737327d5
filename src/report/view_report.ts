import { promises as fs } from 'fs';
import { countBy, orderBy } from 'lodash';
import type { AnalysisResult, CitationType } from '../lookml/types';
import type { Logger } from '../utils/logger';
import { calculateViewUsage, countExploresPerView, type ExploreUsage } from './usage';

export const VIEW_REPORT_FILE = 'view_analysis.csv';

const BASE_COLUMNS = ['view_name', 'explore_count', 'calculated_usage', 'table_name', 'citation_type', 'additional_tables'];
const SOURCE_COLUMNS = ['source_type', 'source_definition'];

const TOP_VIEWS = 20;

export interface ViewReportRow {
  viewName: string;
  exploreCount: number;
  /** `null` when the run had no usage data. */
  calculatedUsage: number | null;
  tableName: string;
  citationType: CitationType;
  additionalTables: string[];
  sourceType: string;
  sourceDefinition: string;
}

/**
 * One row per registered view. With usage data, rows are ordered by usage then
 * explore count; without, by explore count then view name. Both descending.
 */
export function buildViewReport(result: AnalysisResult, usage?: ExploreUsage): ViewReportRow[] {
  const explores = Array.from(result.explores.values());
  const exploreCounts = countExploresPerView(explores);
  const viewUsage = usage ? calculateViewUsage(result.views.keys(), usage, explores) : undefined;

  const rows = Array.from(result.views.values(), (view): ViewReportRow => ({
    viewName: view.name,
    exploreCount: exploreCounts.get(view.name) ?? 0,
    calculatedUsage: viewUsage ? viewUsage.get(view.name) ?? 0 : null,
    tableName: view.primaryTable,
    citationType: view.citationType,
    additionalTables: view.additionalTables,
    sourceType: view.sourceDefinition?.kind ?? '',
    sourceDefinition: view.sourceDefinition?.definition ?? '',
  }));

  if (viewUsage) {
    return orderBy(rows, ['calculatedUsage', 'exploreCount'], ['desc', 'desc']);
  }
  return orderBy(rows, ['exploreCount', 'viewName'], ['desc', 'desc']);
}

export function escapeCsvCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatViewReport(rows: readonly ViewReportRow[], includeSourceInfo: boolean): string {
  const header = includeSourceInfo ? [...BASE_COLUMNS, ...SOURCE_COLUMNS] : BASE_COLUMNS;
  const lines = [header.join(',')];

  for (const row of rows) {
    const cells: (string | number)[] = [
      row.viewName,
      row.exploreCount,
      row.calculatedUsage === null ? 'NULL' : row.calculatedUsage,
      row.tableName,
      row.citationType,
      row.additionalTables.join(';'),
    ];
    if (includeSourceInfo) {
      cells.push(row.sourceType, row.sourceDefinition);
    }
    lines.push(cells.map(escapeCsvCell).join(','));
  }

  return `${lines.join('\n')}\n`;
}

export async function writeViewReport(
  filePath: string,
  rows: readonly ViewReportRow[],
  includeSourceInfo: boolean
): Promise<void> {
  await fs.writeFile(filePath, formatViewReport(rows, includeSourceInfo), 'utf-8');
}

export function logReportSummary(rows: readonly ViewReportRow[], logger: Logger): void {
  if (rows.some((row) => row.calculatedUsage !== null)) {
    logger.info(`Top ${TOP_VIEWS} most used views:`);
    for (const row of rows.slice(0, TOP_VIEWS)) {
      logger.info(`  ${row.viewName}: ${row.calculatedUsage} queries across ${row.exploreCount} explores`);
    }
  } else {
    logger.info('No usage data, skipping the most used views');
  }

  logger.info('View citation types:');
  for (const [citationType, count] of Object.entries(countBy(rows, (row) => row.citationType))) {
    logger.info(`  ${citationType}: ${count} views`);
  }
}
