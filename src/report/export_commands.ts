import { promises as fs } from 'fs';
import type { ProjectSettings } from '../lookml/types';
import type { ViewReportRow } from './view_report';

export const EXPORT_ALL_FILE = 'export_command.txt';
export const EXPORT_ACTIVE_FILE = 'export_command_active.txt';

export interface ExportCommands {
  all: string[];
  /** Tables of views with usage above zero; empty without usage data. */
  active: string[];
}

export function exportCommand(bucket: string, project: string, dataset: string, table: string): string {
  return `BEGIN
EXPORT DATA
  OPTIONS (
    uri = 'gs://${bucket}/${project}/${dataset}/${table}/*.parquet',
    format = 'PARQUET',
    compression = "SNAPPY",
    overwrite = true)
AS (
  SELECT *
  FROM \`${project}.${dataset}.${table}\`
);
EXCEPTION WHEN ERROR THEN
SELECT 1; -- Skip if table does not exist or other issues
END;
`;
}

/** A bare table name gets the default project and dataset; 2-part names are left alone. */
export function exportableTableName(raw: string, settings: ProjectSettings): string | undefined {
  const cleaned = raw.trim().replace(/[\n\r#]/g, '');
  const parts = cleaned.split('.');
  if (parts.length === 1 && cleaned) {
    return `${settings.defaultProject}.${settings.defaultDataset}.${cleaned}`;
  }
  return parts.length === 3 ? cleaned : undefined;
}

/**
 * One `EXPORT DATA` script per distinct table, in report order. Tables read
 * from a snapshot project are exported from the configured snapshot project,
 * everything else from the default one.
 */
export function buildExportCommands(
  rows: readonly ViewReportRow[],
  bucket: string,
  settings: ProjectSettings
): ExportCommands {
  const all: string[] = [];
  const active: string[] = [];
  const exported = new Set<string>();

  for (const row of rows) {
    if (row.citationType === 'unnest' || (!row.tableName && row.additionalTables.length === 0)) {
      continue;
    }

    for (const raw of [row.tableName, ...row.additionalTables]) {
      const tableName = exportableTableName(raw, settings);
      if (tableName === undefined || exported.has(tableName)) {
        continue;
      }
      exported.add(tableName);

      const [project, dataset, table] = tableName.split('.');
      const sourceProject = project.toLowerCase().includes('snapshot')
        ? settings.snapshotProject
        : settings.defaultProject;
      const command = exportCommand(bucket, sourceProject, dataset, table.replace(/\*/g, ''));

      all.push(command);
      if (row.calculatedUsage !== null && row.calculatedUsage > 0) {
        active.push(command);
      }
    }
  }

  return { all, active };
}

export async function writeExportCommands(filePath: string, commands: readonly string[]): Promise<void> {
  await fs.writeFile(filePath, commands.join(''), 'utf-8');
}
