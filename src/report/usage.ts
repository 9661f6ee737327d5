import csv from 'csv-parser';
import fs from 'fs';
import type { Explore } from '../lookml/types';
import type { Logger } from '../utils/logger';

/** Explore name → number of queries run against it. */
export type ExploreUsage = ReadonlyMap<string, number>;

const EXPLORE_COLUMN = '0';
const COUNT_COLUMN = '2';

function parseCount(raw: string): number | undefined {
  const cleaned = raw.replace(/,/g, '').trim();
  return /^-?\d+$/.test(cleaned) ? parseInt(cleaned, 10) : undefined;
}

function readRows(filePath: string): Promise<Record<string, string>[]> {
  return new Promise((resolve, reject) => {
    const rows: Record<string, string>[] = [];
    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(csv({ headers: false, skipLines: 1 }))
      .on('data', (row: Record<string, string>) => rows.push(row))
      .on('error', reject)
      .on('end', () => resolve(rows));
  });
}

/**
 * Reads an explore usage export: a header row, then rows whose first column is
 * the explore name and third column the query count (thousands separators
 * allowed). A missing or unreadable file gives an empty map.
 */
export async function loadExploreUsage(filePath: string, logger?: Logger): Promise<ExploreUsage> {
  const usage = new Map<string, number>();
  if (!fs.existsSync(filePath)) {
    logger?.warn(`Explore usage file '${filePath}' does not exist; every view gets a usage of 0`);
    return usage;
  }

  let rows: Record<string, string>[];
  try {
    rows = await readRows(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger?.warn(`Could not read explore usage file '${filePath}': ${reason}`);
    return usage;
  }

  for (const row of rows) {
    const explore = row[EXPLORE_COLUMN];
    const rawCount = row[COUNT_COLUMN];
    if (explore === undefined || rawCount === undefined) {
      continue;
    }
    const count = parseCount(rawCount);
    if (count === undefined) {
      logger?.debug(`Skipping usage row for ${explore.trim()}: '${rawCount}' is not a count`);
      continue;
    }
    usage.set(explore.trim(), count);
  }

  logger?.info(`Loaded usage for ${usage.size} explores`);
  return usage;
}

/** Every view starts at 0; each explore adds its usage to every view it touches. */
export function calculateViewUsage(
  viewNames: Iterable<string>,
  usage: ExploreUsage,
  explores: Iterable<Explore>
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const name of viewNames) {
    totals.set(name, 0);
  }
  for (const explore of explores) {
    const count = usage.get(explore.name);
    if (count === undefined) {
      continue;
    }
    for (const view of explore.views) {
      totals.set(view, (totals.get(view) ?? 0) + count);
    }
  }
  return totals;
}

export function countExploresPerView(explores: Iterable<Explore>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const explore of explores) {
    for (const view of explore.views) {
      counts.set(view, (counts.get(view) ?? 0) + 1);
    }
  }
  return counts;
}
