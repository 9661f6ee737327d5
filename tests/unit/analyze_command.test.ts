import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { analyze, analyzeCommand, parseAnalyzeOptions } from '../../src/commands/analyze_command';
import { exportCommand } from '../../src/report/export_commands';

const fixtureProject = path.resolve(__dirname, '../fixtures/lookml_project');
const usageFile = path.resolve(__dirname, '../fixtures/explore_usage.csv');

const baseOptions = {
  defaultProject: 'wh',
  defaultDataset: 'core',
  snapshotProject: 'wh-snapshot',
  snapshotDataset: 'core_snap',
  includeSourceInfo: false,
  concurrency: 2,
};

describe('analyze_command', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = path.join(os.tmpdir(), `analyze-command-test-${process.pid}-${Date.now()}`);
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  describe('WHEN given usage data and an export bucket', () => {
    it('SHOULD write the view report ordered by usage', async () => {
      const { outputFiles } = await analyze(fixtureProject, {
        ...baseOptions,
        outputDir,
        exploreUsageFile: usageFile,
        exportGsBucket: 'test-bucket',
      });

      expect(outputFiles).toEqual([
        path.join(outputDir, 'view_analysis.csv'),
        path.join(outputDir, 'export_command.txt'),
        path.join(outputDir, 'export_command_active.txt'),
      ]);
      expect(fs.readFileSync(path.join(outputDir, 'view_analysis.csv'), 'utf-8')).toBe(
        [
          'view_name,explore_count,calculated_usage,table_name,citation_type,additional_tables',
          'customers,1,1200,shop-proj.crm.customers,native,',
          'orders,1,1200,shop-proj.sales.orders,native,',
          'orders__items,1,1200,,unnest,',
          'buyers,1,1200,shop-proj.crm.customers,derived_from,',
          'dim_region_v2,1,30,wh.core.dim_region,derived,',
          'order_summary,1,30,shop-proj.sales.orders,derived_sql,shop-proj.crm.customers',
          'customer_rollup,0,0,,derived_explore,',
          '',
        ].join('\n')
      );
    });

    it('SHOULD write one export script per distinct table', async () => {
      await analyze(fixtureProject, {
        ...baseOptions,
        outputDir,
        exploreUsageFile: usageFile,
        exportGsBucket: 'test-bucket',
      });

      const expected = [
        exportCommand('test-bucket', 'wh', 'crm', 'customers'),
        exportCommand('test-bucket', 'wh', 'sales', 'orders'),
        exportCommand('test-bucket', 'wh', 'core', 'dim_region'),
      ].join('');
      expect(fs.readFileSync(path.join(outputDir, 'export_command.txt'), 'utf-8')).toBe(expected);
      expect(fs.readFileSync(path.join(outputDir, 'export_command_active.txt'), 'utf-8')).toBe(expected);
    });
  });

  describe('WHEN run without usage data', () => {
    it('SHOULD report NULL usage ordered by explore count then view name', async () => {
      const { rows, outputFiles } = await analyze(fixtureProject, { ...baseOptions, outputDir, includeSourceInfo: true });

      expect(outputFiles).toEqual([path.join(outputDir, 'view_analysis.csv')]);
      expect(rows.map((row) => row.viewName)).toEqual([
        'orders__items',
        'orders',
        'order_summary',
        'dim_region_v2',
        'customers',
        'buyers',
        'customer_rollup',
      ]);
      const lines = fs.readFileSync(path.join(outputDir, 'view_analysis.csv'), 'utf-8').split('\n');
      expect(lines).toContain('customers,1,NULL,shop-proj.crm.customers,native,,sql_table_name,shop-proj.crm.customers');
    });
  });

  describe('WHEN the input is invalid', () => {
    it('SHOULD reject a non-positive concurrency', () => {
      expect(() => parseAnalyzeOptions({ ...baseOptions, outputDir: '.', concurrency: 0 })).toThrow(
        'Invalid options: concurrency: Number must be greater than 0'
      );
    });

    it('SHOULD reject a missing project directory', async () => {
      const missing = path.join(outputDir, 'nope');
      await expect(analyze(missing, { ...baseOptions, outputDir })).rejects.toThrow(
        `LookML project directory not found: ${missing}`
      );
    });
  });

  describe('WHEN invoked through the command line', () => {
    it('SHOULD parse flags into analysis options', async () => {
      await analyzeCommand.parseAsync(
        [
          fixtureProject,
          '--output-dir',
          outputDir,
          '--default-project',
          'wh',
          '--default-dataset',
          'core',
          '--concurrency',
          '3',
        ],
        { from: 'user' }
      );

      const report = fs.readFileSync(path.join(outputDir, 'view_analysis.csv'), 'utf-8');
      expect(report.split('\n')).toContain('dim_region_v2,1,NULL,wh.core.dim_region,derived,');
    });
  });
});
