import dotenv from 'dotenv';
import os from 'os';
import { findProjectRoot } from './utils/find_project_root';
import type { ProjectSettings } from './lookml/types';

// Don't override existing environment variables (important for tests)
// In test mode, try to load .env.test (if it exists), otherwise skip .env to avoid interference
const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
dotenv.config({ path: envFile, override: false });

export const projectRoot = findProjectRoot(__dirname);

export const projectConfig: ProjectSettings = {
  defaultProject: process.env.LOOKML_DEFAULT_PROJECT || 'company-dwh',
  defaultDataset: process.env.LOOKML_DEFAULT_DATASET || 'analytics_prod',
  snapshotProject: process.env.LOOKML_SNAPSHOT_PROJECT || 'company-dwh-snapshot',
  snapshotDataset: process.env.LOOKML_SNAPSHOT_DATASET || 'analytics_prod_snapshots',
};

export const analysisConfig = {
  readConcurrency: parseInt(process.env.READ_CONCURRENCY || `${Math.max(1, Math.floor(os.cpus().length / 2))}`, 10),
  outputDir: process.env.OUTPUT_DIR || '.',
};

export const otelConfig = {
  enabled: process.env.OTEL_LOGGING_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'lookml-table-provenance',
  endpoint:
    process.env.OTEL_EXPORTER_OTLP_LOGS_ENDPOINT || process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318',
  headers: process.env.OTEL_EXPORTER_OTLP_HEADERS || '',
};
