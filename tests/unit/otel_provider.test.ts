import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { projectRoot } from '../../src/config';
import { getLoggerProvider, getServiceVersion, parseHeaders } from '../../src/utils/otel_provider';

describe('otel_provider', () => {
  describe('parseHeaders', () => {
    it('SHOULD split comma-separated key=value pairs and trim them', () => {
      expect(parseHeaders('Authorization=ApiKey test-secret, x-team = data ')).toEqual({
        Authorization: 'ApiKey test-secret',
        'x-team': 'data',
      });
    });

    it('SHOULD ignore empty input and entries without a value', () => {
      expect(parseHeaders('')).toEqual({});
      expect(parseHeaders('broken,ok=1')).toEqual({ ok: '1' });
    });
  });

  describe('getServiceVersion', () => {
    it('SHOULD read the version from the package manifest', () => {
      const manifest: unknown = JSON.parse(fs.readFileSync(path.join(projectRoot, 'package.json'), 'utf-8'));
      expect(manifest).toMatchObject({ version: getServiceVersion() });
    });
  });

  describe('getLoggerProvider', () => {
    it('SHOULD return null when OTel logging is disabled', () => {
      expect(getLoggerProvider()).toBeNull();
    });
  });
});
