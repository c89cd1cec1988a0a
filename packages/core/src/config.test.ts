import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, parseAppSettings } from './config.js';

describe('parseAppSettings', () => {
  it('fills every default from an empty section', () => {
    const settings = parseAppSettings(undefined);
    expect(settings.maxRecordsDefault).toBe(2000);
    expect(settings.rowsPerRequest).toBe(200);
    expect(settings.lowCoverageThreshold).toBe(0.25);
    expect(settings.gap).toEqual({ minTopicCagr: 0.08, maxTargetShare: 0.12, minTopicVolume: 40 });
  });

  it('rejects a coverage threshold above one', () => {
    expect(() => parseAppSettings({ low_coverage_threshold: 2 })).toThrow();
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pubintel-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads app, topics and publishers', () => {
    writeFileSync(join(dir, 'app.yaml'), 'app:\n  name: Test\n  rows_per_request: 50\n');
    writeFileSync(
      join(dir, 'topics.yaml'),
      'topics:\n  - key: lidar\n    name: LiDAR\n    keywords: [lidar]\n    negative_keywords: [lidar scanner toy]\n'
    );
    writeFileSync(join(dir, 'publishers.yaml'), 'publishers:\n  - name: SPIE\n    prefixes: ["10.1117"]\n');

    const config = loadConfig(dir);
    expect(config.settings.appName).toBe('Test');
    expect(config.settings.rowsPerRequest).toBe(50);
    expect(config.topics).toEqual([
      { key: 'lidar', name: 'LiDAR', keywords: ['lidar'], synonyms: [], negativeKeywords: ['lidar scanner toy'] }
    ]);
    expect(config.publishers).toEqual([{ name: 'SPIE', aliases: [], prefixes: ['10.1117'] }]);
  });

  it('fails on a topic without a key', () => {
    writeFileSync(join(dir, 'app.yaml'), '');
    writeFileSync(join(dir, 'topics.yaml'), 'topics:\n  - name: Nameless\n');
    writeFileSync(join(dir, 'publishers.yaml'), '');
    expect(() => loadConfig(dir)).toThrow();
  });
});
