import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, expandEnvVars, loadConfig, parseConfig, toAnalyzerOptions } from '../src/config.js';

let tmpDir = '';

afterEach(() => {
  delete process.env.MAPCHECK_TEST_LEVEL;
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('expandEnvVars', () => {
  it('substitutes variables and defaults in nested values', () => {
    process.env.MAPCHECK_TEST_LEVEL = 'debug';

    const expanded = expandEnvVars({
      server: { logging: { level: '${MAPCHECK_TEST_LEVEL}', format: '${MAPCHECK_TEST_FORMAT:-json}' } },
      units: [{ path: './units/${MAPCHECK_TEST_UNIT:-orders}.json' }],
      analyzer: { performanceWarnings: true },
    });

    expect(expanded).toEqual({
      server: { logging: { level: 'debug', format: 'json' } },
      units: [{ path: './units/orders.json' }],
      analyzer: { performanceWarnings: true },
    });
  });

  it('fails on a missing variable without a default', () => {
    expect(configError(() => expandEnvVars('${MAPCHECK_TEST_ABSENT}')).message).toBe(
      'Missing required environment variable: MAPCHECK_TEST_ABSENT'
    );
  });

  it('can leave missing variables in place', () => {
    expect(expandEnvVars('${MAPCHECK_TEST_ABSENT}', { allowMissing: true })).toBe('${MAPCHECK_TEST_ABSENT}');
  });
});

describe('parseConfig', () => {
  it('accepts a minimal config', () => {
    expect(parseConfig({ units: [{ path: 'orders.json' }] })).toEqual({ units: [{ path: 'orders.json' }] });
  });

  it('rejects unknown rule ids', () => {
    const err = configError(() =>
      parseConfig({ analyzer: { rules: { NoSuchRule: 'off' } }, units: [{ path: 'orders.json' }] })
    );
    expect(err.message).toBe('Invalid mapcheck config:\n- analyzer.rules.NoSuchRule: Unknown rule id: NoSuchRule');
  });

  it('rejects duplicate unit paths', () => {
    const err = configError(() => parseConfig({ units: [{ path: 'a.json' }, { path: 'a.json' }] }));
    expect(err.message).toBe('Invalid mapcheck config:\n- units.1.path: Duplicate unit path: a.json');
  });

  it('rejects unknown keys and empty unit lists', () => {
    expect(() => parseConfig({ units: [{ path: 'a.json' }], extra: true })).toThrow(ConfigError);
    expect(() => parseConfig({ units: [] })).toThrow(ConfigError);
  });
});

describe('toAnalyzerOptions', () => {
  it('keeps only the settings that were given', () => {
    const config = parseConfig({
      analyzer: {
        rules: { RedundantMapFrom: 'off', MultipleEnumeration: 'error' },
        nonDeterministicSeverity: 'warning',
        dependencyPatterns: { dataAccess: ['Warehouse'] },
      },
      units: [{ path: 'orders.json' }],
    });

    expect(toAnalyzerOptions(config.analyzer)).toEqual({
      rules: { RedundantMapFrom: 'off', MultipleEnumeration: 'error' },
      nonDeterministicSeverity: 'warning',
      dependencyPatterns: { dataAccess: ['Warehouse'] },
    });
    expect(toAnalyzerOptions(undefined)).toEqual({});
  });
});

describe('loadConfig', () => {
  it('reads a config file with a byte order mark', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mapcheck-config-'));
    const filePath = join(tmpDir, 'mapcheck.json');
    writeFileSync(filePath, `\uFEFF${JSON.stringify({ units: [{ path: 'units/orders.json' }] })}`);

    const loaded = await loadConfig(filePath);

    expect(loaded.path).toBe(filePath);
    expect(loaded.config.units).toEqual([{ path: 'units/orders.json' }]);
  });

  it('reports malformed JSON as a config error', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mapcheck-config-'));
    const filePath = join(tmpDir, 'mapcheck.json');
    writeFileSync(filePath, '{ "units": [');

    await expect(loadConfig(filePath)).rejects.toThrow(`Config file ${filePath} is not valid JSON`);
  });
});
