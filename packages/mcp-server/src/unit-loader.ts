/**
 * Loads analysis units named by the config file
 *
 * Units are JSON documents written by a declaration collector. Paths are
 * resolved against the config file's directory.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { AnalysisError, parseAnalysisUnit, type AnalysisUnit } from '@mapcheck/core';
import { ConfigError, type LoadedConfig } from './config.js';

export interface LoadedUnit {
  unit: AnalysisUnit;
  /** Absolute path the unit was read from */
  origin: string;
}

export async function loadUnitFile(path: string): Promise<AnalysisUnit> {
  const content = await readFile(path, 'utf-8');
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new AnalysisError({
      code: 'INVALID_UNIT',
      message: `Unit file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      suggestion: 'Regenerate the unit file',
      ...(err instanceof Error ? { cause: err } : {}),
    });
  }

  return parseAnalysisUnit(parsed, path);
}

export async function loadUnits(loaded: LoadedConfig): Promise<LoadedUnit[]> {
  const baseDir = dirname(loaded.path);
  const units: LoadedUnit[] = [];
  const seen = new Map<string, string>();

  for (const entry of loaded.config.units) {
    const origin = resolve(baseDir, entry.path);
    const unit = await loadUnitFile(origin);

    const previous = seen.get(unit.id);
    if (previous) {
      throw new ConfigError(`Duplicate unit id '${unit.id}' in ${previous} and ${origin}`);
    }
    seen.set(unit.id, origin);
    units.push({ unit, origin });
  }

  return units;
}
