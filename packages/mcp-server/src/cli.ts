#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   mapcheck --config ./mapcheck.json [--format text|json]
 *   mapcheck --config ./mapcheck.json --serve
 */

import { createMappingAnalyzer } from '@mapcheck/analyzer';
import { loadConfig, toAnalyzerOptions } from './config.js';
import { Logger } from './logger.js';
import { USAGE, UsageError, analyzeAll, hasErrors, parseArgs, renderReports } from './run.js';
import { runServer } from './server.js';
import { MappingTools } from './tools.js';
import { loadUnits } from './unit-loader.js';
import { UnitStore } from './unit-store.js';

async function main(): Promise<void> {
  let logger = new Logger();

  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.help || !args.configPath) {
      console.error(USAGE);
      process.exit(args.help ? 0 : 1);
    }

    const loaded = await loadConfig(args.configPath);
    const { config } = loaded;
    logger = new Logger({
      level: config.server?.logging?.level,
      format: config.server?.logging?.format,
    });

    const units = await loadUnits(loaded);
    const analyzer = createMappingAnalyzer(
      toAnalyzerOptions(config.analyzer),
      logger.child({ component: 'analyzer' })
    );
    logger.debug('Units loaded', { units: units.map((u) => u.unit.id) });

    if (args.serve) {
      const store = new UnitStore();
      for (const { unit, origin } of units) store.add(unit, origin);

      await runServer({
        name: config.server?.name ?? 'mapcheck',
        version: config.server?.version ?? '0.1.0',
        tools: new MappingTools(store, analyzer),
        logger,
      });
      return;
    }

    const reports = await analyzeAll(
      analyzer,
      units.map((u) => u.unit)
    );
    process.stdout.write(`${renderReports(reports, args.format)}\n`);
    process.exitCode = hasErrors(reports) ? 1 : 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else {
      logger.error('mapcheck failed', { error });
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
