/**
 * MCP Server Implementation
 *
 * Exposes mapping analysis over stdio.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { AnalysisError } from '@mapcheck/core';
import { FixError } from '@mapcheck/analyzer';
import { Logger, createTraceId } from './logger.js';
import type { MappingTools } from './tools.js';

export interface ServerConfig {
  name: string;
  version: string;
  tools: MappingTools;
  logger?: Logger;
}

/** Helper to create a text content item */
function textContent(text: string) {
  return { type: 'text' as const, text };
}

/** Helper to create a success result */
function success(data: unknown) {
  return {
    content: [textContent(JSON.stringify(data, null, 2))],
  };
}

/** Helper to create an error result */
function error(message: string) {
  return {
    content: [textContent(message)],
    isError: true,
  };
}

/** Format errors for MCP response */
function formatError(err: unknown) {
  const message =
    err instanceof AnalysisError || err instanceof FixError
      ? err.toActionableMessage()
      : err instanceof Error
        ? err.message
        : String(err);
  return error(message);
}

export function createServer(config: ServerConfig): McpServer {
  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  const logger = config.logger ?? new Logger();
  const { tools } = config;

  const run = async (tool: string, handler: () => unknown) => {
    const log = logger.child({ traceId: createTraceId(), tool });
    const startTime = Date.now();
    try {
      const data = await handler();
      log.debug('Tool call completed', { durationMs: Date.now() - startTime });
      return success(data);
    } catch (err) {
      log.warn('Tool call failed', { durationMs: Date.now() - startTime, error: err });
      return formatError(err);
    }
  };

  const unitId = z.string().min(1).describe('The ID of the analysis unit');
  const diagnosticIndex = z
    .number()
    .int()
    .min(0)
    .describe('Index of the diagnostic in the latest analyze_unit result');

  // Tool: list_units
  server.registerTool(
    'list_units',
    {
      description: 'List the loaded analysis units with their shape and declaration counts.',
      annotations: { readOnlyHint: true },
    },
    async () => run('list_units', () => tools.listUnits())
  );

  // Tool: list_rules
  server.registerTool(
    'list_rules',
    {
      description: 'List every rule with its category, default severity and configured severity.',
      annotations: { readOnlyHint: true },
    },
    async () => run('list_rules', () => tools.listRules())
  );

  // Tool: get_unit
  server.registerTool(
    'get_unit',
    {
      description: 'Return the session copy of a unit, including fixes applied so far.',
      inputSchema: { unit_id: unitId },
      annotations: { readOnlyHint: true },
    },
    async (args) => run('get_unit', () => tools.getUnit(args.unit_id))
  );

  // Tool: analyze_unit
  server.registerTool(
    'analyze_unit',
    {
      description: `Analyze every mapping declaration of a unit.

Returns a summary, insights, failures and the ordered diagnostics. Each
diagnostic carries an index for suggest_fixes and apply_fix.`,
      inputSchema: { unit_id: unitId },
      annotations: { readOnlyHint: true },
    },
    async (args, extra) => run('analyze_unit', () => tools.analyzeUnit(args.unit_id, extra.signal))
  );

  // Tool: suggest_fixes
  server.registerTool(
    'suggest_fixes',
    {
      description: 'List the independent fixes for one diagnostic, with equivalence keys and previews.',
      inputSchema: { unit_id: unitId, diagnostic_index: diagnosticIndex },
      annotations: { readOnlyHint: true },
    },
    async (args) => run('suggest_fixes', () => tools.suggestFixes(args.unit_id, args.diagnostic_index))
  );

  // Tool: apply_fix
  server.registerTool(
    'apply_fix',
    {
      description: `Apply one fix to the session copy of a unit and re-analyze it.

Diagnostic indexes change after a fix; use the returned diagnostics for the next call.`,
      inputSchema: {
        unit_id: unitId,
        diagnostic_index: diagnosticIndex,
        equivalence_key: z.string().min(1).describe('equivalence_key from suggest_fixes'),
      },
      annotations: { readOnlyHint: false, idempotentHint: true },
    },
    async (args) =>
      run('apply_fix', () => tools.applyFix(args.unit_id, args.diagnostic_index, args.equivalence_key))
  );

  return server;
}

export async function runServer(config: ServerConfig): Promise<void> {
  const logger = config.logger ?? new Logger();
  const server = createServer({ ...config, logger });
  const transport = new StdioServerTransport();

  const shutdown = async (signal: string) => {
    try {
      await server.close();
      logger.info('Shutdown complete', { signal });
    } finally {
      process.exit(0);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(transport);

  logger.info('MCP server started', {
    name: config.name,
    version: config.version,
    transport: 'stdio',
    units: config.tools.listUnits().units.map((u) => u.id),
  });
}
