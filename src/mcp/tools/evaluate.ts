/**
 * threatreg — MCP Evaluate Tool
 *
 * Single 'evaluate_patterns' tool; which ids are given selects the granularity:
 *   instanceId + patternId -> one pair
 *   instanceId             -> one instance vs. all active patterns
 *   (none)                 -> every instance vs. all active patterns
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { createMatchingEngine, matchesToRecord } from '../../engine/pattern/index.js';
import { errorResult, runTool } from './result.js';

export function registerEvaluateTool(server: McpServer, db: Database.Database): void {
  const engine = createMatchingEngine(db);

  server.tool(
    'evaluate_patterns',
    'Evaluate instances against active threat patterns and return the matches',
    {
      instanceId: z.string().optional().describe('Restrict evaluation to one instance'),
      patternId: z
        .string()
        .optional()
        .describe('Evaluate a single pattern (requires instanceId)'),
    },
    async ({ instanceId, patternId }) => {
      if (instanceId === undefined) {
        if (patternId !== undefined) {
          return errorResult('patternId requires instanceId');
        }
        return runTool(() => matchesToRecord(engine.evaluateAllAgainstActivePatterns()));
      }
      if (patternId !== undefined) {
        return runTool(() => engine.evaluateOne(instanceId, patternId));
      }
      return runTool(() => engine.evaluateInstanceAgainstActivePatterns(instanceId));
    },
  );
}
