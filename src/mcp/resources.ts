/**
 * threatreg — MCP Resources
 *
 * Read-only views of the pattern catalog and the current matches.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { ThreatPatternRepository } from '../db/repository/threat-pattern-repository.js';
import { createMatchingEngine, matchesToRecord } from '../engine/pattern/index.js';

export function registerResources(server: McpServer, db: Database.Database): void {
  const patternRepo = new ThreatPatternRepository(db);
  const engine = createMatchingEngine(db);

  // 1. threatreg://patterns — all patterns with their conditions
  server.resource(
    'patterns',
    'threatreg://patterns',
    { description: 'All threat patterns with their ordered conditions' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(patternRepo.findAll(), null, 2),
        },
      ],
    }),
  );

  // 2. threatreg://matches — every instance evaluated against the active patterns
  server.resource(
    'matches',
    'threatreg://matches',
    { description: 'Current matches of every instance against the active threat patterns' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(matchesToRecord(engine.evaluateAllAgainstActivePatterns()), null, 2),
        },
      ],
    }),
  );
}
