/**
 * threatreg — MCP Pattern Tools
 *
 * パターン / 条件の CRUD ツール。書き込みは全て PatternCatalog を経由し、
 * 参照チェック・条件バリデーション・トランザクションはそちらに任せる。
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { PatternCatalog } from '../../engine/pattern/catalog.js';
import { errorResult, runTool } from './result.js';

/**
 * 条件の入力スキーマ。conditionType / operator は文字列のまま受け取り、
 * 列挙値の検証は catalog 側（InvalidEnum）で行う。
 */
const conditionShape = {
  conditionType: z
    .string()
    .describe(
      'PRODUCT | PRODUCT_ID | PRODUCT_TAG | TAG | RELATIONSHIP | RELATIONSHIP_TARGET_ID | RELATIONSHIP_TARGET_TAG',
    ),
  operator: z
    .string()
    .describe(
      'EQUALS | NOT_EQUALS | CONTAINS | NOT_CONTAINS | EXISTS | NOT_EXISTS | HAS_RELATIONSHIP_WITH | NOT_HAS_RELATIONSHIP_WITH',
    ),
  value: z.string().optional().describe('Tag name, target id, product name, ...'),
  relationshipType: z
    .string()
    .optional()
    .describe('Relationship type, required for RELATIONSHIP* condition types'),
};

export function registerPatternTools(server: McpServer, db: Database.Database): void {
  const catalog = new PatternCatalog(db);

  // 1. create_pattern
  server.tool(
    'create_pattern',
    'Create a threat pattern, optionally together with its conditions in one atomic step',
    {
      name: z.string().min(1).describe('Pattern name'),
      description: z.string().optional(),
      threatId: z.string().describe('UUID of the threat this pattern flags'),
      isActive: z.boolean().default(true),
      conditions: z.array(z.object(conditionShape)).default([]),
    },
    async ({ name, description, threatId, isActive, conditions }) =>
      runTool(() =>
        catalog.createPatternWithConditions({ name, description, threatId, isActive }, conditions),
      ),
  );

  // 2. get_pattern
  server.tool(
    'get_pattern',
    'Get a threat pattern with its ordered conditions',
    { id: z.string().describe('Pattern UUID') },
    async ({ id }) => runTool(() => catalog.getPattern(id)),
  );

  // 3. update_pattern
  server.tool(
    'update_pattern',
    'Update the supplied fields of a threat pattern',
    {
      id: z.string().describe('Pattern UUID'),
      name: z.string().min(1).optional(),
      description: z.string().optional(),
      threatId: z.string().optional(),
      isActive: z.boolean().optional(),
    },
    async ({ id, name, description, threatId, isActive }) =>
      runTool(() => catalog.updatePattern(id, { name, description, threatId, isActive })),
  );

  // 4. delete_pattern
  server.tool(
    'delete_pattern',
    'Delete a threat pattern and its conditions. Deleting an unknown id succeeds.',
    { id: z.string().describe('Pattern UUID') },
    async ({ id }) =>
      runTool(() => {
        catalog.deletePattern(id);
        return { deleted: id };
      }),
  );

  // 5. list_patterns
  server.tool(
    'list_patterns',
    'List threat patterns: all, only active ones, or those of one threat',
    {
      filter: z.enum(['all', 'active', 'threat']).default('all'),
      threatId: z.string().optional().describe('Required when filter is "threat"'),
    },
    async ({ filter, threatId }) => {
      switch (filter) {
        case 'all':
          return runTool(() => catalog.listPatterns());
        case 'active':
          return runTool(() => catalog.listActivePatterns());
        case 'threat':
          if (!threatId) {
            return errorResult('threatId parameter required for filter "threat"');
          }
          return runTool(() => catalog.listPatternsByThreat(threatId));
      }
    },
  );

  // 6. add_condition
  server.tool(
    'add_condition',
    'Append a condition to an existing threat pattern',
    { patternId: z.string().describe('Pattern UUID'), ...conditionShape },
    async (input) => runTool(() => catalog.createCondition(input)),
  );

  // 7. update_condition
  server.tool(
    'update_condition',
    'Update the supplied fields of a condition; the result is re-validated',
    {
      id: z.string().describe('Condition UUID'),
      conditionType: z.string().optional(),
      operator: z.string().optional(),
      value: z.string().optional(),
      relationshipType: z.string().optional(),
    },
    async ({ id, ...input }) => runTool(() => catalog.updateCondition(id, input)),
  );

  // 8. delete_condition
  server.tool(
    'delete_condition',
    'Delete a condition. Deleting an unknown id succeeds.',
    { id: z.string().describe('Condition UUID') },
    async ({ id }) =>
      runTool(() => {
        catalog.deleteCondition(id);
        return { deleted: id };
      }),
  );
}
