/**
 * threatreg — MCP Inventory Tools
 *
 * Tools for seeding the threat catalog and the instance inventory
 * that patterns are evaluated against.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ThreatRepository } from '../../db/repository/threat-repository.js';
import { ProductRepository } from '../../db/repository/product-repository.js';
import { InstanceRepository } from '../../db/repository/instance-repository.js';
import { TagRepository } from '../../db/repository/tag-repository.js';
import { RelationshipRepository } from '../../db/repository/relationship-repository.js';
import { errorResult, jsonResult } from './result.js';

export function registerInventoryTools(server: McpServer, db: Database.Database): void {
  const threatRepo = new ThreatRepository(db);
  const productRepo = new ProductRepository(db);
  const instanceRepo = new InstanceRepository(db);
  const tagRepo = new TagRepository(db);
  const relationshipRepo = new RelationshipRepository(db);

  // 1. add_threat
  server.tool(
    'add_threat',
    'Add a threat to the catalog',
    {
      title: z.string().min(1).describe('Threat title'),
      description: z.string().optional().describe('Threat description'),
    },
    async ({ title, description }) => jsonResult(threatRepo.create({ title, description })),
  );

  // 2. add_product
  server.tool(
    'add_product',
    'Add a product (component type)',
    {
      name: z.string().min(1).describe('Product name'),
      description: z.string().optional().describe('Product description'),
    },
    async ({ name, description }) => jsonResult(productRepo.create({ name, description })),
  );

  // 3. add_instance
  server.tool(
    'add_instance',
    'Add an instance of an existing product',
    {
      name: z.string().min(1).describe('Instance name'),
      productId: z.string().describe('Product UUID this instance is built from'),
    },
    async ({ name, productId }) => {
      if (productRepo.findById(productId) === undefined) {
        return errorResult(`Product not found: ${productId}`);
      }
      return jsonResult(instanceRepo.create({ name, instanceOf: productId }));
    },
  );

  // 4. add_tag
  server.tool(
    'add_tag',
    'Create a tag, or return the existing tag with the same name',
    {
      name: z.string().min(1).describe('Tag name'),
      description: z.string().optional(),
      color: z
        .string()
        .regex(/^#[0-9A-Fa-f]{6}$/)
        .optional()
        .describe('Hex color such as #FF0000'),
    },
    async ({ name, description, color }) => {
      const existing = tagRepo.findByName(name);
      if (existing) {
        return jsonResult(existing);
      }
      return jsonResult(tagRepo.create({ name, description, color }));
    },
  );

  // 5. assign_tag
  server.tool(
    'assign_tag',
    'Assign a tag to exactly one instance or product',
    {
      tagId: z.string().describe('Tag UUID'),
      instanceId: z.string().optional().describe('Instance UUID'),
      productId: z.string().optional().describe('Product UUID'),
    },
    async ({ tagId, instanceId, productId }) => {
      if ((instanceId === undefined) === (productId === undefined)) {
        return errorResult('Exactly one of instanceId or productId is required');
      }
      if (tagRepo.findById(tagId) === undefined) {
        return errorResult(`Tag not found: ${tagId}`);
      }
      if (instanceId !== undefined) {
        if (instanceRepo.findById(instanceId) === undefined) {
          return errorResult(`Instance not found: ${instanceId}`);
        }
        tagRepo.assignToInstance(tagId, instanceId);
        return jsonResult({ tagId, instanceId, tags: tagRepo.findByInstance(instanceId) });
      }
      if (productId !== undefined) {
        if (productRepo.findById(productId) === undefined) {
          return errorResult(`Product not found: ${productId}`);
        }
        tagRepo.assignToProduct(tagId, productId);
        return jsonResult({ tagId, productId, tags: tagRepo.findByProduct(productId) });
      }
      return errorResult('Exactly one of instanceId or productId is required');
    },
  );

  // 6. add_relationship
  server.tool(
    'add_relationship',
    'Add a directed, typed relationship from an instance to another instance or a product',
    {
      type: z.string().min(1).describe('Relationship type, e.g. "connects_to"'),
      fromInstanceId: z.string().describe('Source instance UUID'),
      toInstanceId: z.string().optional().describe('Target instance UUID'),
      toProductId: z.string().optional().describe('Target product UUID'),
    },
    async ({ type, fromInstanceId, toInstanceId, toProductId }) => {
      if ((toInstanceId === undefined) === (toProductId === undefined)) {
        return errorResult('Exactly one of toInstanceId or toProductId is required');
      }
      if (instanceRepo.findById(fromInstanceId) === undefined) {
        return errorResult(`Instance not found: ${fromInstanceId}`);
      }
      if (toInstanceId !== undefined && instanceRepo.findById(toInstanceId) === undefined) {
        return errorResult(`Instance not found: ${toInstanceId}`);
      }
      if (toProductId !== undefined && productRepo.findById(toProductId) === undefined) {
        return errorResult(`Product not found: ${toProductId}`);
      }
      return jsonResult(
        relationshipRepo.create({ type, fromInstanceId, toInstanceId, toProductId }),
      );
    },
  );
}
