/**
 * threatreg — MCP tool result helpers
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { RegistryError } from '../../types/errors.js';

/** Serialize a value as pretty-printed JSON text content. */
export function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Run a tool body and return its value as JSON.
 * RegistryErrors become isError results; anything else propagates to the SDK.
 */
export function runTool(fn: () => unknown): CallToolResult {
  try {
    return jsonResult(fn());
  } catch (error) {
    if (error instanceof RegistryError) {
      return errorResult(`${error.name}: ${error.message}`);
    }
    throw error;
  }
}
