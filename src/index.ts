#!/usr/bin/env node
/**
 * threatreg — Threat pattern registry
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで接続するため、ログは stderr に出す。
 */

import Database from 'better-sqlite3';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createLogger, setLogLevel } from './logger.js';
import { migrateDatabase } from './db/migrate.js';
import { createMcpServer } from './mcp/server.js';

// pino の child ロガーは生成時のレベルを引き継ぐ。
// createLogger() を呼ぶもの（migrateDatabase, createMcpServer 等）より先にレベルを確定させる。
const config = loadConfig();
setLogLevel(config.logLevel);
const logger = createLogger('main');

const db = new Database(config.dbPath);
migrateDatabase(db);

const server = createMcpServer(db);
const transport = new StdioServerTransport();
await server.connect(transport);
logger.info({ dbPath: config.dbPath }, 'threatreg MCP server listening on stdio');
