/**
 * threatreg — Logger
 *
 * pino のルートロガーとモジュール別 child ロガー。
 * stdout は MCP stdio トランスポートが使うため、ログは stderr (fd 2) に出す。
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const rootLogger: Logger = pino({ name: 'threatreg', level: 'info' }, pino.destination(2));

/**
 * ルートロガーのレベルを変更する。
 * child ロガーは生成時のレベルを引き継ぐので、起動直後に呼ぶこと。
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

/** モジュール名を付与した child ロガーを返す。 */
export function createLogger(name: string): Logger {
  return rootLogger.child({ module: name });
}
