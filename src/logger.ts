import { LogEngine, LogMode } from '@wgtechlabs/log-engine';

LogEngine.configure({ mode: LogMode.INFO });

/** Level names accepted by config, env and the MCP surface. */
export const LOG_MODES = {
  debug: LogMode.DEBUG,
  info: LogMode.INFO,
  warn: LogMode.WARN,
  error: LogMode.ERROR,
  silent: LogMode.SILENT,
  off: LogMode.OFF,
} as const;

export type LogModeName = keyof typeof LOG_MODES;

/**
 * Change the active log level at runtime.
 * Unknown names are ignored.
 */
export function setLogMode(level: LogModeName | LogMode): void {
  const mode = typeof level === 'string' ? LOG_MODES[level] : level;
  if (mode === undefined) return;
  LogEngine.configure({ mode });
}

export const logger = LogEngine;
export { LogMode };
