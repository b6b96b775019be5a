import type { CliLogger } from '../../src/cli/logger.js';

export type CapturedLines = {
  info: string[];
  success: string[];
  warning: string[];
  error: string[];
  debug: string[];
};

export function createCaptureLogger(): { logger: CliLogger; lines: CapturedLines } {
  const lines: CapturedLines = { info: [], success: [], warning: [], error: [], debug: [] };
  const logger: CliLogger = {
    info: (msg) => lines.info.push(msg),
    success: (msg) => lines.success.push(msg),
    warning: (msg) => lines.warning.push(msg),
    error: (msg) => lines.error.push(msg),
    debug: (msg) => lines.debug.push(msg)
  };
  return { logger, lines };
}
