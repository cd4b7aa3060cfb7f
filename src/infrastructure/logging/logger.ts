import { loadConfig } from '../../config';

export interface Logger {
  debug(message: string): void;
}

/**
 * Console logger that prefixes every line with `[tag]`. Debug lines are
 * dropped unless CODE_INSIGHTS_DEBUG is set.
 */
export function createLogger(tag: string, debugEnabled = loadConfig().debug): Logger {
  return {
    debug(message: string): void {
      if (debugEnabled) {
        console.log(`[${tag}] ${message}`);
      }
    },
  };
}
