/**
 * ProgressSink - advisory status notifications from the path search.
 * Notifications never take part in control flow.
 */

import type { Logger } from '../../shared/logger.js';

export interface ProgressSink {
  notify(message: string): void;
}

export const silentProgressSink: ProgressSink = {
  notify() {},
};

/** Sends notifications to the diagnostic logger (stderr), never to stdout. */
export function createLoggerProgressSink(logger: Logger): ProgressSink {
  return {
    notify(message: string) {
      logger.info(message);
    },
  };
}

/**
 * Wrap a sink so a failing notification cannot break the search.
 */
export function guardProgressSink(sink: ProgressSink, logger: Logger): ProgressSink {
  return {
    notify(message: string) {
      try {
        sink.notify(message);
      } catch (err) {
        logger.debug(
          `Progress notification dropped: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    },
  };
}
