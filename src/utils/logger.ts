/* eslint-disable no-console */
/**
 * Console logger for the validator. Writes to stderr so that a host which
 * speaks a protocol on stdout is never disturbed. Silent unless DEBUG is set.
 */

const USE_COLOR = !process.env.NO_COLOR && process.stderr.isTTY === true;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

function isDebugEnabled(): boolean {
  return Boolean(process.env.DEBUG);
}

export const logger = {
  debug(message: string): void {
    if (isDebugEnabled()) {
      console.error(`${DIM}[nodeflow-validator] ${message}${RESET}`);
    }
  },
};
