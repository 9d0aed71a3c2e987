/**
 * Console Output Adapter (Default)
 *
 * Plain console.log-based implementation of OutputPort.
 * Used when the host does not hand the plugin an IO of its own.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  warn(message: string): void {
    console.log(`⚠ ${message}`);
  }
};
