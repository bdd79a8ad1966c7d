/**
 * Logger that respects the verbose flag.
 *
 * @module utils/logger
 */

import * as core from '@actions/core';

export class Logger {
  constructor(private readonly verbose: boolean = false) {}

  info(message: string): void {
    core.info(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      core.debug(message);
    }
  }

  warn(message: string): void {
    core.warning(message);
  }

  error(message: string): void {
    core.error(message);
  }
}
