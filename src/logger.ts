/**
 * Console logger with verbose and silent modes.
 * - info()/success(): always printed
 * - debug(): only with --verbose
 * - warn()/error(): stderr
 */

import pc from "picocolors";

export interface LoggerConfig {
  verbose?: boolean;
  silent?: boolean;
}

const PREFIX = "[quire]";

export class Logger {
  private verbose: boolean;
  private readonly silent: boolean;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
    this.silent = config?.silent ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string): void {
    if (this.silent) return;
    console.log(`${pc.dim(PREFIX)} ${message}`);
  }

  success(message: string): void {
    if (this.silent) return;
    console.log(`${pc.dim(PREFIX)} ${pc.green(message)}`);
  }

  debug(message: string): void {
    if (this.silent || !this.verbose) return;
    console.log(`${pc.dim(PREFIX)} ${pc.dim(`DEBUG: ${message}`)}`);
  }

  warn(message: string): void {
    if (this.silent) return;
    console.warn(`${pc.dim(PREFIX)} ${pc.yellow(`WARNING: ${message}`)}`);
  }

  error(message: string): void {
    if (this.silent) return;
    console.error(`${pc.dim(PREFIX)} ${pc.red(`ERROR: ${message}`)}`);
  }
}

let loggerInstance: Logger | null = null;

export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  }
  return loggerInstance;
}
