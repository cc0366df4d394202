/**
 * Error taxonomy for a build.
 *
 * Fatal errors (config, write) abort the build; the others are caught at the
 * per-item boundary and end up in `BuildResult.errors`.
 */

import type { BuildError, ErrorKind } from "./types.js";

export abstract class SiteError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly fatal: boolean;
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = this.constructor.name;
    this.path = path;
  }

  toBuildError(): BuildError {
    return this.path === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, path: this.path, message: this.message };
  }
}

/** Malformed or unreadable site configuration. */
export class ConfigError extends SiteError {
  readonly kind = "ConfigError";
  readonly fatal = true;
}

/** A content file that could not be decoded or whose header did not parse. */
export class LoadError extends SiteError {
  readonly kind = "LoadError";
  readonly fatal = false;

  constructor(path: string, reason: string) {
    super(reason, path);
  }
}

/** The markup converter failed, rejected the input, or timed out. */
export class ConversionError extends SiteError {
  readonly kind = "ConversionError";
  readonly fatal = false;

  constructor(path: string, message: string) {
    super(message, path);
  }
}

export class TemplateNotFoundError extends SiteError {
  readonly kind = "TemplateNotFoundError";
  readonly fatal = false;

  constructor(
    readonly requestedName: string,
    readonly itemPath: string,
  ) {
    super(`template "${requestedName}" not found on the template search path`, itemPath);
  }
}

/** Template engine failure, or a page that cannot be placed in the output tree. */
export class RenderError extends SiteError {
  readonly kind = "RenderError";
  readonly fatal = false;

  constructor(
    message: string,
    path?: string,
    readonly templateId?: string,
  ) {
    super(templateId ? `${templateId}: ${message}` : message, path);
  }
}

/** The output tree could not be written. */
export class WriteError extends SiteError {
  readonly kind = "WriteError";
  readonly fatal = true;

  constructor(path: string, message: string) {
    super(message, path);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
