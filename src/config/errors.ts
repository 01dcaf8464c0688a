/**
 * Config error classes.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

export class ConfigValidationError extends RuntimeError {
  /** One entry per failed field, formatted `<path>: <reason>` */
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Session config validation failed: ${issues.join('; ')}`, RuntimeErrorCodes.CONFIG_VALIDATION_ERROR);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class ConfigLoadError extends RuntimeError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to read config file at ${path}: ${reason}`, RuntimeErrorCodes.CONFIG_LOAD_ERROR);
    this.name = 'ConfigLoadError';
    this.path = path;
  }
}
