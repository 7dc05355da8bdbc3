/**
 * Custom Error Classes for Insight Bank Kit
 */

import type { BankIssue } from './types.js';

/**
 * Error thrown when a bank document fails structural validation
 */
export class BankValidationError extends Error {
  public readonly path: string;
  public readonly issues: BankIssue[];

  constructor(path: string, issues: BankIssue[]) {
    const errors = issues.filter(issue => issue.severity === 'error');
    const first = errors[0]?.message ?? 'no banks found';
    super(
      `Bank document ${path} failed validation with ${errors.length} error(s): ${first}`
    );
    this.name = 'BankValidationError';
    this.path = path;
    this.issues = issues;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BankValidationError);
    }
  }
}

/**
 * Error thrown when an archive file cannot be read or written
 */
export class ArchiveParseError extends Error {
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Archive file ${path}: ${reason}`);
    this.name = 'ArchiveParseError';
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Error thrown when an LLM did not produce a usable bank within the allowed attempts
 */
export class GenerationError extends Error {
  public readonly number: number;
  public readonly attempts: number;
  public readonly lastReason: string;

  constructor(number: number, attempts: number, lastReason: string) {
    super(
      `Could not generate a valid bank for number ${number} after ${attempts} attempt(s). ` +
      `Last problem: ${lastReason}`
    );
    this.name = 'GenerationError';
    this.number = number;
    this.attempts = attempts;
    this.lastReason = lastReason;
  }
}

/**
 * Error thrown when configuration is missing or contradictory
 */
export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Error thrown when the insight catalog cannot complete an operation
 */
export class CatalogError extends Error {
  public readonly operation: string;

  constructor(operation: string, reason: string) {
    super(`Catalog ${operation} failed: ${reason}`);
    this.name = 'CatalogError';
    this.operation = operation;
  }
}
