/**
 * LeanDoc Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LeanDocErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all LeanDoc errors.
 * Provides structured data for host applications to format as needed.
 */
export class LeanDocError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LeanDocErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LeanDocError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LeanDocErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LeanDocErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function assertCategory(errorId: string, category: string): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** Structural errors raised while building the document tree */
export class ParseError extends LeanDocError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Violations of the consumer contract, and front-end failures */
export class ContractError extends LeanDocError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'check');
    super({ errorId, message, location, context });
    this.name = 'ContractError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

function renderDefinition(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

/** ParseError with the registry message of `errorId` */
export function createParseError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): ParseError {
  const message = renderDefinition(errorId, context);
  return new ParseError(errorId, message, location, context);
}

/** ContractError with the registry message of `errorId` */
export function createContractError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): ContractError {
  const message = renderDefinition(errorId, context);
  return new ContractError(errorId, message, location, context);
}

/**
 * Create an error from the registry, rendering its message template with
 * `context`. The concrete class follows the definition's category.
 *
 * @throws TypeError if errorId is not in the registry
 *
 * @example
 * createError('LEANDOC-P001', { delimiter: '----' }, location)
 * // ParseError: "Expected closing delimiter ---- at 4:1"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): LeanDocError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  if (definition.category === 'parse') {
    if (!location) {
      throw new TypeError(`Parse error ${errorId} requires a location`);
    }
    return createParseError(errorId, context, location);
  }
  return createContractError(errorId, context, location);
}
