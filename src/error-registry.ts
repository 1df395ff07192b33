/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 * Line classification is total, so there is no lexer category.
 */
export type ErrorCategory = 'parse' | 'check';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LEANDOC-{category}{3-digit} (e.g., LEANDOC-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Lookup of all error definitions by ID.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    this.byId = new Map(definitions.map((def) => [def.errorId, def]));
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Parse Errors (LEANDOC-P0xx)
  {
    errorId: 'LEANDOC-P001',
    category: 'parse',
    messageTemplate: 'Expected closing delimiter {delimiter}',
  },
  {
    errorId: 'LEANDOC-P002',
    category: 'parse',
    messageTemplate: 'Expected table delimiter |===',
  },
  // A | row where a block was expected
  {
    errorId: 'LEANDOC-P003',
    category: 'parse',
    messageTemplate: 'Unexpected table line',
  },
  {
    errorId: 'LEANDOC-P004',
    category: 'parse',
    messageTemplate:
      'The number of cells ({cells}) is not a multiple of the column count ({columns})',
  },

  // Check Errors (LEANDOC-C0xx)
  {
    errorId: 'LEANDOC-C001',
    category: 'check',
    messageTemplate: 'Unresolved {name} directive',
  },
  {
    errorId: 'LEANDOC-C002',
    category: 'check',
    messageTemplate: 'Unexpanded include of {target}',
  },
  {
    errorId: 'LEANDOC-C003',
    category: 'check',
    messageTemplate: 'File not found: {path}',
  },
  {
    errorId: 'LEANDOC-C004',
    category: 'check',
    messageTemplate: 'Invalid configuration: {detail}',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing `{name}` placeholders with context
 * values. Missing values render as empty string; an unclosed brace returns
 * the template unchanged.
 *
 * @example
 * renderMessage('Expected closing delimiter {delimiter}', { delimiter: '----' })
 * // Returns: "Expected closing delimiter ----"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close < 0) {
        return template;
      }
      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
