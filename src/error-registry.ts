/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'cli';

/**
 * Example demonstrating an error condition.
 * Used by `--explain` to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario (max 100 characters) */
  readonly description: string;
  /** Example code demonstrating the error (max 500 characters) */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: PYSCAN-{category}{3-digit} (e.g., PYSCAN-L001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error (max 200 characters) */
  readonly cause?: string | undefined;
  /** How to resolve this error (max 300 characters) */
  readonly resolution?: string | undefined;
  /** Example scenarios demonstrating this error (max 3 entries) */
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (PYSCAN-L0xx)
  {
    errorId: 'PYSCAN-L001',
    category: 'lexer',
    description: 'Bad line continuation',
    messageTemplate: 'Unexpected character after line continuation',
    cause:
      'A backslash outside a string literal is followed by more text on the same line.',
    resolution:
      'Put the backslash last on the line, or wrap the expression in parentheses to continue it implicitly.',
    examples: [
      {
        description: 'Trailing space after the backslash',
        code: 'total = a + \\ \n    b',
      },
    ],
  },
  {
    errorId: 'PYSCAN-L002',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause:
      'A single-quoted string reached the end of its line, or the end of input, before its closing quote.',
    resolution:
      'Add the closing quote, end the line with a backslash to continue the literal, or use a triple-quoted string.',
    examples: [
      {
        description: 'Missing closing quote',
        code: "name = 'hello",
      },
    ],
  },
  {
    errorId: 'PYSCAN-L003',
    category: 'lexer',
    description: 'Unterminated triple-quoted string',
    messageTemplate: 'Unterminated triple-quoted string literal',
    cause: 'A triple-quoted string was still open when the input ended.',
    resolution: 'Close the literal with the same three quote characters.',
    examples: [
      {
        description: 'Only two closing quotes',
        code: "doc = '''text\nmore text''",
      },
    ],
  },
  {
    errorId: 'PYSCAN-L004',
    category: 'lexer',
    description: 'Invalid character in bytes literal',
    messageTemplate: 'Invalid character {char} in bytes literal escape',
    cause:
      'A bytes literal escape uses a non-ASCII character or a text-only escape (\\N, \\u, \\U).',
    resolution:
      'Use \\xhh or octal escapes for byte values, or make the literal a text string.',
    examples: [
      {
        description: 'Unicode escape in a bytes literal',
        code: "data = b'\\u0041'",
      },
    ],
  },
  {
    errorId: 'PYSCAN-L005',
    category: 'lexer',
    description: 'Inconsistent dedent',
    messageTemplate: 'Unindent does not match any outer indentation level',
    cause:
      'A line is indented less than the previous block but not as far back as any enclosing block.',
    resolution:
      'Align the line with one of the enclosing blocks. Avoid mixing tabs and spaces.',
    examples: [
      {
        description: 'Dedent to a column never used',
        code: 'if x:\n        y\n    z',
      },
    ],
  },
  {
    errorId: 'PYSCAN-L006',
    category: 'lexer',
    description: 'Truncated \\x escape',
    messageTemplate: 'Truncated \\xXX escape',
    cause: '\\x must be followed by exactly two hexadecimal digits.',
    resolution: 'Write both digits, e.g. \\x07 instead of \\x7.',
    examples: [
      {
        description: 'Single hex digit',
        code: "bell = '\\x7'",
      },
    ],
  },
  {
    errorId: 'PYSCAN-L007',
    category: 'lexer',
    description: 'Malformed unicode escape',
    messageTemplate: 'Malformed \\u or \\U escape',
    cause:
      '\\u needs exactly four and \\U exactly eight hexadecimal digits naming a code point up to U+10FFFF.',
    resolution: 'Pad the code point with leading zeros, e.g. \\u00e9.',
    examples: [
      {
        description: 'Three digits after \\u',
        code: "sym = '\\u262'",
      },
    ],
  },
  {
    errorId: 'PYSCAN-L008',
    category: 'lexer',
    description: 'Malformed \\N escape',
    messageTemplate: 'Malformed \\N character escape',
    cause: '\\N must be followed by a character name in braces.',
    resolution: 'Write the name in braces, e.g. \\N{BLACK STAR}.',
    examples: [
      {
        description: 'Missing closing brace',
        code: "star = '\\N{BLACK STAR'",
      },
    ],
  },
  {
    errorId: 'PYSCAN-L009',
    category: 'lexer',
    description: 'Unknown unicode character name',
    messageTemplate: 'Unknown unicode character name {name}',
    cause: 'The name inside \\N{...} is not a known character name.',
    resolution: 'Check the spelling, or use a \\u or \\U escape instead.',
    examples: [
      {
        description: 'Misspelled name',
        code: "star = '\\N{BLAK STAR}'",
      },
    ],
  },
  {
    errorId: 'PYSCAN-L010',
    category: 'lexer',
    description: 'Missing digits',
    messageTemplate: 'Missing digits in numeric literal',
    cause: 'A radix prefix (0b, 0o, 0x) or an exponent marker has no digits after it.',
    resolution: 'Add the digits, e.g. 0x1f or 1e10.',
    examples: [
      {
        description: 'Bare hex prefix',
        code: 'mask = 0x',
      },
      {
        description: 'Exponent without digits',
        code: 'scale = 1e+',
      },
    ],
  },
  {
    errorId: 'PYSCAN-L011',
    category: 'lexer',
    description: 'Malformed float',
    messageTemplate: 'Malformed floating point literal',
    cause:
      'A decimal literal has leading zeros without being a float, or a float part follows a literal that cannot take one.',
    resolution: 'Remove the leading zeros, or use 0o for octal numbers.',
    examples: [
      {
        description: 'Leading zero decimal',
        code: 'mode = 0755',
      },
    ],
  },
  {
    errorId: 'PYSCAN-L012',
    category: 'lexer',
    description: 'Malformed imaginary',
    messageTemplate: 'Malformed imaginary literal',
    cause: 'An imaginary suffix j follows a literal other than a decimal integer or float.',
    resolution: 'Write the imaginary part in decimal, e.g. 3j.',
    examples: [
      {
        description: 'Imaginary hex literal',
        code: 'z = 0x1j',
      },
    ],
  },
  {
    errorId: 'PYSCAN-L013',
    category: 'lexer',
    description: 'Invalid symbol',
    messageTemplate: 'Invalid symbol {char}',
    cause: 'The character does not start any operator or delimiter.',
    resolution:
      'Remove or replace the character. A lone ! is only valid as part of !=.',
    examples: [
      {
        description: 'Dollar sign',
        code: 'cost = $5',
      },
      {
        description: 'Negation written as !',
        code: 'if !done: pass',
      },
    ],
  },
  {
    errorId: 'PYSCAN-L014',
    category: 'lexer',
    description: 'Internal lexer error',
    messageTemplate: 'Internal lexer error: {detail}',
    cause: 'The scanner reached a state that its dispatch rules exclude.',
    resolution: 'Report the input that triggered the error.',
  },

  // CLI Errors (PYSCAN-C0xx)
  {
    errorId: 'PYSCAN-C001',
    category: 'cli',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'The .pyscan.json file is not valid JSON or has unknown values.',
    resolution:
      'Fix the file. Allowed keys: format ("human", "json", "compact") and failFast (boolean).',
    examples: [
      {
        description: 'Unknown output format',
        code: '{ "format": "xml" }',
      },
    ],
  },
  {
    errorId: 'PYSCAN-C002',
    category: 'cli',
    description: 'Invalid command-line usage',
    messageTemplate: '{reason}',
    cause: 'An unknown option, a missing option value or a missing input.',
    resolution: 'Run pyscan-tokens --help for usage.',
  },
  {
    errorId: 'PYSCAN-C003',
    category: 'cli',
    description: 'Input not readable',
    messageTemplate: 'File not found: {path}',
    cause: 'The input file does not exist or cannot be read.',
    resolution: 'Check the path, or pass - to read from stdin.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Invalid symbol {char}", { char: "$" })
 * // Returns: "Invalid symbol $"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      // Unclosed brace
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
