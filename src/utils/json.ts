import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';

/**
 * Strict JSON parsing on top of jsonc-parser, so syntax problems come back
 * as readable messages with offsets instead of a bare SyntaxError.
 */
export function parseStrictJson(content: string): { value: unknown; errors: string[] } {
  const parseErrors: ParseError[] = [];
  const value: unknown = parse(content, parseErrors, {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false
  });

  return {
    value,
    errors: parseErrors.map(e => `${printParseErrorCode(e.error)} at offset ${e.offset}`)
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
