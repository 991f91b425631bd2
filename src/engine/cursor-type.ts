import { CursorTypeMismatchError, UnsupportedCursorTypeError } from './errors';
import type { CursorType, PropertySchema } from './types';
import { parseNumberText } from './values';

/**
 * Map the inferred type of a cursor attribute to the comparison type used for
 * filtering and checkpointing. Floating-point cursors are rejected unless the
 * property is annotated as integer-valued.
 */
export const resolveCursorType = (stream: string, attribute: string, property: PropertySchema): CursorType => {
  switch (property.type) {
    case 'string':
      return 'string';
    case 'integer':
      return 'numeric';
    case 'number':
      if (property.semantic_type === 'integer') {
        return 'numeric';
      }
      throw new UnsupportedCursorTypeError(stream, attribute, property.type);
    default:
      throw new UnsupportedCursorTypeError(stream, attribute, property.type);
  }
};

/** Read a saved cursor back into a comparable value of the resolved type */
export const parseCursorText = (
  stream: string,
  attribute: string,
  cursorType: CursorType,
  text: string
): string | number | bigint => {
  if (cursorType === 'string') return text;

  if (text.trim() === '' || Number.isNaN(Number(text))) {
    throw new CursorTypeMismatchError(stream, attribute, cursorType, text);
  }
  return parseNumberText(text);
};
