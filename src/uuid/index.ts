/**
 * Identifier conversion between canonical UUID text and its 16-byte storage form.
 *
 * @module uuid
 */

import { parse, stringify, validate } from 'uuid';
import { InvalidIdentifierError } from '../errors/index.js';
import type { DomainValue } from '../types/index.js';

/** Length of a stored identifier */
export const UUID_BYTE_LENGTH = 16;

const utf8 = new TextDecoder('utf-8');

/**
 * Converts identifier text to its 16-byte big-endian form.
 *
 * Identifiers may arrive as text or as the UTF-8 bytes of that text. Any
 * RFC 9562 version (1 to 8) is accepted, as are the nil and max UUIDs.
 *
 * @throws {InvalidIdentifierError} If the value is not a UUID
 *
 * @example
 * ```typescript
 * uuidToBytes('3fa85f64-5717-4562-b3fc-2c963f66afa6'); // Uint8Array(16) [0x3f, 0xa8, ...]
 * ```
 */
export function uuidToBytes(value: string | Uint8Array): Uint8Array {
  const text = typeof value === 'string' ? value : utf8.decode(value);
  if (!validate(text)) {
    throw new InvalidIdentifierError(text);
  }
  try {
    return Uint8Array.from(parse(text));
  } catch (error) {
    throw new InvalidIdentifierError(text, error);
  }
}

/**
 * Converts a stored 16-byte identifier back to canonical text.
 *
 * @throws {InvalidIdentifierError} If the bytes are not 16 long
 */
export function bytesToUuid(bytes: Uint8Array): string {
  if (bytes.length !== UUID_BYTE_LENGTH) {
    throw new InvalidIdentifierError(`<${bytes.length} bytes>`);
  }
  try {
    return stringify(bytes);
  } catch (error) {
    throw new InvalidIdentifierError(Buffer.from(bytes).toString('hex'), error);
  }
}

/**
 * Converts an identifier column's domain value to its bind form.
 *
 * @throws {InvalidIdentifierError} If the value is not identifier text
 */
export function identifierBindValue(value: DomainValue): Uint8Array {
  if (typeof value !== 'string' && !(value instanceof Uint8Array)) {
    throw new InvalidIdentifierError(String(value));
  }
  return uuidToBytes(value);
}
