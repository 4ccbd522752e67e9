/**
 * Format mapping utilities
 * Maps HTTP MIME types to the short format tokens the engine understands
 */

import { UnsupportedFormatError } from '../errors.js';
import type { FormatToken } from '../types/render.js';

export const DEFAULT_FORMAT: FormatToken = 'svg';

const MIME_TYPES: Record<FormatToken, string> = {
  svg: 'image/svg+xml',
  png: 'image/png',
};

/** Supported MIME types, default first (order matters for Accept negotiation) */
export const SUPPORTED_MIME_TYPES: readonly string[] = [MIME_TYPES.svg, MIME_TYPES.png];

export function isFormatToken(value: unknown): value is FormatToken {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(MIME_TYPES, value);
}

/**
 * Maps a MIME type to its format token.
 * Matching is exact: parameters or different casing are not accepted.
 */
export function mimeTypeToToken(mime: string): FormatToken {
  switch (mime) {
    case 'image/svg+xml':
      return 'svg';
    case 'image/png':
      return 'png';
    default:
      throw new UnsupportedFormatError(mime, 'mime');
  }
}

export function tokenToMimeType(token: string): string {
  if (!isFormatToken(token)) {
    throw new UnsupportedFormatError(token, 'token');
  }
  return MIME_TYPES[token];
}

/**
 * Picks the output format from the result of Accept negotiation
 * (`req.accepts(SUPPORTED_MIME_TYPES)`): false means the client asked for
 * nothing we produce, which falls back to the default.
 */
export function negotiateFormat(acceptable: string | false): FormatToken {
  if (acceptable === false) {
    return DEFAULT_FORMAT;
  }
  return mimeTypeToToken(acceptable);
}
