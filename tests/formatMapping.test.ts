/**
 * Unit tests for MIME type / format token mapping
 */

import { describe, it, expect } from '@jest/globals';
import { UnsupportedFormatError } from '../src/errors.js';
import {
  DEFAULT_FORMAT,
  SUPPORTED_MIME_TYPES,
  isFormatToken,
  mimeTypeToToken,
  negotiateFormat,
  tokenToMimeType,
} from '../src/utils/formatMapping.js';

describe('mimeTypeToToken', () => {
  it('maps the supported MIME types', () => {
    expect(mimeTypeToToken('image/svg+xml')).toBe('svg');
    expect(mimeTypeToToken('image/png')).toBe('png');
  });

  it('round-trips every supported MIME type', () => {
    for (const mime of SUPPORTED_MIME_TYPES) {
      expect(tokenToMimeType(mimeTypeToToken(mime))).toBe(mime);
    }
  });

  it.each(['image/jpeg', 'IMAGE/PNG', 'image/png; q=0.9', '*/*', ''])('rejects %p', (mime) => {
    expect(() => mimeTypeToToken(mime)).toThrow(UnsupportedFormatError);
  });
});

describe('tokenToMimeType', () => {
  it('maps tokens to MIME types', () => {
    expect(tokenToMimeType('svg')).toBe('image/svg+xml');
    expect(tokenToMimeType('png')).toBe('image/png');
  });

  it('rejects unknown tokens with the token in the message', () => {
    expect(() => tokenToMimeType('gif')).toThrow('Unsupported format: gif');
    expect(() => tokenToMimeType('SVG')).toThrow(UnsupportedFormatError);
  });
});

describe('isFormatToken', () => {
  it('only accepts own tokens', () => {
    expect(isFormatToken('svg')).toBe(true);
    expect(isFormatToken('png')).toBe(true);
    expect(isFormatToken('toString')).toBe(false);
    expect(isFormatToken(undefined)).toBe(false);
  });
});

describe('negotiateFormat', () => {
  it('defaults to SVG when nothing acceptable was requested', () => {
    expect(DEFAULT_FORMAT).toBe('svg');
    expect(negotiateFormat(false)).toBe('svg');
  });

  it('uses the negotiated MIME type', () => {
    expect(negotiateFormat('image/png')).toBe('png');
    expect(negotiateFormat('image/svg+xml')).toBe('svg');
  });

  it('lists SVG first so wildcard Accept headers get the default', () => {
    expect(SUPPORTED_MIME_TYPES[0]).toBe('image/svg+xml');
  });
});
