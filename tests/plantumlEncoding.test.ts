/**
 * Unit tests for the PlantUML text encoding
 */

import { describe, it, expect } from '@jest/globals';
import { readFileSync } from 'fs';
import { join } from 'path';
import { DecodeError } from '../src/errors.js';
import { decodePlantuml, encodePlantuml } from '../src/utils/plantumlEncoding.js';

const fixture = (name: string): string => readFileSync(join(__dirname, 'fixtures', name), 'utf-8');

// Stored (uncompressed) deflate block holding "cables: {}\n"
const STORED_BLOCK = '0Gi0zFzZOM9iPNCw87jz2W';

describe('decodePlantuml', () => {
  it('decodes the empty string to the empty string', () => {
    expect(decodePlantuml('')).toBe('');
  });

  it('decodes a compressed description document', () => {
    const encoded = fixture('minimal.plantuml.txt').trim();
    expect(decodePlantuml(encoded)).toBe(fixture('minimal.yml'));
  });

  it('decodes a trailing group of two characters to one byte', () => {
    expect(decodePlantuml(STORED_BLOCK)).toBe('cables: {}\n');
  });

  it('ignores the zero padding the encoder appends', () => {
    expect(decodePlantuml(`${STORED_BLOCK}00`)).toBe('cables: {}\n');
  });

  it('rejects characters outside the alphabet', () => {
    expect(() => decodePlantuml('Sy+F')).toThrow(DecodeError);
    expect(() => decodePlantuml('Sy+F')).toThrow('Invalid character "+" at position 2');
    expect(() => decodePlantuml('SyfF=')).toThrow(DecodeError);
  });

  it('rejects a dangling single character', () => {
    expect(() => decodePlantuml('0Gi0z')).toThrow('Encoded length 5 leaves a dangling character');
  });

  it('rejects a corrupt deflate stream', () => {
    // 0xFF 0xFF 0xFF starts a block with the reserved type
    expect(() => decodePlantuml('____')).toThrow(DecodeError);
  });

  it('rejects content that is not UTF-8', () => {
    // Stored block holding the single byte 0xFF
    expect(() => decodePlantuml('0G40_l__')).toThrow('Decoded document is not valid UTF-8');
  });

  describe('hex form', () => {
    it('decodes ~h prefixed hex text', () => {
      expect(decodePlantuml('~h6361626c65733a207b7d0a')).toBe('cables: {}\n');
    });

    it('decodes an empty hex payload', () => {
      expect(decodePlantuml('~h')).toBe('');
    });

    it('rejects odd length and non-hex digits', () => {
      expect(() => decodePlantuml('~h636')).toThrow(DecodeError);
      expect(() => decodePlantuml('~hzz')).toThrow(DecodeError);
    });

    it('rejects hex that is not UTF-8', () => {
      expect(() => decodePlantuml('~hff')).toThrow(DecodeError);
    });
  });
});

describe('encodePlantuml', () => {
  it('produces alphabet-only output in whole groups that decodes back', () => {
    const text = fixture('minimal.yml');
    const encoded = encodePlantuml(text);

    expect(encoded).toMatch(/^[0-9A-Za-z_-]+$/);
    expect(encoded.length % 4).toBe(0);
    expect(decodePlantuml(encoded)).toBe(text);
  });

  it('keeps non-ASCII text intact', () => {
    const text = 'connectors:\n  X1:\n    notes: Stecker Ø 4 mm\n';
    expect(decodePlantuml(encodePlantuml(text))).toBe(text);
  });

  it('encodes the empty string to the empty string', () => {
    expect(encodePlantuml('')).toBe('');
  });
});
