/**
 * PlantUML text encoding
 * Raw deflate followed by a base64 variant whose alphabet starts with the digits,
 * as used by PlantUML servers and editors to embed documents in URLs.
 * See https://plantuml.com/text-encoding
 */

import { deflateRawSync, inflateRawSync } from 'zlib';
import { DecodeError, errorMessage } from '../errors.js';

const ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz-_';

const ALPHABET_INDEX = new Map<string, number>(Array.from(ALPHABET, (char, index) => [char, index]));

/** Prefix for the uncompressed hexadecimal form */
const HEX_PREFIX = '~h';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function toSextets(encoded: string): Uint8Array {
  const sextets = new Uint8Array(encoded.length);
  for (let i = 0; i < encoded.length; i++) {
    const char = encoded.charAt(i);
    const value = ALPHABET_INDEX.get(char);
    if (value === undefined) {
      throw new DecodeError(`Invalid character ${JSON.stringify(char)} at position ${i}`);
    }
    sextets[i] = value;
  }
  return sextets;
}

/**
 * Reverses the alphabet step: every 4 characters carry 3 bytes,
 * a trailing group of 3 or 2 characters carries 2 or 1 bytes.
 */
function sextetsToBytes(sextets: Uint8Array): Buffer {
  const remainder = sextets.length % 4;
  if (remainder === 1) {
    throw new DecodeError(`Encoded length ${sextets.length} leaves a dangling character`);
  }

  const size = Math.floor(sextets.length / 4) * 3 + (remainder === 0 ? 0 : remainder - 1);
  const bytes = Buffer.alloc(size);
  let offset = 0;

  for (let i = 0; i < sextets.length; i += 4) {
    const groupLength = Math.min(4, sextets.length - i);
    const c0 = sextets[i];
    const c1 = sextets[i + 1];
    bytes[offset++] = ((c0 << 2) | (c1 >> 4)) & 0xff;
    if (groupLength > 2) {
      const c2 = sextets[i + 2];
      bytes[offset++] = ((c1 & 0x0f) << 4) | (c2 >> 2);
      if (groupLength > 3) {
        bytes[offset++] = ((c2 & 0x03) << 6) | sextets[i + 3];
      }
    }
  }

  return bytes;
}

function bytesToText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new DecodeError('Decoded document is not valid UTF-8', { cause: error });
  }
}

function decodeHex(hex: string): string {
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(hex)) {
    throw new DecodeError('Hex encoded document must contain an even number of hex digits');
  }
  return bytesToText(Buffer.from(hex, 'hex'));
}

/**
 * Decodes a PlantUML text encoded document back into its plain text.
 * Anything after the end of the deflate stream (the encoder's zero padding) is ignored.
 */
export function decodePlantuml(encoded: string): string {
  if (encoded.length === 0) {
    return '';
  }
  if (encoded.startsWith(HEX_PREFIX)) {
    return decodeHex(encoded.slice(HEX_PREFIX.length));
  }

  const compressed = sextetsToBytes(toSextets(encoded));

  let inflated: Buffer;
  try {
    inflated = inflateRawSync(compressed);
  } catch (error) {
    throw new DecodeError(`Cannot inflate encoded document: ${errorMessage(error)}`, { cause: error });
  }

  return bytesToText(inflated);
}

function append3bytes(b1: number, b2: number, b3: number): string {
  const c1 = b1 >> 2;
  const c2 = ((b1 & 0x03) << 4) | (b2 >> 4);
  const c3 = ((b2 & 0x0f) << 2) | (b3 >> 6);
  const c4 = b3 & 0x3f;
  return ALPHABET.charAt(c1) + ALPHABET.charAt(c2) + ALPHABET.charAt(c3) + ALPHABET.charAt(c4);
}

/**
 * Encodes a document the way PlantUML tools do: the final group is padded
 * with zero bytes, so the output length is always a multiple of 4.
 */
export function encodePlantuml(text: string): string {
  if (text.length === 0) {
    return '';
  }
  const compressed = deflateRawSync(Buffer.from(text, 'utf-8'), { level: 9 });
  let result = '';
  const byteAt = (index: number): number => (index < compressed.length ? compressed[index] : 0);
  for (let i = 0; i < compressed.length; i += 3) {
    result += append3bytes(byteAt(i), byteAt(i + 1), byteAt(i + 2));
  }
  return result;
}
