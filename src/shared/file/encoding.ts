import { TextDecoder } from 'node:util';
import { PROLOGUE_SCAN_BYTES } from './security';
import type { EncodingGuesser, ResolveOptions, ResolvedText } from './types';

export const DEFAULT_ENCODING = 'utf-8';
export const LEGACY_ENCODING = 'windows-1252';
export const BEST_EFFORT_ENCODING = 'best-effort';

const XML_DECLARED_ENCODING = /^\s*<\?xml\s[^>]*?\bencoding\s*=\s*["']([A-Za-z][A-Za-z0-9._:-]*)["']/;

function tryStrictDecode(bytes: Uint8Array, label: string): string | null {
  try {
    return new TextDecoder(label, { fatal: true }).decode(bytes);
  } catch {
    // Unknown label or invalid byte sequence; either way the next step runs.
    return null;
  }
}

function hasUtf8Bom(bytes: Uint8Array): boolean {
  return bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf;
}

function sniffByteOrderMark(bytes: Uint8Array): string | null {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return 'utf-16le';
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return 'utf-16be';
  }
  return null;
}

function consultGuesser(bytes: Uint8Array, guesser: EncodingGuesser | null | undefined): string | null {
  if (!guesser) {
    return null;
  }
  try {
    return guesser.guess(bytes);
  } catch {
    // A failing detector counts as no opinion.
    return null;
  }
}

export function readDeclaredEncoding(bytes: Uint8Array): string | null {
  const start = hasUtf8Bom(bytes) ? 3 : 0;
  const head = bytes.subarray(start, start + PROLOGUE_SCAN_BYTES);
  // The declaration itself is ASCII, so a total single-byte decode is enough to read it.
  const prologue = new TextDecoder(LEGACY_ENCODING).decode(head);
  const match = XML_DECLARED_ENCODING.exec(prologue);
  return match?.[1] ?? null;
}

/**
 * Turns raw bytes into text. Never throws: every step that fails hands over
 * to the next one, and the last step replaces invalid sequences with U+FFFD.
 */
export function resolveEncoding(bytes: Uint8Array, options: ResolveOptions = {}): ResolvedText {
  const bomEncoding = sniffByteOrderMark(bytes);
  if (bomEncoding) {
    const text = tryStrictDecode(bytes, bomEncoding);
    if (text !== null) {
      return { text, encoding: bomEncoding };
    }
  }

  const utf8 = tryStrictDecode(bytes, DEFAULT_ENCODING);
  if (utf8 !== null) {
    return { text: utf8, encoding: DEFAULT_ENCODING };
  }

  const declared = readDeclaredEncoding(bytes);
  if (declared) {
    const text = tryStrictDecode(bytes, declared);
    if (text !== null) {
      return { text, encoding: declared };
    }
  }

  const legacyEncoding = options.legacyEncoding === undefined ? LEGACY_ENCODING : options.legacyEncoding;
  if (legacyEncoding) {
    const text = tryStrictDecode(bytes, legacyEncoding);
    if (text !== null) {
      return { text, encoding: legacyEncoding };
    }
  }

  const guessed = consultGuesser(bytes, options.guesser);
  if (guessed) {
    const text = tryStrictDecode(bytes, guessed);
    if (text !== null) {
      return { text, encoding: guessed };
    }
  }

  return {
    text: new TextDecoder(DEFAULT_ENCODING).decode(bytes),
    encoding: BEST_EFFORT_ENCODING
  };
}
