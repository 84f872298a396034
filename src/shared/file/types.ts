export interface RawDocument {
  readonly name: string;
  readonly bytes: Uint8Array;
}

export interface ResolvedText {
  readonly text: string;
  /** Encoding actually used, or `best-effort` when nothing decoded cleanly. */
  readonly encoding: string;
}

/**
 * Optional statistical detector consulted when the declared and legacy
 * encodings both fail. Returns an encoding label, or `null` when it has no
 * opinion.
 */
export interface EncodingGuesser {
  guess: (bytes: Uint8Array) => string | null;
}

export interface ResolveOptions {
  /** Single-byte fallback tried after the declared encoding; `null` skips it. */
  legacyEncoding?: string | null;
  guesser?: EncodingGuesser | null;
}
