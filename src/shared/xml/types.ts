export class XmlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XmlParseError';
  }
}

export interface CleaningSuccess {
  ok: true;
  cleanedText: string;
  modifications: number;
  durationMs: number;
}

/** The document was not well-formed; nothing was modified. */
export interface ParseFailure {
  ok: false;
  reason: string;
  durationMs: number;
}

export type CleaningOutcome = CleaningSuccess | ParseFailure;

export interface FieldRule {
  field: string;
  sentinel: string;
}

export interface ScopedRules {
  container: string;
  fields: readonly FieldRule[];
}

export interface CleanOptions {
  /** Match container and field tags on their local name, ignoring any `ns:` prefix. */
  matchLocalNames?: boolean;
}
