import { resolveEncoding } from '../shared/file/encoding';
import type { RawDocument, ResolveOptions } from '../shared/file/types';
import { applyResultsToSession, resetSessionStats } from '../shared/stats';
import type { SessionStats } from '../shared/types';
import { cleanPositionStatus } from '../shared/xml/mutator';
import type { CleanOptions } from '../shared/xml/types';

export interface CleanedDocument {
  status: 'cleaned';
  name: string;
  encoding: string;
  cleanedText: string;
  modifications: number;
  durationMs: number;
}

export interface FailedDocument {
  status: 'failed';
  name: string;
  /** Absent when the document was rejected before decoding. */
  encoding?: string;
  reason: string;
}

export type DocumentResult = CleanedDocument | FailedDocument;

export type PipelineOptions = ResolveOptions & CleanOptions;

export interface BatchResult {
  results: DocumentResult[];
  session: SessionStats;
}

export function processDocument(document: RawDocument, options: PipelineOptions = {}): DocumentResult {
  const resolved = resolveEncoding(document.bytes, options);
  const outcome = cleanPositionStatus(resolved.text, options);

  if (!outcome.ok) {
    return {
      status: 'failed',
      name: document.name,
      encoding: resolved.encoding,
      reason: outcome.reason
    };
  }

  return {
    status: 'cleaned',
    name: document.name,
    encoding: resolved.encoding,
    cleanedText: outcome.cleanedText,
    modifications: outcome.modifications,
    durationMs: outcome.durationMs
  };
}

/**
 * Documents are independent: one that fails to parse is reported and the
 * rest of the batch still runs. The caller owns `session` and gets the
 * updated copy back.
 */
export function processBatch(
  documents: RawDocument[],
  session: SessionStats = resetSessionStats(),
  options: PipelineOptions = {}
): BatchResult {
  const results = documents.map((document) => processDocument(document, options));
  return {
    results,
    session: applyResultsToSession(session, results)
  };
}

export function summarizeBatch(results: DocumentResult[]): { succeeded: number; failed: number; totalModifications: number } {
  let succeeded = 0;
  let failed = 0;
  let totalModifications = 0;

  for (const result of results) {
    if (result.status === 'failed') {
      failed += 1;
      continue;
    }
    succeeded += 1;
    totalModifications += result.modifications;
  }

  return { succeeded, failed, totalModifications };
}
