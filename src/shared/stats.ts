import type { DocumentResult } from '../sanitizer/pipeline';
import {
  defaultHistoryStats,
  defaultSessionStats,
  type HistoryStats,
  type SessionStats
} from './types';

export function resetSessionStats(): SessionStats {
  return { ...defaultSessionStats, byEncoding: {} };
}

export function applyResultsToSession(
  current: SessionStats | undefined,
  results: DocumentResult[]
): SessionStats {
  const next: SessionStats = {
    filesProcessed: current?.filesProcessed ?? defaultSessionStats.filesProcessed,
    filesFailed: current?.filesFailed ?? defaultSessionStats.filesFailed,
    totalModifications: current?.totalModifications ?? defaultSessionStats.totalModifications,
    byEncoding: { ...(current?.byEncoding ?? defaultSessionStats.byEncoding) }
  };

  for (const result of results) {
    if (result.status === 'failed') {
      next.filesFailed += 1;
      continue;
    }
    next.filesProcessed += 1;
    next.totalModifications += result.modifications;
    next.byEncoding[result.encoding] = (next.byEncoding[result.encoding] ?? 0) + 1;
  }

  return next;
}

export function applyResultsToHistory(
  current: HistoryStats | undefined,
  results: DocumentResult[]
): HistoryStats {
  const next: HistoryStats = {
    runs: (current?.runs ?? defaultHistoryStats.runs) + 1,
    filesProcessed: current?.filesProcessed ?? defaultHistoryStats.filesProcessed,
    totalModifications: current?.totalModifications ?? defaultHistoryStats.totalModifications
  };

  for (const result of results) {
    if (result.status === 'cleaned') {
      next.filesProcessed += 1;
      next.totalModifications += result.modifications;
    }
  }

  return next;
}
