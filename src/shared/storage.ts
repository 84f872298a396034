import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { defaultHistoryStats, type HistoryStats } from './types';

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function asHistoryStats(value: unknown): HistoryStats {
  if (!value || typeof value !== 'object') {
    return { ...defaultHistoryStats };
  }

  const parsed = value as Partial<Record<keyof HistoryStats, unknown>>;
  return {
    runs: isCount(parsed.runs) ? parsed.runs : 0,
    filesProcessed: isCount(parsed.filesProcessed) ? parsed.filesProcessed : 0,
    totalModifications: isCount(parsed.totalModifications) ? parsed.totalModifications : 0
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function readHistoryStats(filePath: string): Promise<HistoryStats> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return { ...defaultHistoryStats };
    }
    throw error;
  }

  try {
    return asHistoryStats(JSON.parse(raw));
  } catch {
    // Unparseable history: start a new one.
    return { ...defaultHistoryStats };
  }
}

export async function writeHistoryStats(filePath: string, stats: HistoryStats): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(stats, null, 2)}\n`, 'utf8');
}
