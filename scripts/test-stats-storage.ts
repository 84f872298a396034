import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import type { DocumentResult } from '../src/sanitizer/pipeline';
import { applyResultsToHistory, applyResultsToSession, resetSessionStats } from '../src/shared/stats';
import { asHistoryStats, readHistoryStats, writeHistoryStats } from '../src/shared/storage';
import { defaultSessionStats } from '../src/shared/types';

const RESULTS: DocumentResult[] = [
  { status: 'cleaned', name: 'a.xml', encoding: 'utf-8', cleanedText: '<a/>', modifications: 3, durationMs: 1 },
  { status: 'cleaned', name: 'b.xml', encoding: 'windows-1252', cleanedText: '<b/>', modifications: 0, durationMs: 1 },
  { status: 'failed', name: 'c.xml', encoding: 'utf-8', reason: 'unclosed tag: c' }
];

function runSessionTests(): void {
  const session = applyResultsToSession(undefined, RESULTS);
  assert.deepEqual(session, {
    filesProcessed: 2,
    filesFailed: 1,
    totalModifications: 3,
    byEncoding: { 'utf-8': 1, 'windows-1252': 1 }
  });

  const fresh = resetSessionStats();
  fresh.byEncoding['utf-8'] = 10;
  assert.deepEqual(defaultSessionStats.byEncoding, {});
  assert.deepEqual(resetSessionStats(), { filesProcessed: 0, filesFailed: 0, totalModifications: 0, byEncoding: {} });
}

function runHistoryTests(): void {
  const once = applyResultsToHistory(undefined, RESULTS);
  assert.deepEqual(once, { runs: 1, filesProcessed: 2, totalModifications: 3 });
  assert.deepEqual(applyResultsToHistory(once, []), { runs: 2, filesProcessed: 2, totalModifications: 3 });

  assert.deepEqual(asHistoryStats(null), { runs: 0, filesProcessed: 0, totalModifications: 0 });
  assert.deepEqual(asHistoryStats({ runs: 4, filesProcessed: -1, totalModifications: 2.5 }), {
    runs: 4,
    filesProcessed: 0,
    totalModifications: 0
  });
}

async function runStorageTests(): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'xml-cleaner-history-'));
  try {
    const filePath = path.join(dir, 'nested', 'history.json');
    assert.deepEqual(await readHistoryStats(filePath), { runs: 0, filesProcessed: 0, totalModifications: 0 });

    await writeHistoryStats(filePath, { runs: 2, filesProcessed: 5, totalModifications: 9 });
    assert.equal(await readFile(filePath, 'utf8'), '{\n  "runs": 2,\n  "filesProcessed": 5,\n  "totalModifications": 9\n}\n');
    assert.deepEqual(await readHistoryStats(filePath), { runs: 2, filesProcessed: 5, totalModifications: 9 });

    await writeFile(filePath, '{ not json', 'utf8');
    assert.deepEqual(await readHistoryStats(filePath), { runs: 0, filesProcessed: 0, totalModifications: 0 });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('session stats accumulate per batch and reset to a fresh copy', runSessionTests);
test('history stats count runs and validate stored values', runHistoryTests);
test('history file is read, written and recovered', runStorageTests);
