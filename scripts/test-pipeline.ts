import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { RawDocument } from '../src/shared/file/types';
import { resetSessionStats } from '../src/shared/stats';
import { processBatch, processDocument, summarizeBatch } from '../src/sanitizer/pipeline';

const MATCHING = '<Root><PositionStatus><Code>6A</Code><Description>Ouvriers</Description></PositionStatus></Root>';

function utf8Document(name: string, text: string): RawDocument {
  return { name, bytes: Buffer.from(text, 'utf8') };
}

function runDocumentTests(): void {
  const legacy: RawDocument = {
    name: 'legacy.xml',
    bytes: Buffer.from('<Root><PositionStatus><Code>6A</Code><Label>Employ\xe9</Label></PositionStatus></Root>', 'latin1')
  };
  const result = processDocument(legacy);
  assert.equal(result.status, 'cleaned');
  assert.ok(result.status === 'cleaned');
  assert.equal(result.name, 'legacy.xml');
  assert.equal(result.encoding, 'windows-1252');
  assert.equal(result.modifications, 1);
  assert.equal(result.cleanedText, '<Root><PositionStatus><Code></Code><Label>Employé</Label></PositionStatus></Root>');

  const broken = processDocument(utf8Document('broken.xml', '<Root><PositionStatus>'));
  assert.equal(broken.status, 'failed');
  assert.ok(broken.status === 'failed');
  assert.equal(broken.encoding, 'utf-8');
  assert.match(broken.reason, /unclosed tag/);

  const prefixed = utf8Document('prefixed.xml', '<a:Root xmlns:a="urn:x"><a:PositionStatus><a:Code>6A</a:Code></a:PositionStatus></a:Root>');
  const exact = processDocument(prefixed);
  const local = processDocument(prefixed, { matchLocalNames: true });
  assert.ok(exact.status === 'cleaned' && local.status === 'cleaned');
  assert.equal(exact.modifications, 0);
  assert.equal(local.modifications, 1);
}

function runBatchTests(): void {
  const documents = [
    utf8Document('a.xml', MATCHING),
    utf8Document('b.xml', '<Root><PositionStatus><Code>6A</Code>'),
    utf8Document('c.xml', '<Root/>')
  ];

  const first = processBatch(documents);
  assert.deepEqual(first.results.map((result) => result.status), ['cleaned', 'failed', 'cleaned']);
  assert.deepEqual(first.session, {
    filesProcessed: 2,
    filesFailed: 1,
    totalModifications: 2,
    byEncoding: { 'utf-8': 2 }
  });

  const previous = first.session;
  const second = processBatch([utf8Document('d.xml', MATCHING)], previous);
  assert.deepEqual(second.session, {
    filesProcessed: 3,
    filesFailed: 1,
    totalModifications: 4,
    byEncoding: { 'utf-8': 3 }
  });
  assert.deepEqual(previous.byEncoding, { 'utf-8': 2 }, 'caller accumulator is not mutated');

  const reset = processBatch([utf8Document('d.xml', MATCHING)], resetSessionStats());
  assert.equal(reset.session.totalModifications, 2);

  assert.deepEqual(summarizeBatch(first.results), { succeeded: 2, failed: 1, totalModifications: 2 });
}

test('processDocument chains decoding and cleaning', runDocumentTests);
test('processBatch isolates failures and threads the session accumulator', runBatchTests);
