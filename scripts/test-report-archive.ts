import assert from 'node:assert/strict';
import { test } from 'node:test';
import JSZip from 'jszip';
import { packageCleanedDocuments } from '../src/shared/file/archive';
import { archiveFileName, cleanedFileName, getExtension, uniqueCleanedFileNames } from '../src/shared/file/utils';
import type { DocumentResult } from '../src/sanitizer/pipeline';
import { buildCleanedPreview, buildCsvReport } from '../src/sanitizer/report';

const RESULTS: DocumentResult[] = [
  {
    status: 'cleaned',
    name: 'a.xml',
    encoding: 'utf-8',
    cleanedText: '<Root><Code></Code></Root>',
    modifications: 2,
    durationMs: 1.234
  },
  { status: 'failed', name: 'b.xml', encoding: 'utf-8', reason: 'unclosed tag: Root' },
  { status: 'failed', name: 'c.txt', reason: 'Unsupported file type. Only .xml files are accepted.' }
];

function runNamingTests(): void {
  assert.equal(cleanedFileName('orders.xml'), 'orders_cleaned.xml');
  assert.equal(cleanedFileName('ORDERS.XML'), 'ORDERS_cleaned.xml');
  assert.equal(cleanedFileName('a.xml.bak'), 'a.xml.bak_cleaned.xml');
  assert.equal(cleanedFileName('notes'), 'notes_cleaned.xml');
  assert.equal(getExtension('Export.Final.XML'), '.xml');
  assert.equal(getExtension('README'), '');
  assert.deepEqual(uniqueCleanedFileNames(['x.xml', 'x.xml', 'X.XML', 'y.xml']), [
    'x_cleaned.xml',
    'x_cleaned_2.xml',
    'X_cleaned_3.xml',
    'y_cleaned.xml'
  ]);
  assert.equal(archiveFileName(new Date(2026, 9, 19, 14, 30, 5)), 'xml_cleaned_20261019_143005.zip');
}

function runReportTests(): void {
  assert.equal(
    buildCsvReport(RESULTS),
    [
      'file,status,encoding,modifications,duration_ms,error',
      'a.xml,cleaned,utf-8,2,1.23,',
      'b.xml,failed,utf-8,,,unclosed tag: Root',
      'c.txt,failed,,,,Unsupported file type. Only .xml files are accepted.'
    ].join('\r\n')
  );

  const quoted = buildCsvReport([{ status: 'failed', name: 'x,y.xml', reason: 'bad' }]);
  assert.equal(quoted.split('\r\n')[1], '"x,y.xml",failed,,,,bad');
}

function runPreviewTests(): void {
  const cleaned = '<Root><Code></Code><ns0:Description></ns0:Description><Code>6B</Code><Codes></Codes></Root>';
  assert.equal(
    buildCleanedPreview(cleaned),
    '<Root>**<Code></Code>****<ns0:Description></ns0:Description>**<Code>6B</Code><Codes></Codes></Root>\n...'
  );
  assert.equal(buildCleanedPreview('abcdef', 3), 'abc\n...');
}

async function runArchiveTests(): Promise<void> {
  const archive = await packageCleanedDocuments(RESULTS);
  const zip = await JSZip.loadAsync(archive);

  assert.deepEqual(Object.keys(zip.files), ['a_cleaned.xml']);
  assert.equal(await zip.file('a_cleaned.xml')?.async('string'), '<Root><Code></Code></Root>');

  const sameName = await JSZip.loadAsync(await packageCleanedDocuments([
    { status: 'cleaned', name: 'x.xml', encoding: 'utf-8', cleanedText: '<first/>', modifications: 1, durationMs: 0 },
    { status: 'cleaned', name: 'x.xml', encoding: 'utf-8', cleanedText: '<second/>', modifications: 0, durationMs: 0 }
  ]));
  assert.deepEqual(Object.keys(sameName.files), ['x_cleaned.xml', 'x_cleaned_2.xml']);
  assert.equal(await sameName.file('x_cleaned_2.xml')?.async('string'), '<second/>');
}

test('output names follow the cleaned naming convention', runNamingTests);
test('CSV report lists every document', runReportTests);
test('preview highlights emptied fields', runPreviewTests);
test('archive packages only cleaned documents', runArchiveTests);
