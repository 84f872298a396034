import assert from 'node:assert/strict';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import JSZip from 'jszip';
import { parseCliArgs, runCleaner, type CliLogger } from '../src/cli/index';

function runArgumentTests(): void {
  assert.deepEqual(parseCliArgs(['in.xml']), {
    ok: true,
    options: {
      inputs: ['in.xml'],
      outDir: 'cleaned',
      zip: false,
      reportPath: null,
      preview: false,
      matchLocalNames: false,
      historyPath: null
    }
  });

  assert.deepEqual(
    parseCliArgs(['a.xml', '--out=dist/out', '--zip', '--report=r.csv', '--preview', '--ignore-prefixes', '--history=h.json', 'dir']),
    {
      ok: true,
      options: {
        inputs: ['a.xml', 'dir'],
        outDir: 'dist/out',
        zip: true,
        reportPath: 'r.csv',
        preview: true,
        matchLocalNames: true,
        historyPath: 'h.json'
      }
    }
  );

  assert.deepEqual(parseCliArgs(['a.xml', '--mode=fast']), { ok: false, error: 'Unknown option: --mode=fast' });
  assert.deepEqual(parseCliArgs(['--zip']), { ok: false, error: 'No input files given.' });
  assert.deepEqual(parseCliArgs(['a.xml', '--out=']), { ok: false, error: 'Options --out, --report and --history need a value.' });
}

function createLogger(): { logger: CliLogger; logs: string[]; warnings: string[]; errors: string[] } {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    warnings,
    errors,
    logger: {
      log: (...data: unknown[]) => logs.push(data.join(' ')),
      warn: (...data: unknown[]) => warnings.push(data.join(' ')),
      error: (...data: unknown[]) => errors.push(data.join(' '))
    }
  };
}

async function runCleanerTests(): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'xml-cleaner-cli-'));
  try {
    const inputDir = path.join(dir, 'in');
    const outDir = path.join(dir, 'out');
    await mkdir(inputDir);
    await writeFile(
      path.join(inputDir, 'a.xml'),
      '<Root><PositionStatus><Code>6A</Code><Description>Ouvriers</Description></PositionStatus></Root>'
    );
    await writeFile(path.join(inputDir, 'b.xml'), '<Root><PositionStatus>');
    await writeFile(path.join(inputDir, 'skipped.txt'), 'ignored inside directories');
    const notesPath = path.join(dir, 'notes.txt');
    await writeFile(notesPath, 'not xml');

    const { logger, logs, warnings, errors } = createLogger();
    const exitCode = await runCleaner(
      {
        inputs: [inputDir, notesPath],
        outDir,
        zip: true,
        reportPath: path.join(dir, 'report.csv'),
        preview: true,
        matchLocalNames: false,
        historyPath: path.join(dir, 'history.json')
      },
      logger,
      new Date(2026, 9, 19, 14, 30, 5)
    );

    assert.equal(exitCode, 2);
    assert.deepEqual((await readdir(outDir)).sort(), ['a_cleaned.xml', 'xml_cleaned_20261019_143005.zip']);
    assert.equal(
      await readFile(path.join(outDir, 'a_cleaned.xml'), 'utf8'),
      '<Root><PositionStatus><Code></Code><Description></Description></PositionStatus></Root>'
    );

    const zip = await JSZip.loadAsync(await readFile(path.join(outDir, 'xml_cleaned_20261019_143005.zip')));
    assert.deepEqual(Object.keys(zip.files), ['a_cleaned.xml']);

    const report = (await readFile(path.join(dir, 'report.csv'), 'utf8')).split('\r\n');
    assert.equal(report.length, 4);
    assert.equal(report[0], 'file,status,encoding,modifications,duration_ms,error');
    assert.equal(report[1], 'notes.txt,failed,,,,Unsupported file type. Only .xml files are accepted.');
    assert.match(report[2] ?? '', /^a\.xml,cleaned,utf-8,2,\d+\.\d{2},$/);
    assert.match(report[3] ?? '', /^b\.xml,failed,utf-8,,,.*unclosed tag/);

    assert.equal(JSON.parse(await readFile(path.join(dir, 'history.json'), 'utf8')).runs, 1);

    assert.ok(logs.includes('✅ 📄 a.xml (encoding: utf-8) — 2 modifications'));
    assert.ok(logs.includes('\nFiles cleaned: 1'));
    assert.ok(logs.includes('Total modifications: 2'));
    assert.ok(logs.includes('\nPreview of a.xml:\n<Root><PositionStatus>**<Code></Code>****<Description></Description>**</PositionStatus></Root>\n...'));
    assert.equal(errors[0], '❌ notes.txt: Unsupported file type. Only .xml files are accepted.');
    assert.match(errors[1] ?? '', /^❌ b\.xml: .*unclosed tag/);
    assert.deepEqual(warnings, ['\n2 files could not be cleaned. See the errors above.']);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function runSharedNameAndMissingInputTests(): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'xml-cleaner-cli-'));
  try {
    const firstDir = path.join(dir, 'first');
    const secondDir = path.join(dir, 'second');
    const outDir = path.join(dir, 'out');
    await mkdir(firstDir);
    await mkdir(secondDir);
    await writeFile(path.join(firstDir, 'x.xml'), '<Root><PositionStatus><Code>6A</Code></PositionStatus></Root>');
    await writeFile(path.join(secondDir, 'x.xml'), '<Root><PositionStatus><Code>6B</Code></PositionStatus></Root>');

    const { logger, errors, warnings } = createLogger();
    const exitCode = await runCleaner(
      {
        inputs: [firstDir, secondDir, path.join(dir, 'missing.xml')],
        outDir,
        zip: true,
        reportPath: null,
        preview: false,
        matchLocalNames: false,
        historyPath: null
      },
      logger,
      new Date(2026, 9, 19, 14, 30, 5)
    );

    assert.equal(exitCode, 2);
    assert.deepEqual((await readdir(outDir)).sort(), ['x_cleaned.xml', 'x_cleaned_2.xml', 'xml_cleaned_20261019_143005.zip']);
    assert.equal(
      await readFile(path.join(outDir, 'x_cleaned.xml'), 'utf8'),
      '<Root><PositionStatus><Code></Code></PositionStatus></Root>'
    );
    assert.equal(
      await readFile(path.join(outDir, 'x_cleaned_2.xml'), 'utf8'),
      '<Root><PositionStatus><Code>6B</Code></PositionStatus></Root>'
    );

    const zip = await JSZip.loadAsync(await readFile(path.join(outDir, 'xml_cleaned_20261019_143005.zip')));
    assert.deepEqual(Object.keys(zip.files), ['x_cleaned.xml', 'x_cleaned_2.xml']);

    assert.equal(errors.length, 1);
    assert.match(errors[0] ?? '', /^❌ missing\.xml: Could not read input: ENOENT/);
    assert.deepEqual(warnings, ['\n1 file could not be cleaned. See the errors above.']);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('parses CLI flags', runArgumentTests);
test('runCleaner writes outputs, archive, report and history', runCleanerTests);
test('runCleaner keeps same-named outputs apart and reports unreadable inputs', runSharedNameAndMissingInputTests);
