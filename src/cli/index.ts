#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { packageCleanedDocuments } from '../shared/file/archive';
import { archiveFileName, uniqueCleanedFileNames } from '../shared/file/utils';
import { applyResultsToHistory, resetSessionStats } from '../shared/stats';
import { readHistoryStats, writeHistoryStats } from '../shared/storage';
import { buildFailureWarning } from '../sanitizer/hardening';
import { loadDocuments } from '../sanitizer/intake';
import { processBatch, summarizeBatch, type CleanedDocument, type DocumentResult } from '../sanitizer/pipeline';
import { buildCleanedPreview, buildCsvReport } from '../sanitizer/report';

export const USAGE = 'Usage: xml-position-cleaner <file-or-dir...> [--out=DIR] [--zip] [--report=FILE.csv] [--preview] [--ignore-prefixes] [--history=FILE.json]';

export interface CliOptions {
  inputs: string[];
  outDir: string;
  zip: boolean;
  reportPath: string | null;
  preview: boolean;
  matchLocalNames: boolean;
  historyPath: string | null;
}

export type CliParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export type CliLogger = Pick<Console, 'log' | 'warn' | 'error'>;

function readValue(arg: string, flag: string): string | null {
  const prefix = `${flag}=`;
  if (!arg.startsWith(prefix)) {
    return null;
  }
  return arg.slice(prefix.length);
}

export function parseCliArgs(args: string[]): CliParseResult {
  const options: CliOptions = {
    inputs: [],
    outDir: 'cleaned',
    zip: false,
    reportPath: null,
    preview: false,
    matchLocalNames: false,
    historyPath: null
  };

  for (const arg of args) {
    if (!arg.startsWith('--')) {
      options.inputs.push(arg);
      continue;
    }

    const outDir = readValue(arg, '--out');
    const reportPath = readValue(arg, '--report');
    const historyPath = readValue(arg, '--history');

    if (outDir !== null) {
      options.outDir = outDir;
    } else if (reportPath !== null) {
      options.reportPath = reportPath;
    } else if (historyPath !== null) {
      options.historyPath = historyPath;
    } else if (arg === '--zip') {
      options.zip = true;
    } else if (arg === '--preview') {
      options.preview = true;
    } else if (arg === '--ignore-prefixes') {
      options.matchLocalNames = true;
    } else {
      return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  if (options.inputs.length === 0) {
    return { ok: false, error: 'No input files given.' };
  }

  if ([options.outDir, options.reportPath, options.historyPath].some((value) => value === '')) {
    return { ok: false, error: 'Options --out, --report and --history need a value.' };
  }

  return { ok: true, options };
}

function describeResult(result: DocumentResult): string {
  if (result.status === 'failed') {
    return `❌ ${result.name}: ${result.reason}`;
  }

  const label = `📄 ${result.name} (encoding: ${result.encoding})`;
  if (result.modifications === 0) {
    return `⚠️ ${label} — no modification`;
  }
  return `✅ ${label} — ${result.modifications} modification${result.modifications === 1 ? '' : 's'}`;
}

/** Runs one cleaning batch and returns the process exit code. */
export async function runCleaner(options: CliOptions, logger: CliLogger = console, now: Date = new Date()): Promise<number> {
  const { documents, rejected } = await loadDocuments(options.inputs);
  const batch = processBatch(documents, resetSessionStats(), { matchLocalNames: options.matchLocalNames });
  const results: DocumentResult[] = [...rejected, ...batch.results];

  const cleaned = results.filter((result): result is CleanedDocument => result.status === 'cleaned');
  const names = uniqueCleanedFileNames(cleaned.map((result) => result.name));
  const outputNames = new Map<DocumentResult, string>();
  cleaned.forEach((result, index) => {
    outputNames.set(result, names[index] ?? result.name);
  });

  await mkdir(options.outDir, { recursive: true });

  for (const result of results) {
    if (result.status === 'failed') {
      logger.error(describeResult(result));
      continue;
    }

    const outputName = outputNames.get(result) ?? result.name;
    await writeFile(path.join(options.outDir, outputName), result.cleanedText, 'utf8');
    logger.log(describeResult(result));
  }

  const summary = summarizeBatch(results);
  logger.log(`\nFiles cleaned: ${summary.succeeded}`);
  logger.log(`Total modifications: ${summary.totalModifications}`);

  if (options.preview) {
    const sample = batch.results.find((result) => result.status === 'cleaned' && result.modifications > 0);
    if (sample?.status === 'cleaned') {
      logger.log(`\nPreview of ${sample.name}:\n${buildCleanedPreview(sample.cleanedText)}`);
    }
  }

  if (options.zip && summary.succeeded > 0) {
    const archivePath = path.join(options.outDir, archiveFileName(now));
    await writeFile(archivePath, await packageCleanedDocuments(results));
    logger.log(`Archive written to: ${archivePath}`);
  }

  if (options.reportPath) {
    await writeFile(options.reportPath, buildCsvReport(results), 'utf8');
    logger.log(`Report written to: ${options.reportPath}`);
  }

  if (options.historyPath) {
    const history = applyResultsToHistory(await readHistoryStats(options.historyPath), results);
    await writeHistoryStats(options.historyPath, history);
  }

  const warning = buildFailureWarning(summary.failed);
  if (warning) {
    logger.warn(`\n${warning}`);
    return 2;
  }

  return 0;
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }

  process.exitCode = await runCleaner(parsed.options);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
