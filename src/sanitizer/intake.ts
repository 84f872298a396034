import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import type { RawDocument } from '../shared/file/types';
import { getExtension } from '../shared/file/utils';
import { validateDocumentPreflight } from './hardening';
import type { FailedDocument } from './pipeline';

export interface IntakeResult {
  documents: RawDocument[];
  rejected: FailedDocument[];
}

function unreadable(filePath: string, error: unknown): FailedDocument {
  const message = error instanceof Error ? error.message : String(error);
  return { status: 'failed', name: path.basename(filePath), reason: `Could not read input: ${message}` };
}

async function expandInputs(inputs: string[], rejected: FailedDocument[]): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    try {
      const info = await stat(input);
      if (!info.isDirectory()) {
        files.push(input);
        continue;
      }

      const entries = await readdir(input);
      entries
        .filter((entry) => getExtension(entry) === '.xml')
        .sort((left, right) => left.localeCompare(right))
        .forEach((entry) => files.push(path.join(input, entry)));
    } catch (error) {
      rejected.push(unreadable(input, error));
    }
  }

  return files;
}

/**
 * Reads every input file (directories contribute their `.xml` entries) and
 * runs the preflight checks. Inputs that cannot be read are rejected one by
 * one; the others still load.
 */
export async function loadDocuments(inputs: string[]): Promise<IntakeResult> {
  const documents: RawDocument[] = [];
  const rejected: FailedDocument[] = [];

  for (const filePath of await expandInputs(inputs, rejected)) {
    const name = path.basename(filePath);

    try {
      const info = await stat(filePath);
      const preflightError = validateDocumentPreflight({ name, size: info.size });

      if (preflightError) {
        rejected.push({ status: 'failed', name, reason: preflightError });
        continue;
      }

      const bytes = await readFile(filePath);
      documents.push({ name, bytes });
    } catch (error) {
      rejected.push(unreadable(filePath, error));
    }
  }

  return { documents, rejected };
}
