import Papa from 'papaparse';
import { PREVIEW_CHARS } from '../shared/file/security';
import type { DocumentResult } from './pipeline';

const REPORT_COLUMNS = ['file', 'status', 'encoding', 'modifications', 'duration_ms', 'error'];

const CLEARED_FIELD = /<((?:[\w.-]+:)?(?:Code|Description))><\/\1>/g;

export function buildCsvReport(results: DocumentResult[]): string {
  const rows = results.map((result) => {
    if (result.status === 'failed') {
      return [result.name, result.status, result.encoding ?? '', '', '', result.reason];
    }
    return [
      result.name,
      result.status,
      result.encoding,
      String(result.modifications),
      result.durationMs.toFixed(2),
      ''
    ];
  });

  return Papa.unparse({ fields: REPORT_COLUMNS, data: rows }, { escapeFormulae: true });
}

/** Head of the cleaned output with every emptied field marked `**like this**`. */
export function buildCleanedPreview(cleanedText: string, limit: number = PREVIEW_CHARS): string {
  const sample = cleanedText.slice(0, limit);
  return `${sample.replace(CLEARED_FIELD, '**$&**')}\n...`;
}
