import { MAX_DOCUMENT_SIZE_BYTES } from '../shared/file/security';
import { getExtension } from '../shared/file/utils';

const ALLOWED_EXTENSIONS = new Set(['.xml']);

export function validateDocumentPreflight(document: { name: string; size: number }): string | null {
  if (document.size > MAX_DOCUMENT_SIZE_BYTES) {
    return 'File too large. Maximum size is 10 MB.';
  }

  if (!ALLOWED_EXTENSIONS.has(getExtension(document.name))) {
    return 'Unsupported file type. Only .xml files are accepted.';
  }

  return null;
}

export function buildFailureWarning(failedCount: number): string {
  if (failedCount <= 0) {
    return '';
  }

  return `${failedCount} file${failedCount === 1 ? '' : 's'} could not be cleaned. See the errors above.`;
}
