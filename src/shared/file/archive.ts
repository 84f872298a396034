import JSZip from 'jszip';
import type { CleanedDocument, DocumentResult } from '../../sanitizer/pipeline';
import { uniqueCleanedFileNames } from './utils';

export async function packageCleanedDocuments(results: DocumentResult[]): Promise<Buffer> {
  const zip = new JSZip();
  const cleaned = results.filter((result): result is CleanedDocument => result.status === 'cleaned');

  const names = uniqueCleanedFileNames(cleaned.map((result) => result.name));

  cleaned.forEach((result, index) => {
    zip.file(names[index] ?? result.name, result.cleanedText);
  });

  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE'
  });
}
