export function getExtension(fileName: string): string {
  const lowered = fileName.toLowerCase();
  const index = lowered.lastIndexOf('.');
  if (index < 0) {
    return '';
  }
  return lowered.slice(index);
}

export function cleanedFileName(fileName: string): string {
  if (getExtension(fileName) === '.xml') {
    return `${fileName.slice(0, -4)}_cleaned.xml`;
  }
  return `${fileName}_cleaned.xml`;
}

/** Cleaned names for a batch, numbered `_2`, `_3`… where two inputs share a name. */
export function uniqueCleanedFileNames(fileNames: string[]): string[] {
  const used = new Set<string>();

  return fileNames.map((fileName) => {
    const base = cleanedFileName(fileName);
    let candidate = base;
    for (let counter = 2; used.has(candidate.toLowerCase()); counter += 1) {
      candidate = `${base.slice(0, -4)}_${counter}.xml`;
    }
    used.add(candidate.toLowerCase());
    return candidate;
  });
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function archiveFileName(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `xml_cleaned_${day}_${time}.zip`;
}
