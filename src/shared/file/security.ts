export const MAX_DOCUMENT_SIZE_BYTES = 10 * 1024 * 1024;
export const PROLOGUE_SCAN_BYTES = 200;
export const PREVIEW_CHARS = 2_000;
