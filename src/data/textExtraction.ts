/**
 * Plain-text extraction for text-like packages.
 */

const TEXT_LIKE_TYPES = new Set([
  'application/json',
  'application/x-ndjson',
  'application/xml',
  'application/markdown',
]);

const TEXT_LIKE_EXTENSIONS = ['.txt', '.md', '.markdown', '.json', '.csv', '.log'];

/** Types that need an external parser before analysis. */
export const DOCUMENT_TYPES = new Set([
  'application/pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
]);

function baseMimeType(dataType: string): string {
  return dataType.split(';')[0]?.trim().toLowerCase() ?? '';
}

export function isTextLike(dataType: string, filename?: string | null): boolean {
  const mime = baseMimeType(dataType);
  if (mime.startsWith('text/') || TEXT_LIKE_TYPES.has(mime)) {
    return true;
  }
  const lowerName = filename?.toLowerCase() ?? '';
  return TEXT_LIKE_EXTENSIONS.some((extension) => lowerName.endsWith(extension));
}

export function isDocumentType(dataType: string): boolean {
  return DOCUMENT_TYPES.has(baseMimeType(dataType));
}

/**
 * Decodes UTF-8 (dropping a BOM), normalizes line endings and collapses runs
 * of blank lines. Returns null when nothing but whitespace remains.
 */
export function decodePlainText(bytes: Uint8Array): string | null {
  const decoded = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false }).decode(bytes);
  const cleaned = decoded
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
  return cleaned === '' ? null : cleaned;
}
