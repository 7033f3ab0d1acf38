import type { StoredBlob } from '../storage/blob-store.js';
import type { DocumentInput, GatewayInputs } from '../types/reasoning.types.js';

const TEXT_CONTENT_TYPES = new Set([
  'application/json',
  'application/xml',
  'application/csv',
  'application/x-yaml',
]);

const TEXT_EXTENSIONS = /\.(txt|csv|tsv|json|md|xml|ya?ml)$/i;

export function isTextLike(blob: Pick<StoredBlob, 'filename' | 'contentType'>): boolean {
  const type = blob.contentType.split(';')[0].trim().toLowerCase();
  return type.startsWith('text/') || TEXT_CONTENT_TYPES.has(type) || TEXT_EXTENSIONS.test(blob.filename);
}

/** UTF-8, falling back to Latin-1 when the bytes are not valid UTF-8 */
export function decodeText(data: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch {
    return data.toString('latin1');
  }
}

export function toDocumentInput(blob: StoredBlob): DocumentInput {
  return { filename: blob.filename, mimeType: blob.contentType, data: blob.data };
}

/** Text documents travel as text; everything else inline */
export function blobInputs(blob: StoredBlob): GatewayInputs {
  if (isTextLike(blob)) {
    return { texts: [`${blob.filename}:\n${decodeText(blob.data)}`] };
  }
  return { documents: [toDocumentInput(blob)] };
}
