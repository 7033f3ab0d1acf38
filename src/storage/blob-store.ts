/**
 * Opaque-id storage of uploaded documents and generated exports.
 */

import { randomUUID } from 'node:crypto';
import { extname } from 'node:path';

export type BlobCategory = 'uploads' | 'templates' | 'external' | 'docx';

export interface StoredBlob {
  id: string;
  filename: string; // name given at upload
  contentType: string;
  data: Buffer;
}

export abstract class BlobStore {
  /** @returns the new blob id */
  abstract put(data: Buffer, filename: string, contentType: string, category: BlobCategory): Promise<string>;

  /** Rejects with InvalidRequestError for an unknown id */
  abstract get(id: string): Promise<StoredBlob>;

  abstract exists(id: string): Promise<boolean>;
}

const BLOB_ID_PATTERN = /^(uploads|templates|external|docx)-[0-9a-f]{32}(\.[a-z0-9]{1,8})?$/;

/** uploads-<32 hex>[.ext] */
export function buildBlobId(category: BlobCategory, filename: string): string {
  const suffix = extname(filename).toLowerCase();
  const safeSuffix = /^\.[a-z0-9]{1,8}$/.test(suffix) ? suffix : '';
  return `${category}-${randomUUID().replace(/-/g, '')}${safeSuffix}`;
}

export function isBlobId(value: string): boolean {
  return BLOB_ID_PATTERN.test(value);
}
