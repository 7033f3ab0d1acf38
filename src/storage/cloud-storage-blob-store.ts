/**
 * BlobStore on the Firebase default Cloud Storage bucket.
 * Objects live at blobs/<id>; the upload name is kept in custom metadata.
 */

import { Injectable, Logger } from '@nestjs/common';
import { guardStorage, InvalidRequestError } from '../common/errors.js';
import { FirestoreService } from '../firestore/firestore.service.js';
import { BlobCategory, BlobStore, buildBlobId, isBlobId, StoredBlob } from './blob-store.js';

const OBJECT_PREFIX = 'blobs/';

@Injectable()
export class CloudStorageBlobStore extends BlobStore {
  private readonly logger = new Logger(CloudStorageBlobStore.name);

  constructor(private readonly firestoreService: FirestoreService) {
    super();
  }

  async put(data: Buffer, filename: string, contentType: string, category: BlobCategory): Promise<string> {
    const id = buildBlobId(category, filename);
    await guardStorage('blob upload', () =>
      this.firestoreService
        .bucket()
        .file(OBJECT_PREFIX + id)
        .save(data, {
          resumable: false,
          contentType,
          metadata: { metadata: { originalName: filename } },
        }),
    );
    this.logger.log(`put(${id}): ${data.length} bytes`);
    return id;
  }

  async get(id: string): Promise<StoredBlob> {
    if (!isBlobId(id)) {
      throw new InvalidRequestError(`Unknown file id ${id}`, 'unknown_file');
    }
    const file = this.firestoreService.bucket().file(OBJECT_PREFIX + id);
    const [exists] = await guardStorage('blob lookup', () => file.exists());
    if (!exists) {
      throw new InvalidRequestError(`Unknown file id ${id}`, 'unknown_file');
    }
    const [[data], [metadata]] = await guardStorage('blob download', () =>
      Promise.all([file.download(), file.getMetadata()]),
    );
    const originalName = metadata.metadata?.originalName;
    return {
      id,
      filename: typeof originalName === 'string' ? originalName : id,
      contentType: metadata.contentType ?? 'application/octet-stream',
      data,
    };
  }

  async exists(id: string): Promise<boolean> {
    if (!isBlobId(id)) return false;
    const [exists] = await guardStorage('blob lookup', () =>
      this.firestoreService.bucket().file(OBJECT_PREFIX + id).exists(),
    );
    return exists;
  }
}
