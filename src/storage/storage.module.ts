import { Global, Module } from '@nestjs/common';
import { BlobStore } from './blob-store.js';
import { CloudStorageBlobStore } from './cloud-storage-blob-store.js';
import { UploadsController } from './uploads.controller.js';

@Global()
@Module({
  controllers: [UploadsController],
  providers: [{ provide: BlobStore, useClass: CloudStorageBlobStore }],
  exports: [BlobStore],
})
export class StorageModule {}
