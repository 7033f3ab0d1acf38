/**
 * Multipart uploads into the blob store and downloads by blob id.
 */

import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  Param,
  Post,
  StreamableFile,
  UploadedFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor, FilesInterceptor } from '@nestjs/platform-express';
import { BlobCategory, BlobStore } from './blob-store.js';

const MAX_FILES = 200;
const MAX_FILE_BYTES = 50 * 1024 * 1024;

/** multer hands over latin1-decoded names; recover the UTF-8 original */
export function uploadName(file: Express.Multer.File): string {
  const recovered = Buffer.from(file.originalname, 'latin1').toString('utf8');
  return recovered.includes('\uFFFD') ? file.originalname : recovered;
}

@Controller()
export class UploadsController {
  private readonly logger = new Logger(UploadsController.name);

  constructor(private readonly blobStore: BlobStore) {}

  @Post('upload/floorplans')
  @UseInterceptors(FilesInterceptor('files', MAX_FILES, { limits: { fileSize: MAX_FILE_BYTES } }))
  async uploadFloorplans(@UploadedFiles() files: Express.Multer.File[] | undefined): Promise<{ fileIds: string[] }> {
    return { fileIds: await this.storeAll(files, 'uploads') };
  }

  @Post('upload/template')
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_FILE_BYTES } }))
  async uploadTemplate(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<{ templateId: string; filename: string }> {
    if (!file) {
      throw new BadRequestException('No template file received');
    }
    const filename = uploadName(file);
    const templateId = await this.blobStore.put(file.buffer, filename, file.mimetype, 'templates');
    return { templateId, filename };
  }

  @Post('upload/external-plan')
  @UseInterceptors(FilesInterceptor('files', MAX_FILES, { limits: { fileSize: MAX_FILE_BYTES } }))
  async uploadExternalPlans(@UploadedFiles() files: Express.Multer.File[] | undefined): Promise<{ fileIds: string[] }> {
    return { fileIds: await this.storeAll(files, 'external') };
  }

  @Get('download/:fileId')
  async download(@Param('fileId') fileId: string): Promise<StreamableFile> {
    const blob = await this.blobStore.get(fileId);
    return new StreamableFile(blob.data, {
      type: blob.contentType,
      disposition: `attachment; filename*=UTF-8''${encodeURIComponent(blob.filename)}`,
      length: blob.data.length,
    });
  }

  private async storeAll(files: Express.Multer.File[] | undefined, category: BlobCategory): Promise<string[]> {
    if (!files || files.length === 0) {
      throw new BadRequestException('No files received');
    }
    const ids: string[] = [];
    for (const file of files) {
      ids.push(await this.blobStore.put(file.buffer, uploadName(file), file.mimetype, category));
    }
    this.logger.log(`${ids.length} file(s) stored under ${category}`);
    return ids;
  }
}
