import { Body, Controller, Get, HttpCode, HttpStatus, NotFoundException, Param, Post } from '@nestjs/common';
import type { BatchJob } from '../types/job.types.js';
import { BatchJobService, BatchResults } from './batch-job.service.js';
import { PlanRequestDto, toFloorPlanOptions } from './dto/plan-request.dto.js';

@Controller('batch')
export class BatchController {
  constructor(private readonly batchJobs: BatchJobService) {}

  @Post('run')
  @HttpCode(HttpStatus.ACCEPTED)
  run(@Body() dto: PlanRequestDto): { job: BatchJob } {
    const job = this.batchJobs.startBatch({
      fileIds: dto.fileIds,
      templateId: dto.templateId,
      options: toFloorPlanOptions(dto.options),
    });
    return { job };
  }

  @Get('status/:jobId')
  status(@Param('jobId') jobId: string): { job: BatchJob } {
    const job = this.batchJobs.getStatus(jobId);
    if (!job) {
      throw new NotFoundException(`Batch ${jobId} not found`);
    }
    return { job };
  }

  @Get('results/:jobId')
  async results(@Param('jobId') jobId: string): Promise<BatchResults> {
    const results = await this.batchJobs.getResults(jobId);
    if (!results) {
      throw new NotFoundException(`Batch ${jobId} not found`);
    }
    return results;
  }
}
