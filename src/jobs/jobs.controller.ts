/**
 * POST /generate-plan, GET /generate-plan/status/:jobId, POST /convert-plan
 */

import { Body, Controller, Get, HttpCode, HttpStatus, NotFoundException, Param, Post } from '@nestjs/common';
import type { PlanJob } from '../types/job.types.js';
import { ConvertPlanDto, PlanRequestDto, toFloorPlanOptions } from './dto/plan-request.dto.js';
import { PlanJobResult, PlanJobService } from './plan-job.service.js';

@Controller()
export class JobsController {
  constructor(private readonly planJobs: PlanJobService) {}

  @Post('generate-plan')
  @HttpCode(HttpStatus.ACCEPTED)
  generatePlan(@Body() dto: PlanRequestDto): { job: PlanJob } {
    const job = this.planJobs.startGeneration({
      fileIds: dto.fileIds,
      templateId: dto.templateId,
      options: toFloorPlanOptions(dto.options),
    });
    return { job };
  }

  /** Polled by the client until the job is terminal */
  @Get('generate-plan/status/:jobId')
  async status(@Param('jobId') jobId: string): Promise<PlanJobResult> {
    const result = await this.planJobs.getResult(jobId);
    if (!result) {
      throw new NotFoundException(`Job ${jobId} not found`);
    }
    return result;
  }

  @Post('convert-plan')
  @HttpCode(HttpStatus.ACCEPTED)
  convertPlan(@Body() dto: ConvertPlanDto): { job: PlanJob } {
    return { job: this.planJobs.startConversion({ fileId: dto.fileId }) };
  }
}
