import { Module } from '@nestjs/common';
import { PlansModule } from '../plans/plans.module.js';
import { BatchController } from './batch.controller.js';
import { BatchJobService } from './batch-job.service.js';
import { JobRegistry } from './job-registry.service.js';
import { JobsController } from './jobs.controller.js';
import { PipelineSteps } from './pipeline-steps.service.js';
import { PlanJobService } from './plan-job.service.js';

@Module({
  imports: [PlansModule],
  controllers: [JobsController, BatchController],
  providers: [JobRegistry, PipelineSteps, PlanJobService, BatchJobService],
})
export class JobsModule {}
