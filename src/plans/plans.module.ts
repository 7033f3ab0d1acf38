import { Module } from '@nestjs/common';
import { DocxPlanExporter } from './docx-plan-exporter.js';
import { FirestorePlanStore } from './firestore-plan-store.js';
import { PlanCategories } from './plan-categories.js';
import { PlanExporter } from './plan-exporter.js';
import { PlanPublisher } from './plan-publisher.service.js';
import { PlanStore } from './plan-store.js';
import { PlansController } from './plans.controller.js';

@Module({
  controllers: [PlansController],
  providers: [
    { provide: PlanStore, useClass: FirestorePlanStore },
    { provide: PlanExporter, useClass: DocxPlanExporter },
    PlanCategories,
    PlanPublisher,
  ],
  exports: [PlanStore, PlanCategories, PlanPublisher],
})
export class PlansModule {}
