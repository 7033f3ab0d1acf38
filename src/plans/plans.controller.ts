/**
 * Read side of the plan store, plus the category catalogue.
 */

import { Controller, DefaultValuePipe, Get, NotFoundException, Param, ParseIntPipe, Query } from '@nestjs/common';
import type { Plan, PlanCategory } from '../types/plan.types.js';
import { PlanCategories } from './plan-categories.js';
import { PlanStore } from './plan-store.js';
import { downloadUrl, PlanSummary, toPlanSummary } from './plan-summary.js';

const MAX_LIST_LIMIT = 100;

@Controller()
export class PlansController {
  constructor(
    private readonly planStore: PlanStore,
    private readonly categories: PlanCategories,
  ) {}

  /** GET /plans?limit=20, newest first, without entries */
  @Get('plans')
  async list(
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
  ): Promise<{ plans: PlanSummary[] }> {
    const bounded = Math.min(Math.max(limit, 1), MAX_LIST_LIMIT);
    const listings = await this.planStore.listRecent(bounded);
    return { plans: listings.map(toPlanSummary) };
  }

  @Get('plans/:planId')
  async detail(
    @Param('planId') planId: string,
  ): Promise<{ plan: Plan; docxUrl: string | null; summary: PlanSummary }> {
    const record = await this.planStore.get(planId);
    if (!record) {
      throw new NotFoundException(`Plan ${planId} not found`);
    }
    const { plan, docxId } = record;
    return {
      plan,
      docxUrl: downloadUrl(docxId),
      summary: toPlanSummary({
        id: plan.id,
        source: plan.source,
        createdAt: plan.createdAt,
        docxId,
        metadata: plan.metadata,
      }),
    };
  }

  @Get('plan-categories')
  listCategories(): { categories: PlanCategory[] } {
    return { categories: this.categories.list() };
  }
}
