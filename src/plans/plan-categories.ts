/**
 * Plan category catalogue (data/plan-categories.json), loaded once.
 */

import { Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { isRecord } from '../common/guards.js';
import type { PlanCategory } from '../types/plan.types.js';

const CATALOGUE_PATH = join(__dirname, '..', '..', 'data', 'plan-categories.json');

function isPlanCategory(value: unknown): value is PlanCategory {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.no === 'string' &&
    typeof value.en === 'string'
  );
}

export function loadPlanCategories(path: string = CATALOGUE_PATH): PlanCategory[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return Array.isArray(parsed) ? parsed.filter(isPlanCategory) : [];
}

@Injectable()
export class PlanCategories {
  private readonly logger = new Logger(PlanCategories.name);
  private readonly categories: PlanCategory[];

  constructor() {
    this.categories = loadPlanCategories();
    this.logger.log(`${this.categories.length} plan categories loaded`);
  }

  list(): PlanCategory[] {
    return this.categories;
  }

  find(id: string | undefined): PlanCategory | null {
    if (!id) return null;
    return this.categories.find((c) => c.id === id) ?? null;
  }
}
