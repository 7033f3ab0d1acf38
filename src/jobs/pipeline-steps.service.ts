/**
 * Gateway steps shared by the plan and batch orchestrators. Each step loads
 * what it needs from the blob store, makes one gateway call and normalizes
 * the reply.
 */

import { Injectable } from '@nestjs/common';
import { PlanCategories } from '../plans/plan-categories.js';
import { normalizePlan, normalizeRooms, normalizeTemplateSchema } from '../plans/plan-normalizer.js';
import { buildGenerationPayload, DEFAULT_TEMPLATE_SCHEMA } from '../plans/plan-payload.js';
import { floorplanHints, isArealess } from '../reasoning/instructions.js';
import { ReasoningGateway } from '../reasoning/reasoning-gateway.service.js';
import { BlobStore } from '../storage/blob-store.js';
import type { FloorPlanOptions } from '../types/options.types.js';
import type { NormalizedPlan, Room, TemplateSchema } from '../types/plan.types.js';
import type { ConfigSnapshot } from '../types/reasoning.types.js';
import { blobInputs, toDocumentInput } from './document-inputs.js';

/** Template name without its extension */
function templateStem(filename: string): string {
  return filename.replace(/\.[^.]+$/, '') || filename;
}

@Injectable()
export class PipelineSteps {
  constructor(
    private readonly gateway: ReasoningGateway,
    private readonly blobStore: BlobStore,
    private readonly categories: PlanCategories,
  ) {}

  async analyzeFloorplan(
    fileId: string,
    options: FloorPlanOptions,
    snapshot: ConfigSnapshot,
    signal: AbortSignal,
  ): Promise<Room[]> {
    signal.throwIfAborted();
    const blob = await this.blobStore.get(fileId);
    const hints = floorplanHints(options);
    const result = await this.gateway.invoke(
      'analyze_floorplan',
      { documents: [toDocumentInput(blob)], texts: hints.texts, payload: hints.payload },
      snapshot,
      signal,
    );
    return normalizeRooms(result.data ?? result.text, { discardAreas: isArealess(options) });
  }

  async analyzeTemplate(templateId: string, snapshot: ConfigSnapshot, signal: AbortSignal): Promise<TemplateSchema> {
    signal.throwIfAborted();
    const blob = await this.blobStore.get(templateId);
    const result = await this.gateway.invoke('analyze_template', blobInputs(blob), snapshot, signal);
    return normalizeTemplateSchema(result.data ?? result.text, templateStem(blob.filename));
  }

  /**
   * One generate_plan call over the merged rooms. Without a template the
   * built-in schema steers the layout and the plan carries no template name.
   */
  async synthesizePlan(
    rooms: readonly Room[],
    schema: TemplateSchema | null,
    options: FloorPlanOptions,
    snapshot: ConfigSnapshot,
    signal: AbortSignal,
  ): Promise<NormalizedPlan> {
    const arealess = isArealess(options);
    const payload = buildGenerationPayload(
      rooms,
      schema ?? DEFAULT_TEMPLATE_SCHEMA,
      this.categories.find(options.planCategory),
      !arealess,
    );
    const result = await this.gateway.invoke('generate_plan', { payload }, snapshot, signal);
    return normalizePlan(result.data ?? result.text, {
      templateName: schema ? schema.name : null,
      discardAreas: arealess,
    });
  }

  /** Whole external plan into the standard shape; keeps the provider's template name */
  async convertDocument(
    fileId: string,
    snapshot: ConfigSnapshot,
    signal: AbortSignal,
  ): Promise<{ filename: string; plan: NormalizedPlan }> {
    const blob = await this.blobStore.get(fileId);
    const result = await this.gateway.invoke('convert_to_standard', blobInputs(blob), snapshot, signal);
    return { filename: blob.filename, plan: normalizePlan(result.data ?? result.text) };
  }
}
