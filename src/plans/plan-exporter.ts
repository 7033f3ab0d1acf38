import type { Plan } from '../types/plan.types.js';

export interface RenderedDocument {
  filename: string;
  contentType: string;
  data: Buffer;
}

/** Renders a finished plan into a downloadable document */
export abstract class PlanExporter {
  abstract render(plan: Plan): Promise<RenderedDocument>;
}
