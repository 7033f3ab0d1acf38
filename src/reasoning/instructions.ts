/**
 * Built-in per-capability instructions, appended to the admin system prompt,
 * and the per-request hints for floor-plan analysis.
 */

import type { Capability } from '../types/reasoning.types.js';
import type { FloorPlanOptions } from '../types/options.types.js';

export const CAPABILITY_INSTRUCTIONS: Record<Capability, string> = {
  analyze_floorplan:
    'You receive a floor plan as an image or PDF. Extract a JSON object with the key "rooms". ' +
    'Each room has the fields id, name, type, floor, building, area_m2 (number or null) and notes (may be empty). ' +
    'Answer with JSON only.',
  analyze_template:
    'You receive an example cleaning plan. Describe its structure as a JSON object with the keys ' +
    'template_name, sections (section headings), categories (room or area categories used) and ' +
    'columns (table column headers). Answer with JSON only.',
  generate_plan:
    'You receive a list of rooms as JSON together with a template schema. Return a JSON object with the keys ' +
    'entries, total_area_m2 and template_name. Each entry has room_name, area_m2, floor, description, ' +
    'frequency (a map of MAN, TIRS, ONS, TORS, FRE, LØR, SØN to true or false) and optional notes. ' +
    'Rooms of the same type may share an entry, but every source building must stay represented. ' +
    'Answer with JSON only.',
  convert_to_standard:
    'Normalise the given cleaning plan to the standard format and return JSON in the same shape as plan ' +
    'generation (entries, total_area_m2, template_name). Answer with JSON only.',
};

export function buildSystemInstruction(systemPrompt: string, capability: Capability): string {
  return [systemPrompt.trim(), CAPABILITY_INSTRUCTIONS[capability]].filter(Boolean).join('\n\n');
}

/**
 * Flags that steer how the model fills gaps: missing room names, missing
 * areas, and the reference measurement to scale from when areas are absent.
 */
export function floorplanHints(options: FloorPlanOptions): { payload: unknown; texts: string[] } {
  const { hasRoomNames, hasArea, referenceLabel, referenceWidth, referenceUnit } = options;
  const texts = [`has_room_names=${hasRoomNames}, has_area=${hasArea}, reference_unit=${referenceUnit}.`];

  if (!hasRoomNames) {
    texts.push('The plan has no room names; infer a descriptive name from each room\'s shape and fixtures.');
  }
  if (!hasArea) {
    if (referenceLabel && referenceWidth) {
      texts.push(`Use the reference ${referenceLabel} with width ${referenceWidth}${referenceUnit} to estimate m².`);
    } else if (referenceWidth) {
      texts.push(`Use a reference width of ${referenceWidth}${referenceUnit} to estimate m².`);
    } else if (referenceLabel) {
      texts.push(`Use the reference ${referenceLabel} to estimate m².`);
    } else {
      texts.push('No areas or reference measurement are available; set area_m2 to null.');
    }
  }

  return {
    payload: {
      floorplan_config: {
        has_room_names: hasRoomNames,
        has_area: hasArea,
        reference_unit: referenceUnit,
        reference_label: referenceLabel ?? null,
        reference_width: referenceWidth ?? null,
      },
    },
    texts,
  };
}

/** True when areas cannot be measured or estimated at all */
export function isArealess(options: FloorPlanOptions): boolean {
  return !options.hasArea && !options.referenceWidth && !options.referenceLabel;
}
