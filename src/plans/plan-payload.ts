/**
 * Structured input for the generate_plan call: merged room list, template
 * schema and plan category.
 */

import type { PlanCategory, Room, TemplateSchema } from '../types/plan.types.js';

export const DEFAULT_TEMPLATE_SCHEMA: TemplateSchema = {
  name: 'Standard renholdsplan',
  sections: ['Renholdsplan'],
  categories: ['Kontor', 'Møterom', 'Korridor', 'Toalett', 'Kjøkken', 'Garderobe', 'Lager', 'Trapp'],
  columns: ['Nr', 'Rom', 'Etasje', 'Areal (m²)', 'Beskrivelse', 'MAN', 'TIRS', 'ONS', 'TORS', 'FRE', 'LØR', 'SØN', 'Merknad'],
};

export function sourceTag(documentIndex: number): string {
  return `Dokument ${documentIndex + 1}`;
}

/**
 * Concatenates per-document room lists in submission order. With more than
 * one document every room is tagged with its source and its id is prefixed,
 * so ids stay unique across the merged list. A building read from the plan
 * stays after the tag.
 */
export function mergeRooms(perDocument: readonly Room[][]): Room[] {
  if (perDocument.length === 1) {
    return [...perDocument[0]];
  }
  return perDocument.flatMap((rooms, index) =>
    rooms.map((room) => ({
      ...room,
      id: `d${index + 1}-${room.id}`,
      building: room.building ? `${sourceTag(index)} / ${room.building}` : sourceTag(index),
    })),
  );
}

export interface GenerationPayload {
  rooms: {
    id: string;
    name: string;
    type: string;
    floor: string | null;
    building: string | null;
    area_m2: number | null;
    notes: string | null;
  }[];
  template: {
    template_name: string;
    sections: string[];
    categories: string[];
    columns: string[];
  };
  plan_category: { id: string; name: string } | null;
  has_area: boolean;
}

export function buildGenerationPayload(
  rooms: readonly Room[],
  schema: TemplateSchema,
  category: PlanCategory | null,
  hasArea: boolean,
): GenerationPayload {
  return {
    rooms: rooms.map((room) => ({
      id: room.id,
      name: room.name,
      type: room.type,
      floor: room.floor,
      building: room.building,
      area_m2: room.areaM2,
      notes: room.notes,
    })),
    template: {
      template_name: schema.name,
      sections: schema.sections,
      categories: schema.categories,
      columns: schema.columns,
    },
    plan_category: category ? { id: category.id, name: category.no } : null,
    has_area: hasArea,
  };
}
