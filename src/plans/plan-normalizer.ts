/**
 * Best-effort mapping of raw model output onto Room / PlanEntry / TemplateSchema.
 *
 * Malformed fields are defaulted or dropped. The only hard failure is output
 * with no identifiable room or entry list, which raises NormalizationError.
 * Feeding a NormalizedPlan back in yields the same entries (fixed point).
 */

import { NormalizationError } from '../common/errors.js';
import { isRecord } from '../common/guards.js';
import { extractJson } from '../common/json-extract.js';
import {
  ALL_DAYS,
  type DayKey,
  type FrequencyMap,
  type NormalizedPlan,
  type PlanEntry,
  type Room,
  type TemplateSchema,
} from '../types/plan.types.js';

export interface NormalizeContext {
  /**
   * string/null: use as-is.
   * undefined: keep whatever template name the provider returned (conversion).
   */
  templateName?: string | null;
  /** Degraded mode: no area source, so every area is unknown */
  discardAreas?: boolean;
}

const ENTRY_LIST_KEYS = ['entries', 'rows', 'items', 'plan_entries', 'planEntries', 'cleaning_plan', 'cleaningPlan'];
const ROOM_LIST_KEYS = ['rooms', 'spaces', 'areas', 'room_list', 'roomList'];
const WRAPPER_KEYS = ['plan', 'data', 'result', 'output'];

const DAY_ALIASES: Record<DayKey, string[]> = {
  MAN: ['man', 'mandag', 'mon', 'monday', 'mo'],
  TIRS: ['tirs', 'tir', 'tirsdag', 'tue', 'tues', 'tuesday', 'tu'],
  ONS: ['ons', 'onsdag', 'wed', 'wednesday', 'we'],
  TORS: ['tors', 'tor', 'torsdag', 'thu', 'thur', 'thurs', 'thursday', 'th'],
  FRE: ['fre', 'fredag', 'fri', 'friday', 'fr'],
  LØR: ['lør', 'lor', 'loer', 'lørdag', 'lordag', 'sat', 'saturday', 'sa'],
  SØN: ['søn', 'son', 'soen', 'søndag', 'sondag', 'sun', 'sunday', 'su'],
};

const DAY_LOOKUP = new Map<string, DayKey>(
  ALL_DAYS.flatMap((day) => DAY_ALIASES[day].map((alias): [string, DayKey] => [alias, day])),
);

const TRUTHY_STRINGS = new Set(['x', 'yes', 'ja', 'y', 'j', 'true', '1', 'on']);

// ────────────────────────────────────────────
// Field helpers
// ────────────────────────────────────────────

function asInput(raw: unknown): unknown {
  return typeof raw === 'string' ? extractJson(raw) : raw;
}

function findList(raw: unknown, keys: string[], depth = 0): unknown[] | null {
  if (Array.isArray(raw)) return raw;
  if (!isRecord(raw)) return null;
  for (const key of keys) {
    const value = raw[key];
    if (Array.isArray(value)) return value;
  }
  if (depth >= 2) return null;
  for (const key of WRAPPER_KEYS) {
    const found = findList(raw[key], keys, depth + 1);
    if (found) return found;
  }
  return null;
}

function pickString(source: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return null;
}

function pickText(source: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = source[key];
    if (Array.isArray(value)) {
      const parts = value.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
      if (parts.length > 0) return parts.map((p) => p.trim()).join('; ');
    }
  }
  return pickString(source, keys);
}

/** Non-negative finite numbers survive; strings and everything else become null */
export function coerceArea(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return null;
  return value;
}

function pickArea(source: Record<string, unknown>, keys: string[]): number | null {
  for (const key of keys) {
    if (key in source && source[key] !== undefined) return coerceArea(source[key]);
  }
  return null;
}

export function resolveDay(key: string): DayKey | null {
  const normalized = key.trim().toLowerCase().replace(/\.$/, '');
  return DAY_LOOKUP.get(normalized) ?? null;
}

function isTruthy(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value > 0;
  if (typeof value === 'string') return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  return false;
}

export function emptyFrequency(): FrequencyMap {
  return { MAN: false, TIRS: false, ONS: false, TORS: false, FRE: false, LØR: false, SØN: false };
}

/**
 * Day map, day list, comma-separated days or nothing. Unknown keys are dropped;
 * the result always has exactly the seven day keys.
 */
export function normalizeFrequency(raw: unknown): FrequencyMap {
  const frequency = emptyFrequency();
  const markDays = (names: unknown[]) => {
    for (const name of names) {
      if (typeof name !== 'string') continue;
      const day = resolveDay(name);
      if (day) frequency[day] = true;
    }
  };

  if (typeof raw === 'string') {
    markDays(raw.split(/[\s,;/]+/));
  } else if (Array.isArray(raw)) {
    markDays(raw);
  } else if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      const day = resolveDay(key);
      if (day && isTruthy(value)) frequency[day] = true;
    }
  }
  return frequency;
}

/** Frequency may sit under its own key or as day columns on the entry itself */
function entryFrequency(item: Record<string, unknown>): FrequencyMap {
  const nested = item.frequency ?? item.days ?? item.schedule ?? item.frekvens;
  if (nested !== undefined) return normalizeFrequency(nested);
  const inline: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(item)) {
    if (resolveDay(key)) inline[key] = value;
  }
  return normalizeFrequency(inline);
}

// ────────────────────────────────────────────
// Plan
// ────────────────────────────────────────────

function normalizeEntry(
  item: Record<string, unknown>,
  id: number,
  context: NormalizeContext,
): PlanEntry {
  return {
    id,
    roomName:
      pickString(item, ['room_name', 'roomName', 'room', 'name', 'area_name', 'areaName', 'rom']) ??
      `Rom ${id}`,
    areaM2: context.discardAreas
      ? null
      : pickArea(item, ['area_m2', 'areaM2', 'area', 'size_m2', 'sizeM2', 'areal']),
    floor: pickString(item, ['floor', 'etg', 'etasje', 'level']),
    description: pickText(item, ['description', 'tasks', 'beskrivelse', 'task']) ?? '',
    notes: pickText(item, ['notes', 'note', 'comment', 'merknad']),
    frequency: entryFrequency(item),
  };
}

export function computeTotalArea(entries: readonly { areaM2: number | null }[]): number {
  return entries.reduce((sum, entry) => sum + (entry.areaM2 ?? 0), 0);
}

export function normalizePlan(raw: unknown, context: NormalizeContext = {}): NormalizedPlan {
  const input = asInput(raw);
  const list = findList(input, ENTRY_LIST_KEYS);
  if (!list) {
    throw new NormalizationError('Model output contained no plan entries', 'no_entry_list');
  }

  const entries = list
    .filter(isRecord)
    .map((item, index) => normalizeEntry(item, index + 1, context));

  let templateName: string | null;
  if (context.templateName !== undefined) {
    templateName = context.templateName;
  } else {
    templateName = isRecord(input) ? pickString(input, ['template_name', 'templateName']) : null;
  }

  return {
    entries,
    totalAreaM2: computeTotalArea(entries),
    templateName,
  };
}

// ────────────────────────────────────────────
// Rooms
// ────────────────────────────────────────────

export function normalizeRooms(raw: unknown, context: Pick<NormalizeContext, 'discardAreas'> = {}): Room[] {
  const list = findList(asInput(raw), ROOM_LIST_KEYS);
  if (!list) {
    throw new NormalizationError('Model output contained no room list', 'no_room_list');
  }

  const seen = new Map<string, number>();
  return list.filter(isRecord).map((item, index) => {
    const baseId = pickString(item, ['id', 'room_id', 'roomId', 'number', 'nr']) ?? `r${index + 1}`;
    const count = seen.get(baseId) ?? 0;
    seen.set(baseId, count + 1);
    const id = count === 0 ? baseId : `${baseId}-${count + 1}`;

    return {
      id,
      name: pickString(item, ['name', 'room_name', 'roomName', 'label', 'rom']) ?? `Rom ${index + 1}`,
      type: pickString(item, ['type', 'category', 'room_type', 'roomType', 'kategori']) ?? 'unknown',
      floor: pickString(item, ['floor', 'etg', 'etasje', 'level']),
      building: pickString(item, ['building', 'bygg', 'building_name', 'buildingName']),
      areaM2: context.discardAreas ? null : pickArea(item, ['area_m2', 'areaM2', 'area', 'size_m2', 'areal']),
      notes: pickText(item, ['notes', 'note', 'comment', 'merknad']),
    };
  });
}

// ────────────────────────────────────────────
// Template schema
// ────────────────────────────────────────────

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const result: string[] = [];
  for (const item of value) {
    if (typeof item === 'string' && item.trim()) {
      result.push(item.trim());
    } else if (isRecord(item)) {
      const label = pickString(item, ['name', 'title', 'label', 'header']);
      if (label) result.push(label);
    }
  }
  return result;
}

/** Never throws; unrecognisable output degrades to a name-only schema */
export function normalizeTemplateSchema(raw: unknown, fallbackName: string): TemplateSchema {
  const input = asInput(raw);
  if (!isRecord(input)) {
    return { name: fallbackName, sections: [], categories: [], columns: [] };
  }
  return {
    name: pickString(input, ['template_name', 'templateName', 'name', 'title']) ?? fallbackName,
    sections: stringList(input.sections),
    categories: stringList(input.categories),
    columns: stringList(input.columns),
  };
}
