import { NormalizationError } from '../common/errors.js';
import {
  coerceArea,
  normalizeFrequency,
  normalizePlan,
  normalizeRooms,
  normalizeTemplateSchema,
} from './plan-normalizer.js';

const providerOutput = {
  template_name: 'Kommunal mal',
  entries: [
    {
      room_name: 'Kontor 101',
      area_m2: 12.5,
      floor: '1',
      description: ['Støvsuge gulv', 'Tømme søppel'],
      frequency: { Mandag: 'x', ons: true, FRE: 1, hver_dag: true },
    },
    { room: 'WC', areal: '4 m2', Man: 'ja', Tors: '' },
    'ikke et objekt',
    { name: 'Gang', area: -3, days: ['tue', 'Sat.'] },
  ],
};

describe('normalizePlan', () => {
  it('maps provider fields onto plan entries', () => {
    const plan = normalizePlan(providerOutput);

    expect(plan.templateName).toBe('Kommunal mal');
    expect(plan.entries).toHaveLength(3);
    expect(plan.entries[0]).toEqual({
      id: 1,
      roomName: 'Kontor 101',
      areaM2: 12.5,
      floor: '1',
      description: 'Støvsuge gulv; Tømme søppel',
      notes: null,
      frequency: { MAN: true, TIRS: false, ONS: true, TORS: false, FRE: true, LØR: false, SØN: false },
    });
    expect(plan.entries[1]).toMatchObject({
      id: 2,
      roomName: 'WC',
      areaM2: null,
      frequency: { MAN: true, TIRS: false, ONS: false, TORS: false, FRE: false, LØR: false, SØN: false },
    });
    expect(plan.entries[2]).toMatchObject({ id: 3, roomName: 'Gang', areaM2: null, description: '' });
    expect(plan.entries[2].frequency).toMatchObject({ TIRS: true, LØR: true, MAN: false });
    expect(plan.totalAreaM2).toBe(12.5);
  });

  it('is a fixed point on its own output', () => {
    const once = normalizePlan(providerOutput);
    expect(normalizePlan(once)).toEqual(once);
  });

  it('reads JSON out of a text reply and finds wrapped lists', () => {
    const text = 'Planen:\n```json\n{"plan": {"rows": [{"rom": "Kjøkken", "areal": 20}]}}\n```';
    const plan = normalizePlan(text, { templateName: null });
    expect(plan.entries.map((e) => [e.roomName, e.areaM2])).toEqual([['Kjøkken', 20]]);
    expect(plan.templateName).toBeNull();
  });

  it('finds the entry list behind bracketed prose', () => {
    const plan = normalizePlan('Rom [se vedlegg] er analysert. {"entries":[{"room_name":"Kontor","area_m2":5}]}');
    expect(plan.entries.map((e) => [e.roomName, e.areaM2])).toEqual([['Kontor', 5]]);
  });

  it('uses the given template name and can discard areas', () => {
    const plan = normalizePlan(providerOutput, { templateName: 'Egen mal', discardAreas: true });
    expect(plan.templateName).toBe('Egen mal');
    expect(plan.entries.every((e) => e.areaM2 === null)).toBe(true);
    expect(plan.totalAreaM2).toBe(0);
  });

  it('accepts an empty entry list', () => {
    expect(normalizePlan({ entries: [] })).toEqual({ entries: [], totalAreaM2: 0, templateName: null });
  });

  it('fails when no entry list can be found', () => {
    expect(() => normalizePlan({ summary: 'Ingen rom' })).toThrow(NormalizationError);
    expect(() => normalizePlan('Beklager, jeg kan ikke lese tegningen.')).toThrow(
      'Model output contained no plan entries',
    );
  });
});

describe('normalizeFrequency', () => {
  it('always yields the seven day keys', () => {
    expect(normalizeFrequency(undefined)).toEqual({
      MAN: false,
      TIRS: false,
      ONS: false,
      TORS: false,
      FRE: false,
      LØR: false,
      SØN: false,
    });
    expect(normalizeFrequency('man, ons / fre')).toMatchObject({ MAN: true, ONS: true, FRE: true, TIRS: false });
    expect(Object.keys(normalizeFrequency({ monday: true, extra: true }))).toEqual([
      'MAN',
      'TIRS',
      'ONS',
      'TORS',
      'FRE',
      'LØR',
      'SØN',
    ]);
  });
});

describe('coerceArea', () => {
  it('keeps only non-negative finite numbers', () => {
    expect(coerceArea(0)).toBe(0);
    expect(coerceArea(8.25)).toBe(8.25);
    expect(coerceArea('12')).toBeNull();
    expect(coerceArea(Number.NaN)).toBeNull();
    expect(coerceArea(-1)).toBeNull();
  });
});

describe('normalizeRooms', () => {
  it('keeps ids unique within the document', () => {
    const rooms = normalizeRooms({
      rooms: [
        { id: '1', name: 'Kontor', type: 'office', area_m2: 10 },
        { id: '1', name: 'Kontor', type: 'office', area_m2: 11 },
        { name: 'Lager' },
      ],
    });
    expect(rooms.map((r) => r.id)).toEqual(['1', '1-2', 'r3']);
    expect(rooms[2]).toEqual({
      id: 'r3',
      name: 'Lager',
      type: 'unknown',
      floor: null,
      building: null,
      areaM2: null,
      notes: null,
    });
  });

  it('fails without a room list', () => {
    expect(() => normalizeRooms({ note: 'tom' })).toThrow('Model output contained no room list');
  });
});

describe('normalizeTemplateSchema', () => {
  it('reads names, sections and columns', () => {
    expect(
      normalizeTemplateSchema(
        { template_name: 'Skolemal', sections: ['Klasserom'], columns: [{ header: 'Rom' }, 'Areal', ''] },
        'mal',
      ),
    ).toEqual({ name: 'Skolemal', sections: ['Klasserom'], categories: [], columns: ['Rom', 'Areal'] });
  });

  it('falls back to a name-only schema', () => {
    expect(normalizeTemplateSchema('ingen struktur', 'mal')).toEqual({
      name: 'mal',
      sections: [],
      categories: [],
      columns: [],
    });
  });
});
