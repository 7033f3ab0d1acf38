import { extractJson } from './json-extract.js';

describe('extractJson', () => {
  it('parses a reply that is JSON already', () => {
    expect(extractJson(' {"rooms": [1, 2]} ')).toEqual({ rooms: [1, 2] });
  });

  it('reads a fenced json block', () => {
    const text = 'Her er planen:\n```json\n{"entries": []}\n```\nLykke til!';
    expect(extractJson(text)).toEqual({ entries: [] });
  });

  it('falls back to the first balanced span', () => {
    const text = 'Resultat: [{"name": "WC {1}"}, {"name": "Gang"}] og mer tekst';
    expect(extractJson(text)).toEqual([{ name: 'WC {1}' }, { name: 'Gang' }]);
  });

  it('ignores escaped quotes inside strings', () => {
    expect(extractJson('svar {"note": "sa \\"hei\\" }"} slutt')).toEqual({ note: 'sa "hei" }' });
  });

  it('skips bracketed prose before the data', () => {
    const text = 'Rom [se vedlegg] er analysert. {"entries": [{"room_name": "Kontor", "area_m2": 5}]}';
    expect(extractJson(text)).toEqual({ entries: [{ room_name: 'Kontor', area_m2: 5 }] });
    expect(extractJson('Se {notat} og [1, 2')).toBeUndefined();
  });

  it('returns undefined when nothing parses', () => {
    expect(extractJson('')).toBeUndefined();
    expect(extractJson('Ingen data')).toBeUndefined();
    expect(extractJson('{"open": [1, 2}')).toBeUndefined();
  });
});
