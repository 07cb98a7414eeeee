import { validateAgainstDefinition } from './data-point-validation.util';

describe('validateAgainstDefinition', () => {
  const temperature = { data_type: 'numeric' as const, min_value: -40, max_value: 120 };

  it('accepts a conforming value', () => {
    expect(validateAgainstDefinition({ kind: 'numeric', value: 21.5 }, temperature)).toEqual([]);
  });

  it('reports range violations', () => {
    expect(validateAgainstDefinition({ kind: 'numeric', value: 150 }, temperature)).toEqual([
      'value 150 is above maximum 120',
    ]);
    expect(validateAgainstDefinition({ kind: 'numeric', value: -50 }, temperature)).toEqual([
      'value -50 is below minimum -40',
    ]);
  });

  it('reports a kind mismatch', () => {
    expect(validateAgainstDefinition({ kind: 'string', value: 'hot' }, temperature)).toEqual([
      'expected numeric value, got string',
    ]);
  });

  it('accepts objects for geolocation metrics', () => {
    const location = { data_type: 'geolocation' as const, min_value: null, max_value: null };
    expect(validateAgainstDefinition({ kind: 'json', value: { lat: 1, lon: 2 } }, location)).toEqual([]);
  });
});
