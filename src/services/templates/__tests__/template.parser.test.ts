import { describe, expect, it } from 'vitest';

import { collectPlaceholders, parseSegments, parseTemplate } from '../template.parser.js';

describe('template parser', () => {
  it('splits literals and placeholders with defaults', () => {
    expect(parseSegments('Unit {vehicle_id} at {location|depot}')).toEqual([
      { kind: 'literal', text: 'Unit ' },
      { kind: 'placeholder', field: 'vehicle_id' },
      { kind: 'literal', text: ' at ' },
      { kind: 'placeholder', field: 'location', defaultValue: 'depot' },
    ]);
  });

  it('accepts empty-object and empty-array defaults', () => {
    expect(parseSegments('{meta|{}}')).toEqual([{ kind: 'placeholder', field: 'meta', defaultValue: '{}' }]);
    expect(parseSegments('{tags|[]}')).toEqual([{ kind: 'placeholder', field: 'tags', defaultValue: '[]' }]);
  });

  it('leaves strings without placeholders as plain values', () => {
    expect(parseTemplate('{ not a field }')).toEqual({ kind: 'value', value: '{ not a field }' });
    expect(parseTemplate(42)).toEqual({ kind: 'value', value: 42 });
  });

  it('collects placeholder names once, in document order', () => {
    const ast = parseTemplate({
      a: '{vehicle.id}',
      b: ['{date}', { c: '{vehicle.id} on {date}' }],
    });
    expect(collectPlaceholders(ast)).toEqual(['vehicle.id', 'date']);
  });
});
