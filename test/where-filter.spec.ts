import { describe, it, expect } from 'vitest';
import { UnsupportedOperationError } from '../src/errors.js';
import { parseWhereTemplate, referenceElementName } from '../src/plan/where-filter.js';

describe('parseWhereTemplate', () => {
  it('splits references from literal SQL', () => {
    expect(parseWhereTemplate("{{ Dimension('listing__Country') }} = 'us'")).toEqual([
      { kind: 'Dimension', name: 'listing__country', grain: null },
      " = 'us'",
    ]);
  });

  it('reads the grain argument and the chained grain call', () => {
    expect(parseWhereTemplate("{{ TimeDimension('metric_time', 'Month') }} >= '2024-01-01'")[0]).toEqual({
      kind: 'TimeDimension',
      name: 'metric_time',
      grain: 'month',
    });
    expect(parseWhereTemplate("{{Dimension(\"booking__ds\").grain('week')}} IS NOT NULL")[0]).toEqual({
      kind: 'Dimension',
      name: 'booking__ds',
      grain: 'week',
    });
  });

  it('handles several references in one filter', () => {
    const parts = parseWhereTemplate("{{ Entity('listing') }} > 10 AND {{ Dimension('is_instant') }}");
    expect(parts).toEqual([
      { kind: 'Entity', name: 'listing', grain: null },
      ' > 10 AND ',
      { kind: 'Dimension', name: 'is_instant', grain: null },
    ]);
  });

  it('passes plain SQL through', () => {
    expect(parseWhereTemplate('booking_value > 100')).toEqual(['booking_value > 100']);
  });

  it('rejects template calls it does not know', () => {
    expect(() => parseWhereTemplate("{{ Metric('bookings', group_by=['listing']) }} > 2")).toThrow(UnsupportedOperationError);
  });
});

describe('referenceElementName', () => {
  it('appends the grain', () => {
    expect(referenceElementName({ kind: 'TimeDimension', name: 'metric_time', grain: 'week' })).toBe('metric_time__week');
    expect(referenceElementName({ kind: 'Dimension', name: 'country', grain: null })).toBe('country');
  });
});
