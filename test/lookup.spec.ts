import { fileURLToPath } from 'url';
import fs from 'fs-extra';
import { describe, it, expect } from 'vitest';
import { AmbiguousReferenceError, InvalidQueryError, UnknownElementError, UnsupportedOperationError } from '../src/errors.js';
import type { ResolutionContext } from '../src/manifest/lookup.js';
import { SemanticManifestLookup } from '../src/manifest/lookup.js';
import { parseSemanticManifest } from '../src/manifest/parser.js';

const bookingsManifest = parseSemanticManifest(
  fs.readFileSync(fileURLToPath(new URL('./fixtures/bookings_manifest.json', import.meta.url)), 'utf-8'),
);

function lookupFor(manifest: unknown): SemanticManifestLookup {
  return new SemanticManifestLookup(parseSemanticManifest(JSON.stringify(manifest)));
}

describe('SemanticManifestLookup', () => {
  const lookup = new SemanticManifestLookup(bookingsManifest);
  const bookings = lookup.getSemanticModel('bookings_source');
  const context: ResolutionContext = { sourceModel: bookings, aggTimeDimension: lookup.aggTimeDimensionFor('bookings') };

  it('finds metrics case-insensitively', () => {
    expect(lookup.getMetric(' INSTANT_BOOKINGS ').name).toBe('instant_bookings');
  });

  it('includes proxy metrics in the sorted metric names', () => {
    expect(lookup.metricNames()).toContain('booking_value');
    expect(lookup.metricNames()[0]).toBe('booking_value');
  });

  it('suggests close metric names', () => {
    expect(() => lookup.getMetric('booking')).toThrow(
      "Unknown metric 'booking'. Did you mean one of: booking_value, bookings, bookings_growth, cumulative_bookings, instant_booking_fraction?",
    );
  });

  it('finds the model that owns a measure', () => {
    expect(lookup.getMeasure('listings').semanticModel.name).toBe('listings_source');
    expect(() => lookup.getMeasure('nights')).toThrow(UnknownElementError);
  });

  it('uses the model default as the aggregation time dimension', () => {
    expect(lookup.aggTimeDimensionFor('bookings')?.name).toBe('ds');
    expect(lookup.aggTimeDimensionFor('listings')?.name).toBe('created_at');
  });

  it('joins only onto models where the entity is unique', () => {
    expect(lookup.joinableModels(bookings).map((j) => [j.entity, j.rightModel.name, j.leftExpr, j.rightExpr])).toEqual([
      ['listing', 'listings_source', 'listing_id', 'listing_id'],
    ]);
    expect(lookup.joinableModels(lookup.getSemanticModel('listings_source'))).toEqual([]);
  });

  it('resolves metric_time to the aggregation time dimension', () => {
    expect(lookup.resolveElement('metric_time', context)).toMatchObject({
      columnName: 'metric_time__day',
      kind: 'metric_time',
      expr: 'ds',
      grain: 'day',
      join: null,
    });
    expect(lookup.resolveElement('metric_time__month', context).columnName).toBe('metric_time__month');
  });

  it('resolves a bare dimension through a join', () => {
    const element = lookup.resolveElement('country', context);
    expect(element).toMatchObject({ name: 'country', columnName: 'country', kind: 'dimension', expr: 'country_code' });
    expect(element.semanticModel.name).toBe('listings_source');
    expect(element.join?.entity).toBe('listing');
  });

  it('resolves entity-qualified names', () => {
    expect(lookup.resolveElement('listing__country', context).columnName).toBe('listing__country');
    const local = lookup.resolveElement('booking__ds__week', context);
    expect(local).toMatchObject({ columnName: 'booking__ds__week', kind: 'time_dimension', grain: 'week', join: null });
  });

  it('resolves bare time dimensions at their own grain', () => {
    expect(lookup.resolveElement('ds', context)).toMatchObject({ columnName: 'ds__day', grain: 'day' });
  });

  it('resolves entities', () => {
    expect(lookup.resolveElement('listing', context)).toMatchObject({ kind: 'entity', columnName: 'listing', expr: 'listing_id' });
  });

  it('rejects a grain on a categorical dimension', () => {
    expect(() => lookup.resolveElement('is_instant__month', context)).toThrow(
      "'is_instant__month' sets a granularity, but 'is_instant' is not a time dimension.",
    );
  });

  it('rejects metric_time without an aggregation time dimension', () => {
    expect(() => lookup.resolveElement('metric_time', { sourceModel: bookings, aggTimeDimension: null })).toThrow(
      InvalidQueryError,
    );
  });

  it('rejects multi-hop names', () => {
    expect(() => lookup.resolveElement('listing__country__code', context)).toThrow(UnsupportedOperationError);
  });

  it('suggests reachable names for unknown group-by items', () => {
    expect(() => lookup.resolveElement('countr', context)).toThrow(
      "Unknown group-by item 'countr'. Did you mean one of: listing__country?",
    );
  });
});

describe('SemanticManifestLookup ambiguity', () => {
  const relation = (alias: string) => ({ alias, schema_name: 'main' });

  it('rejects a bare name reachable through two joins', () => {
    const lookup = lookupFor({
      semantic_models: [
        { name: 'visits', node_relation: relation('visits'), entities: [{ name: 'store', type: 'foreign' }, { name: 'user', type: 'foreign' }] },
        { name: 'stores', node_relation: relation('stores'), entities: [{ name: 'store', type: 'primary' }], dimensions: [{ name: 'region', type: 'categorical' }] },
        { name: 'users', node_relation: relation('users'), entities: [{ name: 'user', type: 'primary' }], dimensions: [{ name: 'region', type: 'categorical' }] },
      ],
    });
    const context = { sourceModel: lookup.getSemanticModel('visits'), aggTimeDimension: null };
    expect(() => lookup.resolveElement('region', context)).toThrow(
      "'region' is ambiguous; qualify it with an entity. Candidates: store__region, user__region",
    );
    expect(lookup.resolveElement('user__region', context).semanticModel.name).toBe('users');
  });

  it('rejects a name that is both an entity and a dimension of the source', () => {
    const lookup = lookupFor({
      semantic_models: [
        {
          name: 'events',
          node_relation: relation('events'),
          entities: [{ name: 'device', type: 'foreign' }],
          dimensions: [{ name: 'device', type: 'categorical' }],
        },
      ],
    });
    const context = { sourceModel: lookup.getSemanticModel('events'), aggTimeDimension: null };
    expect(() => lookup.resolveElement('device', context)).toThrow(AmbiguousReferenceError);
  });

  it('rejects a grain finer than the dimension defines', () => {
    const lookup = lookupFor({
      semantic_models: [
        {
          name: 'budgets',
          node_relation: relation('budgets'),
          dimensions: [{ name: 'period', type: 'time', type_params: { time_granularity: 'month' } }],
        },
      ],
    });
    const context = { sourceModel: lookup.getSemanticModel('budgets'), aggTimeDimension: null };
    expect(() => lookup.resolveElement('period__day', context)).toThrow(
      "'period__day' asks for 'day' granularity, but 'period' is defined at 'month'.",
    );
    expect(lookup.resolveElement('period__quarter', context).columnName).toBe('period__quarter');
  });
});
