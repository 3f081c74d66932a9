import * as path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, ManifestParseError } from '../src/errors.js';
import { loadSemanticManifestFromSource } from '../src/manifest/loader.js';
import { parseSemanticManifest } from '../src/manifest/parser.js';
import { filterTemplates, relationName } from '../src/manifest/schema.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const MINIMAL = JSON.stringify({
  semantic_models: [
    {
      name: 'Orders',
      node_relation: { alias: 'orders', schema_name: 'main' },
      measures: [{ name: 'Revenue', agg: 'sum', create_metric: true }],
      dimensions: [{ name: 'Region', type: 'categorical' }],
    },
  ],
});

describe('parseSemanticManifest', () => {
  it('lowercases element names', () => {
    const manifest = parseSemanticManifest(MINIMAL);
    const [model] = manifest.semantic_models;
    expect(model?.name).toBe('orders');
    expect(model?.measures.map((m) => m.name)).toEqual(['revenue']);
    expect(model?.dimensions.map((d) => d.name)).toEqual(['region']);
    expect(model?.entities).toEqual([]);
  });

  it('creates a simple metric for measures flagged create_metric', () => {
    const manifest = parseSemanticManifest(MINIMAL);
    expect(manifest.metrics).toHaveLength(1);
    expect(manifest.metrics[0]).toMatchObject({ name: 'revenue', type: 'simple', type_params: { measure: { name: 'revenue' } } });
  });

  it('keeps an existing metric instead of creating a proxy with the same name', () => {
    const text = JSON.stringify({
      ...JSON.parse(MINIMAL),
      metrics: [{ name: 'revenue', description: 'hand written', type: 'simple', type_params: { measure: { name: 'revenue' } } }],
    });
    const manifest = parseSemanticManifest(text, { proxyMetricLogLevel: 'error' });
    expect(manifest.metrics).toHaveLength(1);
    expect(manifest.metrics[0]?.description).toBe('hand written');
  });

  it('reports invalid JSON as a parse error', () => {
    expect(() => parseSemanticManifest('{ not json')).toThrow(ManifestParseError);
    expect(() => parseSemanticManifest('{ not json')).toThrow('Semantic manifest is not valid JSON');
  });

  it('lists schema violations with their paths', () => {
    const text = JSON.stringify({
      semantic_models: [{ name: 'orders', node_relation: { alias: 'orders', schema_name: 'main' }, measures: [{ name: 'x', agg: 'median' }] }],
    });
    try {
      parseSemanticManifest(text);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ManifestParseError);
      if (!(e instanceof ManifestParseError)) throw e;
      expect(e.issues).toHaveLength(1);
      expect(e.issues[0]).toMatch(/^semantic_models\.0\.measures\.0\.agg: /);
      expect(e.message.split('\n')[0]).toBe('Semantic manifest does not match the expected schema:');
    }
  });

  it('accepts the nulls dbt writes for unset fields', () => {
    const text = JSON.stringify({
      semantic_models: [
        {
          name: 'orders',
          description: null,
          node_relation: { alias: 'orders', schema_name: 'main', database: null, relation_name: null },
          defaults: null,
          entities: null,
          measures: [{ name: 'revenue', agg: 'sum', expr: null, agg_time_dimension: null }],
          dimensions: null,
        },
      ],
      metrics: null,
    });
    const manifest = parseSemanticManifest(text);
    expect(manifest.metrics).toEqual([]);
    expect(manifest.semantic_models[0]?.dimensions).toEqual([]);
  });
});

describe('manifest schema helpers', () => {
  it('builds relation names from their parts', () => {
    expect(relationName({ alias: 'orders', schema_name: 'main' })).toBe('main.orders');
    expect(relationName({ alias: 'orders', schema_name: 'main', database: 'warehouse' })).toBe('warehouse.main.orders');
    expect(relationName({ alias: 'orders', schema_name: 'main', relation_name: '"db"."main"."orders"' })).toBe(
      '"db"."main"."orders"',
    );
  });

  it('extracts where templates from a filter', () => {
    expect(filterTemplates(null)).toEqual([]);
    expect(filterTemplates({ where_filters: [{ where_sql_template: 'a = 1' }, { where_sql_template: 'b = 2' }] })).toEqual([
      'a = 1',
      'b = 2',
    ]);
  });
});

describe('loadSemanticManifestFromSource', () => {
  it('loads a manifest file', async () => {
    const manifest = await loadSemanticManifestFromSource(fixture('minimal_manifest.json'));
    expect(manifest.semantic_models.map((m) => m.name)).toEqual(['orders']);
    expect(manifest.metrics.map((m) => m.name)).toEqual(['m1']);
  });

  it('names the resolved path of a missing file', async () => {
    const missing = path.join('test', 'fixtures', 'does_not_exist.json');
    await expect(loadSemanticManifestFromSource(missing)).rejects.toThrow(
      `Semantic manifest not found: ${path.resolve(missing)}`,
    );
    await expect(loadSemanticManifestFromSource(missing)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('reads stdin when the source is -', async () => {
    const manifest = await loadSemanticManifestFromSource(' - ', { readStdin: async () => MINIMAL });
    expect(manifest).not.toBeNull();
    expect(manifest.semantic_models).toHaveLength(1);
  });

  it('rejects whitespace-only stdin', async () => {
    await expect(loadSemanticManifestFromSource('-', { readStdin: async () => ' \n\t ' })).rejects.toThrow(
      'stdin is empty; pass a semantic manifest JSON string or file.',
    );
  });

  it('lets parse errors through unchanged', async () => {
    await expect(loadSemanticManifestFromSource('-', { readStdin: async () => '[1, 2' })).rejects.toBeInstanceOf(
      ManifestParseError,
    );
  });
});
