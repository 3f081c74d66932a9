import type { ZodIssue } from 'zod';
import type { LogLevel } from '../config.js';
import { ManifestParseError } from '../errors.js';
import { createChannelLogger } from '../utils/logger.js';
import type { Metric, MetricInput, SemanticManifest, SemanticModel } from './schema.js';
import { SemanticManifestSchema } from './schema.js';

export const PROXY_METRIC_CHANNEL = 'manifest.proxy-metrics';

export interface ParseManifestOptions {
  /** Minimum severity for the proxy-metric transformation's diagnostics. */
  proxyMetricLogLevel?: LogLevel;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Parses the text of a dbt-generated semantic_manifest.json and applies the
 * transformations the engine relies on (lowercased names, proxy metrics).
 */
export function parseSemanticManifest(text: string, options: ParseManifestOptions = {}): SemanticManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ManifestParseError(`Semantic manifest is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = SemanticManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ManifestParseError(
      'Semantic manifest does not match the expected schema:',
      parsed.error.issues.map(formatIssue),
    );
  }

  const lowered = lowercaseNames(parsed.data);
  return addProxyMetrics(lowered, options.proxyMetricLogLevel ?? 'error');
}

function lowercaseInput<T extends MetricInput>(input: T | null | undefined): T | null | undefined {
  if (!input) return input;
  return { ...input, name: input.name.toLowerCase(), alias: input.alias?.toLowerCase() ?? input.alias };
}

function lowercaseModel(model: SemanticModel): SemanticModel {
  return {
    ...model,
    name: model.name.toLowerCase(),
    primary_entity: model.primary_entity?.toLowerCase() ?? model.primary_entity,
    defaults: model.defaults
      ? { ...model.defaults, agg_time_dimension: model.defaults.agg_time_dimension?.toLowerCase() ?? null }
      : model.defaults,
    entities: model.entities.map((e) => ({ ...e, name: e.name.toLowerCase() })),
    measures: model.measures.map((m) => ({
      ...m,
      name: m.name.toLowerCase(),
      agg_time_dimension: m.agg_time_dimension?.toLowerCase() ?? m.agg_time_dimension,
    })),
    dimensions: model.dimensions.map((d) => ({ ...d, name: d.name.toLowerCase() })),
  };
}

function lowercaseMetric(metric: Metric): Metric {
  const params = metric.type_params;
  return {
    ...metric,
    name: metric.name.toLowerCase(),
    type_params: {
      ...params,
      measure: params.measure
        ? { ...params.measure, name: params.measure.name.toLowerCase(), alias: params.measure.alias?.toLowerCase() ?? null }
        : params.measure,
      numerator: lowercaseInput(params.numerator),
      denominator: lowercaseInput(params.denominator),
      metrics: params.metrics?.map((m) => ({ ...m, name: m.name.toLowerCase(), alias: m.alias?.toLowerCase() ?? null })),
    },
  };
}

function lowercaseNames(manifest: SemanticManifest): SemanticManifest {
  return {
    ...manifest,
    semantic_models: manifest.semantic_models.map(lowercaseModel),
    metrics: manifest.metrics.map(lowercaseMetric),
  };
}

/** Measures flagged `create_metric` get a simple metric of the same name. */
function addProxyMetrics(manifest: SemanticManifest, level: LogLevel): SemanticManifest {
  const log = createChannelLogger(PROXY_METRIC_CHANNEL, level);
  const metrics = [...manifest.metrics];
  const existing = new Set(metrics.map((m) => m.name));

  for (const model of manifest.semantic_models) {
    for (const measure of model.measures) {
      if (!measure.create_metric) continue;
      if (existing.has(measure.name)) {
        log.warn(`Metric '${measure.name}' already exists; not creating a proxy metric for measure '${measure.name}'`, {
          semanticModel: model.name,
        });
        continue;
      }
      log.debug(`Creating proxy metric '${measure.name}'`, { semanticModel: model.name });
      metrics.push({
        name: measure.name,
        description: measure.description,
        type: 'simple',
        type_params: { measure: { name: measure.name } },
      });
      existing.add(measure.name);
    }
  }

  return { ...manifest, metrics };
}
