import { z } from 'zod';

/*
 * Subset of the dbt semantic manifest (semantic_manifest.json) the engine
 * reads. Unknown keys are dropped; dbt writes `null` for unset optionals.
 */

export const TIME_GRANULARITIES = ['day', 'week', 'month', 'quarter', 'year'] as const;
export type TimeGranularity = (typeof TIME_GRANULARITIES)[number];

export const TimeGranularitySchema = z.enum(TIME_GRANULARITIES);

export const NodeRelationSchema = z.object({
  alias: z.string().min(1),
  schema_name: z.string().min(1),
  database: z.string().nullish(),
  relation_name: z.string().nullish(),
});

export const EntitySchema = z.object({
  name: z.string().min(1),
  type: z.enum(['primary', 'unique', 'foreign', 'natural']),
  expr: z.string().nullish(),
  description: z.string().nullish(),
});

export const MeasureSchema = z.object({
  name: z.string().min(1),
  agg: z.enum(['sum', 'min', 'max', 'count', 'count_distinct', 'sum_boolean', 'average']),
  expr: z.union([z.string(), z.number()]).nullish().transform((v) => (v == null ? null : String(v))),
  description: z.string().nullish(),
  agg_time_dimension: z.string().nullish(),
  create_metric: z.boolean().nullish(),
});

export const DimensionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['categorical', 'time']),
  expr: z.string().nullish(),
  description: z.string().nullish(),
  is_partition: z.boolean().nullish(),
  type_params: z
    .object({
      time_granularity: TimeGranularitySchema.nullish(),
    })
    .nullish(),
});

export const SemanticModelSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  node_relation: NodeRelationSchema,
  primary_entity: z.string().nullish(),
  defaults: z
    .object({
      agg_time_dimension: z.string().nullish(),
    })
    .nullish(),
  entities: z.array(EntitySchema).nullish().transform((v) => v ?? []),
  measures: z.array(MeasureSchema).nullish().transform((v) => v ?? []),
  dimensions: z.array(DimensionSchema).nullish().transform((v) => v ?? []),
});

export const WhereFilterIntersectionSchema = z.object({
  where_filters: z.array(z.object({ where_sql_template: z.string() })),
});

export const MetricInputMeasureSchema = z.object({
  name: z.string().min(1),
  filter: WhereFilterIntersectionSchema.nullish(),
  alias: z.string().nullish(),
});

export const MetricInputSchema = z.object({
  name: z.string().min(1),
  filter: WhereFilterIntersectionSchema.nullish(),
  alias: z.string().nullish(),
  offset_window: z.unknown().optional(),
  offset_to_grain: z.unknown().optional(),
});

export const MetricSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  label: z.string().nullish(),
  type: z.enum(['simple', 'ratio', 'derived', 'cumulative', 'conversion']),
  filter: WhereFilterIntersectionSchema.nullish(),
  type_params: z.object({
    measure: MetricInputMeasureSchema.nullish(),
    numerator: MetricInputSchema.nullish(),
    denominator: MetricInputSchema.nullish(),
    expr: z.string().nullish(),
    metrics: z.array(MetricInputSchema).nullish(),
  }),
});

export const SemanticManifestSchema = z.object({
  semantic_models: z.array(SemanticModelSchema),
  metrics: z.array(MetricSchema).nullish().transform((v) => v ?? []),
  project_configuration: z.record(z.unknown()).nullish(),
});

export type NodeRelation = z.infer<typeof NodeRelationSchema>;
export type Entity = z.infer<typeof EntitySchema>;
export type Measure = z.infer<typeof MeasureSchema>;
export type Dimension = z.infer<typeof DimensionSchema>;
export type SemanticModel = z.infer<typeof SemanticModelSchema>;
export type WhereFilterIntersection = z.infer<typeof WhereFilterIntersectionSchema>;
export type MetricInputMeasure = z.infer<typeof MetricInputMeasureSchema>;
export type MetricInput = z.infer<typeof MetricInputSchema>;
export type Metric = z.infer<typeof MetricSchema>;
export type SemanticManifest = z.infer<typeof SemanticManifestSchema>;

/** Fully qualified relation name, e.g. `analytics.fct_bookings`. */
export function relationName(relation: NodeRelation): string {
  if (relation.relation_name) return relation.relation_name;
  const parts = [relation.database, relation.schema_name, relation.alias].filter((p): p is string => !!p);
  return parts.join('.');
}

export function filterTemplates(filter: WhereFilterIntersection | null | undefined): string[] {
  return (filter?.where_filters ?? []).map((f) => f.where_sql_template);
}
