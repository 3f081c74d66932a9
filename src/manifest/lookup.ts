import {
  AmbiguousReferenceError,
  InvalidQueryError,
  UnknownElementError,
  UnsupportedOperationError,
  suggestNames,
} from '../errors.js';
import type { Dimension, Entity, Measure, Metric, SemanticManifest, SemanticModel, TimeGranularity } from './schema.js';
import { TIME_GRANULARITIES } from './schema.js';

export const METRIC_TIME = 'metric_time';
export const ELEMENT_SEPARATOR = '__';

const JOINABLE_ENTITY_TYPES: ReadonlySet<Entity['type']> = new Set(['primary', 'unique', 'natural']);

export interface MeasureLookupResult {
  measure: Measure;
  semanticModel: SemanticModel;
}

/** Join from the source model to another model through a shared entity. */
export interface EntityJoin {
  entity: string;
  /** Entity expression in the source model. */
  leftExpr: string;
  rightModel: SemanticModel;
  /** Entity expression in the joined model. */
  rightExpr: string;
}

export type LinkableElementKind = 'dimension' | 'time_dimension' | 'entity' | 'metric_time';

export interface LinkableElement {
  /** Name as requested, lowercased. */
  name: string;
  /** Output column name. */
  columnName: string;
  kind: LinkableElementKind;
  /** Model that holds the column. */
  semanticModel: SemanticModel;
  /** Column expression inside `semanticModel`. */
  expr: string;
  grain: TimeGranularity | null;
  join: EntityJoin | null;
}

export interface ResolutionContext {
  sourceModel: SemanticModel;
  /** Time dimension standing in for metric_time; null where metric_time is unavailable. */
  aggTimeDimension: Dimension | null;
}

export function granularityRank(grain: TimeGranularity): number {
  return TIME_GRANULARITIES.indexOf(grain);
}

function isGranularity(value: string): value is TimeGranularity {
  return (TIME_GRANULARITIES as readonly string[]).includes(value);
}

export function dimensionGrain(dimension: Dimension): TimeGranularity {
  return dimension.type_params?.time_granularity ?? 'day';
}

function entityExpr(entity: Entity): string {
  return entity.expr ?? entity.name;
}

function dimensionExpr(dimension: Dimension): string {
  return dimension.expr ?? dimension.name;
}

/**
 * Read-only index over a parsed semantic manifest.
 */
export class SemanticManifestLookup {
  private readonly modelsByName = new Map<string, SemanticModel>();
  private readonly metricsByName = new Map<string, Metric>();
  private readonly measuresByName = new Map<string, MeasureLookupResult>();

  constructor(readonly semanticManifest: SemanticManifest) {
    for (const model of semanticManifest.semantic_models) {
      if (!this.modelsByName.has(model.name)) this.modelsByName.set(model.name, model);
      for (const measure of model.measures) {
        if (!this.measuresByName.has(measure.name)) {
          this.measuresByName.set(measure.name, { measure, semanticModel: model });
        }
      }
    }
    for (const metric of semanticManifest.metrics) {
      if (!this.metricsByName.has(metric.name)) this.metricsByName.set(metric.name, metric);
    }
  }

  semanticModels(): SemanticModel[] {
    return [...this.modelsByName.values()];
  }

  metricNames(): string[] {
    return [...this.metricsByName.keys()].sort();
  }

  getSemanticModel(name: string): SemanticModel {
    const model = this.modelsByName.get(name.trim().toLowerCase());
    if (!model) throw new UnknownElementError('semantic model', name, suggestNames(name, this.modelsByName.keys()));
    return model;
  }

  getMetric(name: string): Metric {
    const metric = this.metricsByName.get(name.trim().toLowerCase());
    if (!metric) throw new UnknownElementError('metric', name, suggestNames(name, this.metricsByName.keys()));
    return metric;
  }

  getMeasure(name: string): MeasureLookupResult {
    const hit = this.measuresByName.get(name.trim().toLowerCase());
    if (!hit) throw new UnknownElementError('measure', name, suggestNames(name, this.measuresByName.keys()));
    return hit;
  }

  /** Time dimension that stands in for metric_time when aggregating `measureName`. */
  aggTimeDimensionFor(measureName: string): Dimension | null {
    const { measure, semanticModel } = this.getMeasure(measureName);
    const name = measure.agg_time_dimension ?? semanticModel.defaults?.agg_time_dimension;
    if (!name) return null;
    const dimension = semanticModel.dimensions.find((d) => d.name === name);
    if (!dimension || dimension.type !== 'time') {
      throw new InvalidQueryError(
        `Measure '${measure.name}' uses '${name}' as its aggregation time dimension, but semantic model '${semanticModel.name}' has no time dimension by that name.`,
      );
    }
    return dimension;
  }

  /** Models reachable from `source` in one join, keyed by the joined model. */
  joinableModels(source: SemanticModel): EntityJoin[] {
    const joins: EntityJoin[] = [];
    for (const sourceEntity of source.entities) {
      for (const model of this.modelsByName.values()) {
        if (model.name === source.name) continue;
        const target = model.entities.find((e) => e.name === sourceEntity.name && JOINABLE_ENTITY_TYPES.has(e.type));
        if (!target) continue;
        joins.push({
          entity: sourceEntity.name,
          leftExpr: entityExpr(sourceEntity),
          rightModel: model,
          rightExpr: entityExpr(target),
        });
      }
    }
    return joins;
  }

  /**
   * Resolves a group-by style name (`metric_time__month`, `listing__country`,
   * `country`, `listing`) against the models reachable from the source model.
   */
  resolveElement(rawName: string, context: ResolutionContext): LinkableElement {
    const name = rawName.trim().toLowerCase();
    const parts = name.split(ELEMENT_SEPARATOR);
    let grain: TimeGranularity | null = null;
    const last = parts[parts.length - 1];
    if (parts.length > 1 && last !== undefined && isGranularity(last)) {
      grain = last;
      parts.pop();
    }

    if (parts.length === 1 && parts[0] === METRIC_TIME) {
      return this.resolveMetricTime(name, grain, context);
    }
    if (parts.length === 1) {
      return this.resolveBareName(name, parts[0] ?? '', grain, context);
    }
    if (parts.length === 2) {
      return this.resolveQualifiedName(name, parts[0] ?? '', parts[1] ?? '', grain, context);
    }
    throw new UnsupportedOperationError(
      `'${rawName}' needs more than one join; only single-hop entity joins are supported.`,
    );
  }

  private resolveMetricTime(name: string, grain: TimeGranularity | null, context: ResolutionContext): LinkableElement {
    const dimension = context.aggTimeDimension;
    if (!dimension) {
      throw new InvalidQueryError(
        `'${name}' is not available: semantic model '${context.sourceModel.name}' has no aggregation time dimension for this query.`,
      );
    }
    const resolvedGrain = this.checkGrain(name, dimension, grain);
    return {
      name,
      columnName: `${METRIC_TIME}${ELEMENT_SEPARATOR}${resolvedGrain}`,
      kind: 'metric_time',
      semanticModel: context.sourceModel,
      expr: dimensionExpr(dimension),
      grain: resolvedGrain,
      join: null,
    };
  }

  private checkGrain(name: string, dimension: Dimension, grain: TimeGranularity | null): TimeGranularity {
    const defined = dimensionGrain(dimension);
    if (grain === null) return defined;
    if (granularityRank(grain) < granularityRank(defined)) {
      throw new InvalidQueryError(
        `'${name}' asks for '${grain}' granularity, but '${dimension.name}' is defined at '${defined}'.`,
      );
    }
    return grain;
  }

  private dimensionElement(
    name: string,
    base: string,
    dimension: Dimension,
    model: SemanticModel,
    grain: TimeGranularity | null,
    join: EntityJoin | null,
  ): LinkableElement {
    if (dimension.type === 'time') {
      const resolvedGrain = this.checkGrain(name, dimension, grain);
      return {
        name,
        columnName: `${base}${ELEMENT_SEPARATOR}${resolvedGrain}`,
        kind: 'time_dimension',
        semanticModel: model,
        expr: dimensionExpr(dimension),
        grain: resolvedGrain,
        join,
      };
    }
    if (grain !== null) {
      throw new InvalidQueryError(`'${name}' sets a granularity, but '${dimension.name}' is not a time dimension.`);
    }
    return { name, columnName: base, kind: 'dimension', semanticModel: model, expr: dimensionExpr(dimension), grain: null, join };
  }

  private resolveBareName(
    name: string,
    base: string,
    grain: TimeGranularity | null,
    context: ResolutionContext,
  ): LinkableElement {
    const { sourceModel } = context;
    const joins = this.joinableModels(sourceModel);

    const sourceEntity = sourceModel.entities.find((e) => e.name === base);
    const sourceDimension = sourceModel.dimensions.find((d) => d.name === base);
    const joinedDimensions = joins.flatMap((join) => {
      const dimension = join.rightModel.dimensions.find((d) => d.name === base);
      return dimension ? [{ join, dimension }] : [];
    });

    if (sourceEntity && sourceDimension) {
      throw new AmbiguousReferenceError(name, [`entity ${base}`, `dimension ${base}`]);
    }
    if (sourceEntity) {
      if (grain !== null) throw new InvalidQueryError(`'${name}' sets a granularity, but '${base}' is an entity.`);
      return {
        name,
        columnName: base,
        kind: 'entity',
        semanticModel: sourceModel,
        expr: entityExpr(sourceEntity),
        grain: null,
        join: null,
      };
    }
    if (sourceDimension) {
      return this.dimensionElement(name, base, sourceDimension, sourceModel, grain, null);
    }
    if (joinedDimensions.length > 1) {
      throw new AmbiguousReferenceError(
        name,
        joinedDimensions.map(({ join }) => `${join.entity}${ELEMENT_SEPARATOR}${base}`),
      );
    }
    const only = joinedDimensions[0];
    if (only) {
      return this.dimensionElement(name, base, only.dimension, only.join.rightModel, grain, only.join);
    }
    throw new UnknownElementError('group-by item', name, suggestNames(base, this.reachableNames(sourceModel)));
  }

  private resolveQualifiedName(
    name: string,
    entityName: string,
    base: string,
    grain: TimeGranularity | null,
    context: ResolutionContext,
  ): LinkableElement {
    const { sourceModel } = context;
    const qualified = `${entityName}${ELEMENT_SEPARATOR}${base}`;

    if (sourceModel.entities.some((e) => e.name === entityName)) {
      const local = sourceModel.dimensions.find((d) => d.name === base);
      if (local) return this.dimensionElement(name, qualified, local, sourceModel, grain, null);
    }
    for (const join of this.joinableModels(sourceModel)) {
      if (join.entity !== entityName) continue;
      const dimension = join.rightModel.dimensions.find((d) => d.name === base);
      if (dimension) return this.dimensionElement(name, qualified, dimension, join.rightModel, grain, join);
    }
    throw new UnknownElementError('group-by item', name, suggestNames(qualified, this.reachableNames(sourceModel)));
  }

  /** Every name `resolveElement` accepts from `source`, for suggestions. */
  reachableNames(source: SemanticModel): string[] {
    const names = new Set<string>([METRIC_TIME]);
    for (const dimension of source.dimensions) names.add(dimension.name);
    for (const entity of source.entities) {
      names.add(entity.name);
      for (const dimension of source.dimensions) {
        names.add(`${entity.name}${ELEMENT_SEPARATOR}${dimension.name}`);
      }
    }
    for (const join of this.joinableModels(source)) {
      for (const dimension of join.rightModel.dimensions) {
        names.add(`${join.entity}${ELEMENT_SEPARATOR}${dimension.name}`);
      }
    }
    return [...names];
  }
}
