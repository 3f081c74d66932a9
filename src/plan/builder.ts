import type { QueryRequest } from '../engine/request.js';
import { InvalidQueryError, MetricSqlError, UnsupportedOperationError } from '../errors.js';
import type { EntityJoin, LinkableElement, ResolutionContext, SemanticManifestLookup } from '../manifest/lookup.js';
import { METRIC_TIME } from '../manifest/lookup.js';
import type { Dimension, Metric, MetricInput, SemanticModel } from '../manifest/schema.js';
import { filterTemplates } from '../manifest/schema.js';
import { engineLogger } from '../utils/logger.js';
import type { DataflowNode, MeasureSpec, MetricComputation, OrderBySpec, ResolvedWhereFilter } from './nodes.js';
import {
  AggregateMeasuresNode,
  CombineAggregatedOutputsNode,
  ComputeMetricsNode,
  ConstrainTimeRangeNode,
  DataflowPlan,
  FilterElementsNode,
  JoinOnEntitiesNode,
  OrderByLimitNode,
  ReadSqlSourceNode,
  WhereConstraintNode,
} from './nodes.js';
import { parseWhereTemplate, referenceElementName } from './where-filter.js';

class NodeIdGenerator {
  private next = 0;

  id(prefix: string): string {
    return `${prefix}_${this.next++}`;
  }
}

/** Measures that can be read and aggregated together. */
interface MeasureGroup {
  semanticModel: SemanticModel;
  aggTimeDimension: Dimension | null;
  filters: string[];
  measures: MeasureSpec[];
}

interface DerivedPlan {
  metric: Metric;
  expr: string;
  inputs: MetricComputation[];
}

interface OutputElement {
  name: string;
  columnName: string;
}

function dedupe(names: readonly string[]): string[] {
  return [...new Set(names.map((n) => n.trim().toLowerCase()))];
}

function isMetricTimeName(name: string): boolean {
  return name === METRIC_TIME || name.startsWith(`${METRIC_TIME}__`);
}

/**
 * Turns a query request into a dataflow plan: which semantic models to read,
 * how to join and filter them, and how measures become metrics.
 */
export class DataflowPlanBuilder {
  private readonly ids = new NodeIdGenerator();
  private readonly groups = new Map<string, MeasureGroup>();
  private readonly measureColumns = new Map<string, string>();

  constructor(private readonly lookup: SemanticManifestLookup) {}

  buildPlan(request: QueryRequest): DataflowPlan {
    const metricNames = dedupe(request.metricNames ?? []);
    const groupByNames = dedupe(request.groupByNames ?? []);
    if (metricNames.length === 0 && groupByNames.length === 0) {
      throw new InvalidQueryError('At least one metric or group-by item is required.');
    }

    const plan =
      metricNames.length === 0
        ? this.buildDistinctValuesPlan(request, groupByNames)
        : this.buildMetricsPlan(request, metricNames, groupByNames);
    engineLogger.debug('Built dataflow plan', { requestId: request.requestId, nodes: plan.nodes().length });
    return plan;
  }

  private buildMetricsPlan(request: QueryRequest, metricNames: string[], groupByNames: string[]): DataflowPlan {
    const metrics = metricNames.map((name) => this.lookup.getMetric(name));

    const requested: MetricComputation[] = [];
    const derived: DerivedPlan[] = [];
    for (const metric of metrics) {
      if (metric.type === 'derived') {
        derived.push(this.planDerivedMetric(metric));
      } else {
        requested.push(this.planBaseMetric(metric, metric.name, filterTemplates(metric.filter)));
      }
    }

    const aggregates: AggregateMeasuresNode[] = [];
    let outputs: OutputElement[] | null = null;
    for (const group of this.groups.values()) {
      const { node, elements } = this.buildMeasureSource(request, group, groupByNames);
      const columns = elements.map((e) => e.columnName);
      if (outputs && outputs.map((o) => o.columnName).join(',') !== columns.join(',')) {
        throw new InvalidQueryError(
          `Metrics ${metricNames.join(', ')} resolve the group-by items to different columns (${outputs
            .map((o) => o.columnName)
            .join(', ')} vs ${columns.join(', ')}); set an explicit granularity.`,
        );
      }
      outputs = elements;
      aggregates.push(new AggregateMeasuresNode(this.ids.id('am'), node, columns, group.measures));
    }

    const groupByColumns = (outputs ?? []).map((o) => o.columnName);
    let node: DataflowNode =
      aggregates.length === 1 && aggregates[0]
        ? aggregates[0]
        : new CombineAggregatedOutputsNode(this.ids.id('cao'), aggregates, groupByColumns);

    if (derived.length === 0) {
      node = new ComputeMetricsNode(this.ids.id('cm'), node, groupByColumns, requested);
    } else {
      const inner = new InnerMetrics(requested);
      const derivedByName = new Map(derived.map((d): [string, MetricComputation] => [d.metric.name, inner.addDerived(d)]));
      node = new ComputeMetricsNode(this.ids.id('cm'), node, groupByColumns, inner.computations());
      const outer = metrics.map(
        (metric): MetricComputation => derivedByName.get(metric.name) ?? { kind: 'passthrough', name: metric.name },
      );
      node = new ComputeMetricsNode(this.ids.id('cm'), node, groupByColumns, outer);
    }

    return new DataflowPlan(this.applyOrderByLimit(node, request, metricNames, outputs ?? []));
  }

  private buildDistinctValuesPlan(request: QueryRequest, groupByNames: string[]): DataflowPlan {
    const timeName = groupByNames.find(isMetricTimeName);
    if (timeName) {
      throw new InvalidQueryError(`'${timeName}' needs at least one metric in the query.`);
    }
    if (request.timeConstraintStart || request.timeConstraintEnd) {
      throw new InvalidQueryError('A time constraint needs at least one metric in the query.');
    }

    for (const model of this.lookup.semanticModels()) {
      const context: ResolutionContext = { sourceModel: model, aggTimeDimension: null };
      let elements: LinkableElement[];
      try {
        elements = groupByNames.map((name) => this.lookup.resolveElement(name, context));
      } catch (e) {
        if (e instanceof MetricSqlError) {
          engineLogger.debug(`Semantic model '${model.name}' cannot serve the group-by items`, { reason: e.message });
          continue;
        }
        throw e;
      }
      const where = this.resolveWhereFilters(request.whereConstraints ?? [], context);
      let node: DataflowNode = this.readAndJoin(model, elements, where);
      if (where.length) node = new WhereConstraintNode(this.ids.id('wcc'), node, where);
      node = new FilterElementsNode(this.ids.id('pfe'), node, elements, [], true);
      return new DataflowPlan(this.applyOrderByLimit(node, request, [], elements));
    }

    throw new InvalidQueryError(`No semantic model can provide all of: ${groupByNames.join(', ')}.`);
  }

  /** Simple and ratio metrics: register their measures and say how to compute them. */
  private planBaseMetric(metric: Metric, outputName: string, inheritedFilters: string[]): MetricComputation {
    switch (metric.type) {
      case 'simple': {
        const input = metric.type_params.measure;
        if (!input) throw new InvalidQueryError(`Simple metric '${metric.name}' does not name a measure.`);
        const filters = [...inheritedFilters, ...filterTemplates(input.filter)];
        const preferred = input.alias ?? (filters.length ? outputName : input.name);
        const column = this.addMeasure(input.name, preferred, filters);
        return { kind: 'measure', name: outputName, measureColumn: column };
      }
      case 'ratio': {
        const { numerator, denominator } = metric.type_params;
        if (!numerator || !denominator) {
          throw new InvalidQueryError(`Ratio metric '${metric.name}' needs both a numerator and a denominator.`);
        }
        const numeratorColumn = this.planRatioInput(metric, numerator, inheritedFilters);
        const denominatorColumn = this.planRatioInput(metric, denominator, inheritedFilters);
        return { kind: 'ratio', name: outputName, numeratorColumn, denominatorColumn };
      }
      case 'derived':
        throw new UnsupportedOperationError(`Derived metric '${metric.name}' cannot be an input to another metric here.`);
      case 'cumulative':
      case 'conversion':
        throw new UnsupportedOperationError(`Metric '${metric.name}' is a ${metric.type} metric, which is not supported.`);
    }
  }

  private planRatioInput(metric: Metric, input: MetricInput, inheritedFilters: string[]): string {
    const inputMetric = this.lookup.getMetric(input.name);
    if (inputMetric.type !== 'simple') {
      throw new UnsupportedOperationError(
        `Ratio metric '${metric.name}' uses '${inputMetric.name}' (${inputMetric.type}); ratio inputs must be simple metrics.`,
      );
    }
    const filters = [...inheritedFilters, ...filterTemplates(input.filter), ...filterTemplates(inputMetric.filter)];
    const computation = this.planBaseMetric(inputMetric, input.alias ?? inputMetric.name, filters);
    if (computation.kind !== 'measure') throw new InvalidQueryError(`Ratio input '${input.name}' must aggregate a measure.`);
    return computation.measureColumn;
  }

  private planDerivedMetric(metric: Metric): DerivedPlan {
    const expr = metric.type_params.expr;
    const inputs = metric.type_params.metrics ?? [];
    if (!expr || inputs.length === 0) {
      throw new InvalidQueryError(`Derived metric '${metric.name}' needs an expression and input metrics.`);
    }
    const planned: MetricComputation[] = [];
    for (const input of inputs) {
      if (input.offset_window != null || input.offset_to_grain != null) {
        throw new UnsupportedOperationError(`Derived metric '${metric.name}' uses an offset input, which is not supported.`);
      }
      const inputMetric = this.lookup.getMetric(input.name);
      const filters = [...filterTemplates(metric.filter), ...filterTemplates(input.filter), ...filterTemplates(inputMetric.filter)];
      planned.push(this.planBaseMetric(inputMetric, input.alias ?? inputMetric.name, filters));
    }
    return { metric, expr, inputs: planned };
  }

  /** Adds a measure to its group and returns the column it is aggregated into. */
  private addMeasure(measureName: string, preferredColumn: string, filters: string[]): string {
    const { measure, semanticModel } = this.lookup.getMeasure(measureName);
    const aggTimeDimension = this.lookup.aggTimeDimensionFor(measure.name);
    const identity = `${measure.name}|${filters.join(' AND ')}`;

    const existing = this.measureColumns.get(identity);
    if (existing) return existing;

    const taken = new Set(this.measureColumns.values());
    let column = preferredColumn;
    for (let n = 1; taken.has(column); n++) column = `${preferredColumn}_${n}`;
    this.measureColumns.set(identity, column);

    const key = `${semanticModel.name}|${aggTimeDimension?.name ?? ''}|${filters.join(' AND ')}`;
    let group = this.groups.get(key);
    if (!group) {
      group = { semanticModel, aggTimeDimension, filters, measures: [] };
      this.groups.set(key, group);
    }
    group.measures.push({ measure, semanticModel, column, filters });
    return column;
  }

  private buildMeasureSource(
    request: QueryRequest,
    group: MeasureGroup,
    groupByNames: string[],
  ): { node: DataflowNode; elements: LinkableElement[] } {
    const context: ResolutionContext = { sourceModel: group.semanticModel, aggTimeDimension: group.aggTimeDimension };
    const elements = groupByNames.map((name) => this.lookup.resolveElement(name, context));
    const where = this.resolveWhereFilters([...(request.whereConstraints ?? []), ...group.filters], context);

    let node: DataflowNode = this.readAndJoin(group.semanticModel, elements, where);
    if (where.length) node = new WhereConstraintNode(this.ids.id('wcc'), node, where);

    const { timeConstraintStart: start, timeConstraintEnd: end } = request;
    if (start || end) {
      if (!group.aggTimeDimension) {
        throw new InvalidQueryError(
          `Semantic model '${group.semanticModel.name}' has no aggregation time dimension, so a time constraint cannot be applied.`,
        );
      }
      node = new ConstrainTimeRangeNode(this.ids.id('ctr'), node, group.aggTimeDimension, start, end);
    }

    node = new FilterElementsNode(this.ids.id('pfe'), node, elements, group.measures, false);
    return { node, elements };
  }

  private readAndJoin(model: SemanticModel, elements: LinkableElement[], where: ResolvedWhereFilter[]): DataflowNode {
    const joins = new Map<string, EntityJoin>();
    const referenced = [
      ...elements,
      ...where.flatMap((w) => w.parts.filter((p): p is LinkableElement => typeof p !== 'string')),
    ];
    for (const element of referenced) {
      if (element.join) joins.set(`${element.join.entity}|${element.join.rightModel.name}`, element.join);
    }

    const read = new ReadSqlSourceNode(this.ids.id('rss'), model);
    return joins.size ? new JoinOnEntitiesNode(this.ids.id('jeo'), read, [...joins.values()]) : read;
  }

  private resolveWhereFilters(templates: string[], context: ResolutionContext): ResolvedWhereFilter[] {
    return templates.map((template) => ({
      template,
      parts: parseWhereTemplate(template).map((part) => {
        if (typeof part === 'string') return part;
        const element = this.lookup.resolveElement(referenceElementName(part), context);
        if (part.kind === 'Entity' && element.kind !== 'entity') {
          throw new InvalidQueryError(`Entity('${part.name}') in '${template}' does not refer to an entity.`);
        }
        return element;
      }),
    }));
  }

  private applyOrderByLimit(
    node: DataflowNode,
    request: QueryRequest,
    metricNames: string[],
    elements: OutputElement[],
  ): DataflowNode {
    const orderBy = (request.orderByNames ?? []).map((raw) => resolveOrderBy(raw, metricNames, elements));
    if (orderBy.length === 0 && request.limit === null) return node;
    return new OrderByLimitNode(this.ids.id('obl'), node, orderBy, request.limit);
  }
}

function resolveOrderBy(raw: string, metricNames: string[], elements: OutputElement[]): OrderBySpec {
  const trimmed = raw.trim();
  const descending = trimmed.startsWith('-');
  const name = (descending ? trimmed.slice(1) : trimmed).trim().toLowerCase();

  if (metricNames.includes(name)) return { column: name, descending };
  const element = elements.find((e) => e.name === name || e.columnName === name);
  if (element) return { column: element.columnName, descending };

  const options = [...metricNames, ...elements.map((e) => e.columnName)];
  throw new InvalidQueryError(`Order by item '${raw}' is not part of the query. Order by one of: ${options.join(', ')}.`);
}

function computationKey(c: MetricComputation): string {
  switch (c.kind) {
    case 'measure':
      return `measure:${c.measureColumn}`;
    case 'ratio':
      return `ratio:${c.numeratorColumn}/${c.denominatorColumn}`;
    case 'derived':
      return `derived:${c.expr}`;
    case 'passthrough':
      return `passthrough:${c.name}`;
  }
}

/**
 * The metrics computed below the derived ones. Two inputs may share a name
 * while being computed differently (say one carries its own filter); the
 * later one is renamed and the derived expression rewritten to match.
 */
class InnerMetrics {
  private readonly byName = new Map<string, MetricComputation>();
  private readonly assigned = new Map<string, string>();

  constructor(base: MetricComputation[]) {
    for (const c of base) this.add(c);
  }

  addDerived(plan: DerivedPlan): MetricComputation {
    const renames = new Map<string, string>();
    for (const input of plan.inputs) {
      const name = this.add(input);
      if (name !== input.name) renames.set(input.name.toLowerCase(), name);
    }
    const expr = renames.size
      ? plan.expr.replace(/[A-Za-z_][A-Za-z0-9_]*/g, (id) => renames.get(id.toLowerCase()) ?? id)
      : plan.expr;
    return { kind: 'derived', name: plan.metric.name, expr };
  }

  computations(): MetricComputation[] {
    return [...this.byName.values()];
  }

  private add(c: MetricComputation): string {
    const identity = `${c.name}|${computationKey(c)}`;
    const existing = this.assigned.get(identity);
    if (existing) return existing;

    let name = c.name;
    for (let n = 1; this.byName.has(name); n++) name = `${c.name}_${n}`;
    this.byName.set(name, { ...c, name });
    this.assigned.set(identity, name);
    return name;
  }
}
