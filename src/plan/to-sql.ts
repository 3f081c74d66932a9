import type { EntityJoin, LinkableElement } from '../manifest/lookup.js';
import type { Measure } from '../manifest/schema.js';
import { relationName } from '../manifest/schema.js';
import type { AggregateFunc, SqlExpression, SqlJoin, SqlSelectColumn, SqlSelectStatement } from '../render/sql-nodes.js';
import { column, emptySelect, sourceExpression } from '../render/sql-nodes.js';
import type {
  AggregateMeasuresNode,
  CombineAggregatedOutputsNode,
  ComputeMetricsNode,
  DataflowNode,
  DataflowPlan,
  MetricComputation,
  OrderByLimitNode,
} from './nodes.js';

const AGGREGATE_FUNCS: Readonly<Record<Measure['agg'], AggregateFunc>> = {
  sum: 'SUM',
  sum_boolean: 'SUM',
  min: 'MIN',
  max: 'MAX',
  count: 'COUNT',
  count_distinct: 'COUNT_DISTINCT',
  average: 'AVG',
};

type SourceChainNode = Extract<
  DataflowNode,
  { kind: 'read_sql_source' | 'join_on_entities' | 'where_constraint' | 'constrain_time_range' | 'filter_elements' }
>;

function joinKey(join: EntityJoin): string {
  return `${join.entity}|${join.rightModel.name}`;
}

function and(conditions: SqlExpression[]): SqlExpression {
  if (conditions.length === 1 && conditions[0]) return conditions[0];
  const parts: Array<string | SqlExpression> = [];
  conditions.forEach((c, i) => {
    if (i > 0) parts.push(' AND ');
    parts.push(c);
  });
  return { kind: 'template', parts };
}

/**
 * Converts a dataflow plan into a SQL select plan. The read, join, where,
 * time range and filter nodes of one source collapse into a single SELECT;
 * aggregation, combination and metric computation each wrap their input in a
 * subquery. Order-by/limit is merged into the outermost SELECT.
 */
export class DataflowToSqlConverter {
  private aliasCounter = 0;

  convert(plan: DataflowPlan): SqlSelectStatement {
    this.aliasCounter = 0;
    return this.convertNode(plan.sinkNode);
  }

  private nextAlias(prefix: string): string {
    return `${prefix}_${this.aliasCounter++}`;
  }

  private convertNode(node: DataflowNode): SqlSelectStatement {
    switch (node.kind) {
      case 'read_sql_source':
      case 'join_on_entities':
      case 'where_constraint':
      case 'constrain_time_range':
      case 'filter_elements':
        return this.convertSourceChain(node);
      case 'aggregate_measures':
        return this.convertAggregate(node);
      case 'combine_aggregated_outputs':
        return this.convertCombine(node);
      case 'compute_metrics':
        return this.convertCompute(node);
      case 'order_by_limit':
        return this.convertOrderByLimit(node);
    }
  }

  private convertSourceChain(top: SourceChainNode): SqlSelectStatement {
    // Walk down to the read node, then apply the chain in dataflow order.
    const chain: SourceChainNode[] = [];
    let current: SourceChainNode = top;
    for (;;) {
      chain.unshift(current);
      if (current.kind === 'read_sql_source') break;
      const parent: DataflowNode = current.parent;
      if (!isSourceChainNode(parent)) {
        throw new Error(`Cannot read from a ${parent.kind} node inside a source chain`);
      }
      current = parent;
    }
    const read = chain[0];
    if (!read || read.kind !== 'read_sql_source') throw new Error('Source chain has no read node');

    const model = read.semanticModel;
    const baseAlias = this.nextAlias(`${model.name}_src`);
    const select = emptySelect({ kind: 'table', relation: relationName(model.node_relation), alias: baseAlias });
    const joinAliases = new Map<string, string>();

    const elementExpression = (element: LinkableElement): SqlExpression => {
      const alias = element.join ? (joinAliases.get(joinKey(element.join)) ?? baseAlias) : baseAlias;
      const expr = sourceExpression(element.expr, alias);
      return element.grain ? { kind: 'date_trunc', grain: element.grain, arg: expr } : expr;
    };

    for (const node of chain) {
      select.descriptions.push(node.description);
      switch (node.kind) {
        case 'read_sql_source':
          break;
        case 'join_on_entities':
          for (const join of node.joins) select.joins.push(this.entityJoin(join, baseAlias, joinAliases));
          break;
        case 'where_constraint':
          for (const filter of node.filters) {
            select.where.push({
              kind: 'template',
              parts: filter.parts.map((p) => (typeof p === 'string' ? p : elementExpression(p))),
            });
          }
          break;
        case 'constrain_time_range': {
          const dimension = node.timeDimension;
          select.where.push({
            kind: 'time_range',
            arg: sourceExpression(dimension.expr ?? dimension.name, baseAlias),
            start: node.start,
            end: node.end,
          });
          break;
        }
        case 'filter_elements':
          select.distinct = node.distinct;
          for (const spec of node.measures) {
            const expr = sourceExpression(spec.measure.expr ?? spec.measure.name, baseAlias);
            select.columns.push({
              expr: spec.measure.agg === 'sum_boolean' ? { kind: 'boolean_to_int', arg: expr } : expr,
              alias: spec.column,
            });
          }
          for (const element of node.groupBy) {
            select.columns.push({ expr: elementExpression(element), alias: element.columnName });
          }
          break;
      }
    }

    if (select.columns.length === 0) select.columns.push({ expr: { kind: 'raw', sql: '*' }, alias: '*' });
    return select;
  }

  private entityJoin(join: EntityJoin, baseAlias: string, joinAliases: Map<string, string>): SqlJoin {
    const alias = this.nextAlias(`${join.rightModel.name}_src`);
    joinAliases.set(joinKey(join), alias);
    return {
      type: 'LEFT OUTER',
      source: { kind: 'table', relation: relationName(join.rightModel.node_relation), alias },
      on: {
        kind: 'equals',
        left: sourceExpression(join.leftExpr, baseAlias),
        right: sourceExpression(join.rightExpr, alias),
      },
    };
  }

  private convertAggregate(node: AggregateMeasuresNode): SqlSelectStatement {
    const inner = this.convertNode(node.parent);
    const select = emptySelect({ kind: 'subquery', select: inner, alias: this.nextAlias('subq') });
    select.descriptions.push(node.description);
    for (const name of node.groupByColumns) {
      select.columns.push({ expr: column(name), alias: name });
      select.groupBy.push(column(name));
    }
    for (const spec of node.measures) {
      select.columns.push({
        expr: { kind: 'aggregate', func: AGGREGATE_FUNCS[spec.measure.agg], arg: column(spec.column) },
        alias: spec.column,
      });
    }
    return select;
  }

  private convertCombine(node: CombineAggregatedOutputsNode): SqlSelectStatement {
    const inputs = node.parents.map((parent) => ({
      parent,
      select: this.convertNode(parent),
      alias: this.nextAlias('subq'),
    }));
    const [first, ...rest] = inputs;
    if (!first) throw new Error('Combine node has no inputs');

    const select = emptySelect({ kind: 'subquery', select: first.select, alias: first.alias });
    select.descriptions.push(node.description);

    const seen = [first.alias];
    for (const input of rest) {
      const on = node.groupByColumns.map(
        (name): SqlExpression => ({
          kind: 'equals',
          left: { kind: 'coalesce', args: seen.map((alias) => column(name, alias)) },
          right: column(name, input.alias),
        }),
      );
      select.joins.push({
        type: on.length ? 'FULL OUTER' : 'CROSS',
        source: { kind: 'subquery', select: input.select, alias: input.alias },
        on: on.length ? and(on) : null,
      });
      seen.push(input.alias);
    }

    for (const name of node.groupByColumns) {
      const expr: SqlExpression = { kind: 'coalesce', args: seen.map((alias) => column(name, alias)) };
      select.columns.push({ expr, alias: name });
      select.groupBy.push(expr);
    }
    for (const input of inputs) {
      for (const spec of input.parent.measures) {
        select.columns.push({
          expr: { kind: 'aggregate', func: 'MAX', arg: column(spec.column, input.alias) },
          alias: spec.column,
        });
      }
    }
    return select;
  }

  private convertCompute(node: ComputeMetricsNode): SqlSelectStatement {
    const inner = this.convertNode(node.parent);
    const select = emptySelect({ kind: 'subquery', select: inner, alias: this.nextAlias('subq') });
    select.descriptions.push(node.description);
    for (const name of node.groupByColumns) select.columns.push({ expr: column(name), alias: name });
    for (const metric of node.metrics) select.columns.push(metricColumn(metric));
    return select;
  }

  private convertOrderByLimit(node: OrderByLimitNode): SqlSelectStatement {
    const select = this.convertNode(node.parent);
    return {
      ...select,
      descriptions: [...select.descriptions, node.description],
      orderBy: node.orderBy.map((o) => ({ expr: column(o.column), descending: o.descending })),
      limit: node.limit,
    };
  }
}

function isSourceChainNode(node: DataflowNode): node is SourceChainNode {
  return (
    node.kind === 'read_sql_source' ||
    node.kind === 'join_on_entities' ||
    node.kind === 'where_constraint' ||
    node.kind === 'constrain_time_range' ||
    node.kind === 'filter_elements'
  );
}

function metricColumn(metric: MetricComputation): SqlSelectColumn {
  switch (metric.kind) {
    case 'measure':
      return { expr: column(metric.measureColumn), alias: metric.name };
    case 'ratio':
      return {
        expr: { kind: 'ratio', numerator: column(metric.numeratorColumn), denominator: column(metric.denominatorColumn) },
        alias: metric.name,
      };
    case 'derived':
      return { expr: { kind: 'raw', sql: metric.expr }, alias: metric.name };
    case 'passthrough':
      return { expr: column(metric.name), alias: metric.name };
  }
}
