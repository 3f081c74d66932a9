import type { EntityJoin, LinkableElement } from '../manifest/lookup.js';
import type { Dimension, Measure, SemanticModel } from '../manifest/schema.js';
import { formatTimestamp } from '../utils/time.js';

/** A measure as it flows through the plan: aggregated into `column`. */
export interface MeasureSpec {
  measure: Measure;
  semanticModel: SemanticModel;
  column: string;
  filters: string[];
}

/** How a metric column is produced from the columns below it. */
export type MetricComputation =
  | { kind: 'measure'; name: string; measureColumn: string }
  | { kind: 'ratio'; name: string; numeratorColumn: string; denominatorColumn: string }
  | { kind: 'derived'; name: string; expr: string }
  | { kind: 'passthrough'; name: string };

/** A where filter with its element references resolved; literal text stays as strings. */
export interface ResolvedWhereFilter {
  template: string;
  parts: Array<string | LinkableElement>;
}

export interface OrderBySpec {
  column: string;
  descending: boolean;
}

export type DisplayProperty = [string, string];

abstract class BaseNode {
  constructor(readonly nodeId: string) {}

  abstract readonly description: string;
  abstract readonly parents: readonly DataflowNode[];

  displayProperties(): DisplayProperty[] {
    return [];
  }
}

export class ReadSqlSourceNode extends BaseNode {
  readonly kind = 'read_sql_source' as const;
  readonly parents: readonly DataflowNode[] = [];

  constructor(
    nodeId: string,
    readonly semanticModel: SemanticModel,
  ) {
    super(nodeId);
  }

  get description(): string {
    return `Read From Semantic Model '${this.semanticModel.name}'`;
  }

  displayProperties(): DisplayProperty[] {
    return [['semantic_model', this.semanticModel.name]];
  }
}

export class JoinOnEntitiesNode extends BaseNode {
  readonly kind = 'join_on_entities' as const;
  readonly description = 'Join Standard Outputs';

  constructor(
    nodeId: string,
    readonly parent: DataflowNode,
    readonly joins: EntityJoin[],
  ) {
    super(nodeId);
  }

  get parents(): readonly DataflowNode[] {
    return [this.parent];
  }

  displayProperties(): DisplayProperty[] {
    return this.joins.map((j) => ['join', `${j.rightModel.name} on ${j.entity}`]);
  }
}

export class WhereConstraintNode extends BaseNode {
  readonly kind = 'where_constraint' as const;
  readonly description = 'Constrain Output with WHERE';

  constructor(
    nodeId: string,
    readonly parent: DataflowNode,
    readonly filters: ResolvedWhereFilter[],
  ) {
    super(nodeId);
  }

  get parents(): readonly DataflowNode[] {
    return [this.parent];
  }

  displayProperties(): DisplayProperty[] {
    return this.filters.map((f) => ['where_condition', f.template]);
  }
}

export class ConstrainTimeRangeNode extends BaseNode {
  readonly kind = 'constrain_time_range' as const;

  constructor(
    nodeId: string,
    readonly parent: DataflowNode,
    readonly timeDimension: Dimension,
    readonly start: Date | null,
    readonly end: Date | null,
  ) {
    super(nodeId);
  }

  get parents(): readonly DataflowNode[] {
    return [this.parent];
  }

  get description(): string {
    const start = this.start ? formatTimestamp(this.start) : '';
    const end = this.end ? formatTimestamp(this.end) : '';
    return `Constrain Time Range to [${start}, ${end}]`;
  }

  displayProperties(): DisplayProperty[] {
    return [['time_dimension', this.timeDimension.name]];
  }
}

export class FilterElementsNode extends BaseNode {
  readonly kind = 'filter_elements' as const;

  constructor(
    nodeId: string,
    readonly parent: DataflowNode,
    readonly groupBy: LinkableElement[],
    readonly measures: MeasureSpec[],
    readonly distinct: boolean,
  ) {
    super(nodeId);
  }

  get parents(): readonly DataflowNode[] {
    return [this.parent];
  }

  get description(): string {
    const columns = [...this.measures.map((m) => m.column), ...this.groupBy.map((g) => g.columnName)];
    const list = `[${columns.map((c) => `'${c}'`).join(', ')}]`;
    return this.distinct ? `Pass Only Elements: ${list} (distinct values)` : `Pass Only Elements: ${list}`;
  }
}

export class AggregateMeasuresNode extends BaseNode {
  readonly kind = 'aggregate_measures' as const;
  readonly description = 'Aggregate Measures';

  constructor(
    nodeId: string,
    readonly parent: DataflowNode,
    readonly groupByColumns: string[],
    readonly measures: MeasureSpec[],
  ) {
    super(nodeId);
  }

  get parents(): readonly DataflowNode[] {
    return [this.parent];
  }

  displayProperties(): DisplayProperty[] {
    return this.measures.map((m) => ['measure', `${m.measure.agg}(${m.measure.name}) AS ${m.column}`]);
  }
}

export class CombineAggregatedOutputsNode extends BaseNode {
  readonly kind = 'combine_aggregated_outputs' as const;
  readonly description = 'Combine Aggregated Outputs';

  constructor(
    nodeId: string,
    readonly parents: readonly AggregateMeasuresNode[],
    readonly groupByColumns: string[],
  ) {
    super(nodeId);
  }
}

export class ComputeMetricsNode extends BaseNode {
  readonly kind = 'compute_metrics' as const;
  readonly description = 'Compute Metrics via Expressions';

  constructor(
    nodeId: string,
    readonly parent: DataflowNode,
    readonly groupByColumns: string[],
    readonly metrics: MetricComputation[],
  ) {
    super(nodeId);
  }

  get parents(): readonly DataflowNode[] {
    return [this.parent];
  }

  displayProperties(): DisplayProperty[] {
    return this.metrics.map((m) => ['metric_spec', m.name]);
  }
}

export class OrderByLimitNode extends BaseNode {
  readonly kind = 'order_by_limit' as const;

  constructor(
    nodeId: string,
    readonly parent: DataflowNode,
    readonly orderBy: OrderBySpec[],
    readonly limit: number | null,
  ) {
    super(nodeId);
  }

  get parents(): readonly DataflowNode[] {
    return [this.parent];
  }

  get description(): string {
    const keys = this.orderBy.map((o) => `'${o.descending ? '-' : ''}${o.column}'`).join(', ');
    return this.limit === null ? `Order By [${keys}]` : `Order By [${keys}] Limit ${this.limit}`;
  }
}

export type DataflowNode =
  | ReadSqlSourceNode
  | JoinOnEntitiesNode
  | WhereConstraintNode
  | ConstrainTimeRangeNode
  | FilterElementsNode
  | AggregateMeasuresNode
  | CombineAggregatedOutputsNode
  | ComputeMetricsNode
  | OrderByLimitNode;

const NODE_TAGS: Record<DataflowNode['kind'], string> = {
  read_sql_source: 'ReadSqlSourceNode',
  join_on_entities: 'JoinOnEntitiesNode',
  where_constraint: 'WhereConstraintNode',
  constrain_time_range: 'ConstrainTimeRangeNode',
  filter_elements: 'FilterElementsNode',
  aggregate_measures: 'AggregateMeasuresNode',
  combine_aggregated_outputs: 'CombineAggregatedOutputsNode',
  compute_metrics: 'ComputeMetricsNode',
  order_by_limit: 'OrderByLimitNode',
};

const PLAN_INDENT = '    ';

/** Logical plan for one query; `sinkNode` produces the final output. */
export class DataflowPlan {
  private text: string | undefined;

  constructor(readonly sinkNode: DataflowNode) {}

  /** Indented tree of the plan, computed on first call. */
  structureText(): string {
    if (this.text === undefined) {
      const lines = ['<DataflowPlan>', ...nodeLines(this.sinkNode, 1), '</DataflowPlan>'];
      this.text = lines.join('\n');
    }
    return this.text;
  }

  /** Nodes from sink to sources, depth first. */
  nodes(): DataflowNode[] {
    const out: DataflowNode[] = [];
    const visit = (node: DataflowNode): void => {
      out.push(node);
      node.parents.forEach(visit);
    };
    visit(this.sinkNode);
    return out;
  }
}

function nodeLines(node: DataflowNode, depth: number): string[] {
  const pad = PLAN_INDENT.repeat(depth);
  const inner = PLAN_INDENT.repeat(depth + 1);
  const tag = NODE_TAGS[node.kind];
  const properties: DisplayProperty[] = [
    ['description', node.description],
    ['node_id', node.nodeId],
    ...node.displayProperties(),
  ];
  return [
    `${pad}<${tag}>`,
    ...properties.map(([key, value]) => `${inner}<!-- ${key} = ${value} -->`),
    ...node.parents.flatMap((parent) => nodeLines(parent, depth + 1)),
    `${pad}</${tag}>`,
  ];
}
