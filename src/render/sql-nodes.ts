import type { TimeGranularity } from '../manifest/schema.js';

export type AggregateFunc = 'SUM' | 'MIN' | 'MAX' | 'COUNT' | 'COUNT_DISTINCT' | 'AVG';

export type SqlExpression =
  | { kind: 'column'; tableAlias?: string; column: string }
  /** SQL text taken from the manifest, rendered verbatim. */
  | { kind: 'raw'; sql: string }
  | { kind: 'aggregate'; func: AggregateFunc; arg: SqlExpression }
  | { kind: 'date_trunc'; grain: TimeGranularity; arg: SqlExpression }
  | { kind: 'boolean_to_int'; arg: SqlExpression }
  | { kind: 'ratio'; numerator: SqlExpression; denominator: SqlExpression }
  | { kind: 'coalesce'; args: SqlExpression[] }
  | { kind: 'equals'; left: SqlExpression; right: SqlExpression }
  | { kind: 'time_range'; arg: SqlExpression; start: Date | null; end: Date | null }
  /** Text with embedded expressions, e.g. a resolved where filter template. */
  | { kind: 'template'; parts: Array<string | SqlExpression> };

export interface SqlSelectColumn {
  expr: SqlExpression;
  alias: string;
}

export interface SqlTableSource {
  kind: 'table';
  relation: string;
  alias: string;
}

export interface SqlSubquerySource {
  kind: 'subquery';
  select: SqlSelectStatement;
  alias: string;
}

export type SqlSource = SqlTableSource | SqlSubquerySource;

export interface SqlJoin {
  type: 'LEFT OUTER' | 'FULL OUTER' | 'CROSS';
  source: SqlSource;
  on: SqlExpression | null;
}

export interface SqlOrderBy {
  expr: SqlExpression;
  descending: boolean;
}

export interface SqlSelectStatement {
  /** One line per dataflow node folded into this SELECT. */
  descriptions: string[];
  distinct: boolean;
  columns: SqlSelectColumn[];
  from: SqlSource;
  joins: SqlJoin[];
  /** AND-ed together. */
  where: SqlExpression[];
  groupBy: SqlExpression[];
  orderBy: SqlOrderBy[];
  limit: number | null;
}

export function column(column: string, tableAlias?: string): SqlExpression {
  return tableAlias ? { kind: 'column', tableAlias, column } : { kind: 'column', column };
}

const SIMPLE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Expression for a manifest `expr`: bare column names are qualified with the
 * table alias, anything else is kept as written.
 */
export function sourceExpression(expr: string, tableAlias: string): SqlExpression {
  const trimmed = expr.trim();
  return SIMPLE_IDENTIFIER.test(trimmed) ? column(trimmed, tableAlias) : { kind: 'raw', sql: trimmed };
}

export function emptySelect(from: SqlSource): SqlSelectStatement {
  return {
    descriptions: [],
    distinct: false,
    columns: [],
    from,
    joins: [],
    where: [],
    groupBy: [],
    orderBy: [],
    limit: null,
  };
}
