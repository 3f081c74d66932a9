import type { SqlDialect } from '../dialect/sql-dialect.js';
import type { TimeGranularity } from '../manifest/schema.js';
import { formatTimestamp } from '../utils/time.js';
import type { SqlExpression, SqlJoin, SqlSelectColumn, SqlSelectStatement, SqlSource } from './sql-nodes.js';

const INDENT = '  ';

/**
 * Rendered SQL. `sql` keeps the per-node description comments;
 * `withoutDescriptions` is the same statement without them.
 */
export class SqlStatement {
  constructor(
    readonly sql: string,
    private readonly strippedSql: string = sql,
  ) {}

  get withoutDescriptions(): SqlStatement {
    return new SqlStatement(this.strippedSql);
  }
}

/**
 * Renders a SQL select plan as text. Subclasses supply the dialect-specific
 * pieces; layout and everything dialect-neutral lives here.
 */
export abstract class SqlPlanRenderer {
  abstract readonly sqlDialect: SqlDialect;

  protected abstract renderDateTrunc(grain: TimeGranularity, arg: string): string;
  protected abstract renderTimestampLiteral(timestamp: string): string;
  protected abstract readonly doubleType: string;

  render(select: SqlSelectStatement): SqlStatement {
    return new SqlStatement(this.renderSelect(select, true).join('\n'), this.renderSelect(select, false).join('\n'));
  }

  renderExpression(expr: SqlExpression): string {
    switch (expr.kind) {
      case 'column':
        return expr.tableAlias ? `${expr.tableAlias}.${expr.column}` : expr.column;
      case 'raw':
        return expr.sql;
      case 'aggregate': {
        const arg = this.renderExpression(expr.arg);
        return expr.func === 'COUNT_DISTINCT' ? `COUNT(DISTINCT ${arg})` : `${expr.func}(${arg})`;
      }
      case 'date_trunc':
        return this.renderDateTrunc(expr.grain, this.renderExpression(expr.arg));
      case 'boolean_to_int':
        return `CASE WHEN ${this.renderExpression(expr.arg)} THEN 1 ELSE 0 END`;
      case 'ratio': {
        const numerator = this.renderExpression(expr.numerator);
        const denominator = this.renderExpression(expr.denominator);
        return `CAST(${numerator} AS ${this.doubleType}) / CAST(NULLIF(${denominator}, 0) AS ${this.doubleType})`;
      }
      case 'coalesce': {
        const args = expr.args.map((a) => this.renderExpression(a));
        return args.length === 1 ? (args[0] ?? '') : `COALESCE(${args.join(', ')})`;
      }
      case 'equals':
        return `${this.renderExpression(expr.left)} = ${this.renderExpression(expr.right)}`;
      case 'time_range': {
        const arg = this.renderExpression(expr.arg);
        const start = expr.start ? this.renderTimestampLiteral(formatTimestamp(expr.start)) : null;
        const end = expr.end ? this.renderTimestampLiteral(formatTimestamp(expr.end)) : null;
        if (start && end) return `${arg} BETWEEN ${start} AND ${end}`;
        if (start) return `${arg} >= ${start}`;
        if (end) return `${arg} <= ${end}`;
        return 'TRUE';
      }
      case 'template':
        return expr.parts.map((p) => (typeof p === 'string' ? p : this.renderExpression(p))).join('');
    }
  }

  protected renderColumn(col: SqlSelectColumn): string {
    const expr = this.renderExpression(col.expr);
    return expr === col.alias ? expr : `${expr} AS ${col.alias}`;
  }

  protected renderSelect(select: SqlSelectStatement, withDescriptions: boolean): string[] {
    const lines: string[] = [];
    if (withDescriptions) {
      for (const description of select.descriptions) lines.push(`-- ${description}`);
    }

    lines.push(select.distinct ? 'SELECT DISTINCT' : 'SELECT');
    select.columns.forEach((col, i) => lines.push(`${INDENT}${i === 0 ? '' : ', '}${this.renderColumn(col)}`));

    lines.push(...this.renderSource('FROM', select.from, withDescriptions));
    for (const join of select.joins) lines.push(...this.renderJoin(join, withDescriptions));

    if (select.where.length === 1 && select.where[0]) {
      lines.push('WHERE', `${INDENT}${this.renderExpression(select.where[0])}`);
    } else if (select.where.length > 1) {
      lines.push('WHERE');
      select.where.forEach((w, i) => lines.push(`${INDENT}${i === 0 ? '' : 'AND '}(${this.renderExpression(w)})`));
    }

    if (select.groupBy.length) {
      lines.push('GROUP BY');
      select.groupBy.forEach((g, i) => lines.push(`${INDENT}${i === 0 ? '' : ', '}${this.renderExpression(g)}`));
    }

    if (select.orderBy.length) {
      lines.push('ORDER BY');
      select.orderBy.forEach((o, i) =>
        lines.push(`${INDENT}${i === 0 ? '' : ', '}${this.renderExpression(o.expr)}${o.descending ? ' DESC' : ''}`),
      );
    }

    if (select.limit !== null) lines.push(`LIMIT ${select.limit}`);
    return lines;
  }

  protected renderSource(keyword: string, source: SqlSource, withDescriptions: boolean): string[] {
    if (source.kind === 'table') return [`${keyword} ${source.relation} AS ${source.alias}`];
    return [
      `${keyword} (`,
      ...this.renderSelect(source.select, withDescriptions).map((line) => `${INDENT}${line}`),
      `) ${source.alias}`,
    ];
  }

  protected renderJoin(join: SqlJoin, withDescriptions: boolean): string[] {
    const lines = this.renderSource(`${join.type} JOIN`, join.source, withDescriptions);
    if (join.on) lines.push('ON', `${INDENT}${this.renderExpression(join.on)}`);
    return lines;
  }
}
