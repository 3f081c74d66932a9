import { UnsupportedOperationError } from '../errors.js';
import { BigQuerySqlPlanRenderer } from '../render/big-query.js';
import { PostgresSqlPlanRenderer } from '../render/postgres.js';
import { RedshiftSqlPlanRenderer } from '../render/redshift.js';
import { SnowflakeSqlPlanRenderer } from '../render/snowflake.js';
import type { SqlPlanRenderer } from '../render/sql-plan-renderer.js';
import { SqlDialect, resolveSqlDialect } from './sql-dialect.js';

export interface QueryResultTable {
  columnNames: string[];
  rows: unknown[][];
}

/** What the engine needs from a warehouse connection. */
export interface SqlClient {
  readonly sqlDialect: SqlDialect;
  readonly sqlPlanRenderer: SqlPlanRenderer;
  query(sql: string): Promise<QueryResultTable>;
  dryRun(sql: string): Promise<void>;
}

const RENDERER_FACTORIES: Readonly<Record<SqlDialect, () => SqlPlanRenderer>> = {
  [SqlDialect.BIGQUERY]: () => new BigQuerySqlPlanRenderer(),
  [SqlDialect.POSTGRES]: () => new PostgresSqlPlanRenderer(),
  [SqlDialect.REDSHIFT]: () => new RedshiftSqlPlanRenderer(),
  [SqlDialect.SNOWFLAKE]: () => new SnowflakeSqlPlanRenderer(),
};

/** Builds each dialect's renderer on first use and hands out the same instance afterwards. */
export class SqlPlanRendererRegistry {
  private readonly renderers = new Map<SqlDialect, SqlPlanRenderer>();

  get(dialect: SqlDialect): SqlPlanRenderer {
    let renderer = this.renderers.get(dialect);
    if (!renderer) {
      renderer = RENDERER_FACTORIES[dialect]();
      this.renderers.set(dialect, renderer);
    }
    return renderer;
  }

  constructedDialects(): SqlDialect[] {
    return [...this.renderers.keys()];
  }
}

/**
 * SqlClient that only knows its dialect and how to render SQL for it.
 * Anything that would need a live warehouse connection is rejected.
 */
export class DialectOnlySqlClient implements SqlClient {
  private constructor(
    readonly sqlDialect: SqlDialect,
    readonly sqlPlanRenderer: SqlPlanRenderer,
  ) {
    Object.freeze(this);
  }

  static fromDialectName(dialectName: string, registry = new SqlPlanRendererRegistry()): DialectOnlySqlClient {
    return DialectOnlySqlClient.fromSqlDialect(resolveSqlDialect(dialectName), registry);
  }

  static fromSqlDialect(dialect: SqlDialect, registry = new SqlPlanRendererRegistry()): DialectOnlySqlClient {
    return new DialectOnlySqlClient(dialect, registry.get(dialect));
  }

  async query(_sql: string): Promise<QueryResultTable> {
    throw new UnsupportedOperationError(
      `Executing SQL needs a ${this.sqlDialect} connection; this client only renders SQL. Use explain instead.`,
    );
  }

  async dryRun(_sql: string): Promise<void> {
    throw new UnsupportedOperationError(
      `Dry-running SQL needs a ${this.sqlDialect} connection; this client only renders SQL.`,
    );
  }
}
