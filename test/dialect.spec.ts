import { describe, it, expect } from 'vitest';
import { DialectOnlySqlClient, SqlPlanRendererRegistry } from '../src/dialect/client.js';
import { SqlDialect, resolveSqlDialect, supportedDialectAliases } from '../src/dialect/sql-dialect.js';
import { InvalidArgumentError, UnsupportedOperationError } from '../src/errors.js';
import { BigQuerySqlPlanRenderer } from '../src/render/big-query.js';
import { PostgresSqlPlanRenderer } from '../src/render/postgres.js';
import { RedshiftSqlPlanRenderer } from '../src/render/redshift.js';
import { SnowflakeSqlPlanRenderer } from '../src/render/snowflake.js';

describe('resolveSqlDialect', () => {
  it.each([
    ['bigquery', SqlDialect.BIGQUERY],
    ['big_query', SqlDialect.BIGQUERY],
    ['BigQuery', SqlDialect.BIGQUERY],
    ['postgres', SqlDialect.POSTGRES],
    ['  PostgreSQL ', SqlDialect.POSTGRES],
    ['redshift', SqlDialect.REDSHIFT],
    ['SNOWFLAKE', SqlDialect.SNOWFLAKE],
  ])('maps %j to %s', (name, expected) => {
    expect(resolveSqlDialect(name)).toBe(expected);
  });

  it('lists every accepted alias, sorted, for an unknown name', () => {
    expect(() => resolveSqlDialect('duckdb')).toThrow(
      "Unsupported dialect 'duckdb'. Expected one of: big_query, bigquery, postgres, postgresql, redshift, snowflake.",
    );
  });

  it('raises an invalid-argument error naming the flag', () => {
    try {
      resolveSqlDialect('');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidArgumentError);
      expect(e).toMatchObject({ code: 'INVALID_ARGUMENT', param: 'dialect' });
    }
  });

  it('does not accept inherited object keys', () => {
    expect(() => resolveSqlDialect('constructor')).toThrow(InvalidArgumentError);
  });

  it('exposes the aliases in sorted order', () => {
    expect(supportedDialectAliases()).toEqual(['big_query', 'bigquery', 'postgres', 'postgresql', 'redshift', 'snowflake']);
  });
});

describe('DialectOnlySqlClient', () => {
  it.each([
    ['bigquery', BigQuerySqlPlanRenderer, SqlDialect.BIGQUERY],
    ['postgresql', PostgresSqlPlanRenderer, SqlDialect.POSTGRES],
    ['redshift', RedshiftSqlPlanRenderer, SqlDialect.REDSHIFT],
    ['snowflake', SnowflakeSqlPlanRenderer, SqlDialect.SNOWFLAKE],
  ])('binds %s to its own renderer', (name, rendererClass, dialect) => {
    const client = DialectOnlySqlClient.fromDialectName(name);
    expect(client.sqlDialect).toBe(dialect);
    expect(client.sqlPlanRenderer).toBeInstanceOf(rendererClass);
    expect(client.sqlPlanRenderer.sqlDialect).toBe(dialect);
  });

  it('is immutable', () => {
    const client = DialectOnlySqlClient.fromSqlDialect(SqlDialect.POSTGRES);
    expect(Object.isFrozen(client)).toBe(true);
  });

  it('rejects execution', async () => {
    const client = DialectOnlySqlClient.fromSqlDialect(SqlDialect.SNOWFLAKE);
    await expect(client.query('SELECT 1')).rejects.toBeInstanceOf(UnsupportedOperationError);
    await expect(client.dryRun('SELECT 1')).rejects.toThrow('Dry-running SQL needs a snowflake connection');
  });
});

describe('SqlPlanRendererRegistry', () => {
  it('constructs only the renderers that are asked for, once each', () => {
    const registry = new SqlPlanRendererRegistry();
    expect(registry.constructedDialects()).toEqual([]);

    const first = DialectOnlySqlClient.fromDialectName('postgres', registry);
    const second = DialectOnlySqlClient.fromDialectName('postgresql', registry);

    expect(registry.constructedDialects()).toEqual([SqlDialect.POSTGRES]);
    expect(second.sqlPlanRenderer).toBe(first.sqlPlanRenderer);
  });

  it('does not construct anything for an unknown dialect', () => {
    const registry = new SqlPlanRendererRegistry();
    expect(() => DialectOnlySqlClient.fromDialectName('oracle', registry)).toThrow(InvalidArgumentError);
    expect(registry.constructedDialects()).toEqual([]);
  });
});
