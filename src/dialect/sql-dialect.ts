import { InvalidArgumentError } from '../errors.js';

export enum SqlDialect {
  BIGQUERY = 'bigquery',
  POSTGRES = 'postgres',
  REDSHIFT = 'redshift',
  SNOWFLAKE = 'snowflake',
}

const DIALECT_ALIASES: Readonly<Record<string, SqlDialect>> = {
  bigquery: SqlDialect.BIGQUERY,
  big_query: SqlDialect.BIGQUERY,
  postgres: SqlDialect.POSTGRES,
  postgresql: SqlDialect.POSTGRES,
  redshift: SqlDialect.REDSHIFT,
  snowflake: SqlDialect.SNOWFLAKE,
};

export function supportedDialectAliases(): string[] {
  return Object.keys(DIALECT_ALIASES).sort();
}

/** Maps a user-supplied dialect name (case and surrounding whitespace ignored) to a dialect. */
export function resolveSqlDialect(dialectName: string): SqlDialect {
  const normalized = dialectName.trim().toLowerCase();
  const dialect = Object.prototype.hasOwnProperty.call(DIALECT_ALIASES, normalized)
    ? DIALECT_ALIASES[normalized]
    : undefined;
  if (dialect === undefined) {
    throw new InvalidArgumentError(
      `Unsupported dialect '${dialectName}'. Expected one of: ${supportedDialectAliases().join(', ')}.`,
      'dialect',
    );
  }
  return dialect;
}
