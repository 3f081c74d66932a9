import { SqlDialect } from '../dialect/sql-dialect.js';
import type { TimeGranularity } from '../manifest/schema.js';
import { SqlPlanRenderer } from './sql-plan-renderer.js';

export class SnowflakeSqlPlanRenderer extends SqlPlanRenderer {
  readonly sqlDialect = SqlDialect.SNOWFLAKE;
  protected readonly doubleType = 'DOUBLE';

  protected renderDateTrunc(grain: TimeGranularity, arg: string): string {
    return `DATE_TRUNC('${grain}', ${arg})`;
  }

  protected renderTimestampLiteral(timestamp: string): string {
    return `TO_TIMESTAMP('${timestamp}')`;
  }
}
