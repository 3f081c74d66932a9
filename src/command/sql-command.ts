import yargs from 'yargs';
import { createQueryRequest } from '../engine/request.js';
import type { ExplainResult } from '../engine/engine.js';
import { InvalidArgumentError } from '../errors.js';
import { STDIN_SOURCE, readProcessStdin } from '../manifest/loader.js';
import { commandLogger } from '../utils/logger.js';
import { buildFastPathEngine } from './fast-path.js';
import { parseCsv, parseOptionalDatetime, parseOptionalLimit, parseWhereConstraint } from './normalize.js';

export const START_MARKER = 'metric-sql: query start';
export const PLAN_LABEL = 'Metric Dataflow Plan:';

const PLAN_INDENT = '    ';
const COMMENT_PREFIX = '-- ';

export interface SqlCommandOptions {
  semanticManifest: string;
  dialect: string;
  metrics?: string | null;
  groupBy?: string | null;
  where?: string | null;
  startTime?: string | null;
  endTime?: string | null;
  order?: string | null;
  limit?: number | string | null;
  showDataflowPlan?: boolean;
  showSqlDescriptions?: boolean;
}

/** Where the command writes its output and reads a piped manifest from. */
export interface CommandIO {
  write(text: string): void;
  readStdin(): Promise<string>;
}

export const processIO: CommandIO = {
  write: (text) => console.log(text),
  readStdin: readProcessStdin,
};

export interface FormatOptions {
  showDataflowPlan?: boolean;
  showSqlDescriptions?: boolean;
}

export function endMarker(elapsedSeconds: number): string {
  return `metric-sql: query end (${elapsedSeconds.toFixed(2)}s)`;
}

/**
 * Plan text under a label, commented line by line so that it can sit in
 * front of the SQL.
 */
export function formatDataflowPlanBlock(planText: string): string {
  const lines = [PLAN_LABEL, ...planText.split('\n').map((line) => `${PLAN_INDENT}${line}`)];
  return lines.map((line) => (line.trim() ? `${COMMENT_PREFIX}${line}` : line)).join('\n');
}

export function formatExplainResult(result: ExplainResult, options: FormatOptions = {}): string {
  const statement = options.showSqlDescriptions ? result.sqlStatement : result.sqlStatement.withoutDescriptions;
  if (!options.showDataflowPlan) return statement.sql;
  // Two blank lines between the plan and the SQL.
  return `${formatDataflowPlanBlock(result.dataflowPlan.structureText())}\n\n\n${statement.sql}`;
}

export async function runSqlCommand(options: SqlCommandOptions, io: CommandIO = processIO): Promise<void> {
  const startTime = performance.now();
  io.write(START_MARKER);

  const engine = await buildFastPathEngine({
    manifestSource: options.semanticManifest,
    dialect: options.dialect,
    readStdin: () => io.readStdin(),
  });

  const queryRequest = createQueryRequest({
    metricNames: parseCsv(options.metrics),
    groupByNames: parseCsv(options.groupBy),
    whereConstraints: parseWhereConstraint(options.where),
    timeConstraintStart: parseOptionalDatetime(options.startTime, 'start-time'),
    timeConstraintEnd: parseOptionalDatetime(options.endTime, 'end-time'),
    orderByNames: parseCsv(options.order),
    limit: parseOptionalLimit(options.limit),
  });
  commandLogger.info('Explaining query', { requestId: queryRequest.requestId });

  const result = engine.explain(queryRequest);
  io.write(
    formatExplainResult(result, {
      showDataflowPlan: options.showDataflowPlan,
      showSqlDescriptions: options.showSqlDescriptions,
    }),
  );
  io.write(endMarker((performance.now() - startTime) / 1000));
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Returns null when `--help` or `--version` was given; yargs has printed the
 * text and there is nothing to run.
 */
export function parseSqlCommandArgs(args: string[]): SqlCommandOptions | null {
  const argv = yargs(args)
    .scriptName('metric-sql')
    .usage('$0 --semantic-manifest <path|-> --dialect <name> [options]')
    .option('semantic-manifest', {
      type: 'string',
      demandOption: true,
      nargs: 1,
      desc: `Path to semantic_manifest.json, or ${STDIN_SOURCE} to read it from stdin`,
    })
    .option('dialect', { type: 'string', demandOption: true, desc: 'SQL dialect: bigquery, postgres, redshift or snowflake' })
    .option('metrics', { type: 'string', default: '', desc: 'Comma-separated metric names' })
    .option('group-by', { type: 'string', default: '', desc: 'Comma-separated group-by items, e.g. metric_time__day' })
    .option('where', { type: 'string', nargs: 1, desc: "Where filter, e.g. \"{{ Dimension('listing__country') }} = 'us'\"" })
    .option('start-time', { type: 'string', desc: 'Inclusive start of the time range (ISO-8601)' })
    .option('end-time', { type: 'string', desc: 'Inclusive end of the time range (ISO-8601)' })
    .option('order', { type: 'string', default: '', nargs: 1, desc: 'Comma-separated order keys; prefix with - for descending' })
    .option('limit', { type: 'number', desc: 'Maximum number of rows' })
    .option('show-dataflow-plan', { type: 'boolean', default: false, desc: 'Print the dataflow plan before the SQL' })
    .option('show-sql-descriptions', { type: 'boolean', default: false, desc: 'Keep the per-step description comments in the SQL' })
    // Values such as `-bookings` belong to the flag before them.
    .parserConfiguration({ 'nargs-eats-options': true })
    .strict()
    .help()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new InvalidArgumentError(message);
    })
    .parseSync();

  if (argv.help === true || argv.version === true) return null;

  return {
    semanticManifest: argv['semantic-manifest'],
    dialect: argv.dialect,
    metrics: argv.metrics,
    groupBy: argv['group-by'],
    where: argv.where ?? null,
    startTime: argv['start-time'] ?? null,
    endTime: argv['end-time'] ?? null,
    order: argv.order,
    limit: argv.limit ?? null,
    showDataflowPlan: argv['show-dataflow-plan'],
    showSqlDescriptions: argv['show-sql-descriptions'],
  };
}
