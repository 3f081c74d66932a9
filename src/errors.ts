/**
 * Error taxonomy for metric-sql.
 * Every error the command raises on purpose extends MetricSqlError, so the CLI
 * can print a one-line message instead of a stack trace.
 */

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'MANIFEST_PARSE'
  | 'UNKNOWN_ELEMENT'
  | 'AMBIGUOUS_REFERENCE'
  | 'INVALID_QUERY'
  | 'UNSUPPORTED_OPERATION';

export class MetricSqlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

/** User input problem: bad flag value, missing file, empty stdin. */
export class InvalidArgumentError extends MetricSqlError {
  readonly param?: string;

  constructor(message: string, param?: string) {
    super('INVALID_ARGUMENT', message);
    this.param = param;
  }
}

export class ManifestParseError extends MetricSqlError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('MANIFEST_PARSE', issues.length ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.issues = issues;
  }
}

export type ElementKind = 'metric' | 'measure' | 'semantic model' | 'dimension' | 'entity' | 'group-by item';

export class UnknownElementError extends MetricSqlError {
  readonly kind: ElementKind;
  readonly element: string;
  readonly suggestions: string[];

  constructor(kind: ElementKind, element: string, suggestions: string[] = []) {
    const hint = suggestions.length ? ` Did you mean one of: ${suggestions.join(', ')}?` : '';
    super('UNKNOWN_ELEMENT', `Unknown ${kind} '${element}'.${hint}`);
    this.kind = kind;
    this.element = element;
    this.suggestions = suggestions;
  }
}

export class AmbiguousReferenceError extends MetricSqlError {
  readonly candidates: string[];

  constructor(name: string, candidates: string[]) {
    super(
      'AMBIGUOUS_REFERENCE',
      `'${name}' is ambiguous; qualify it with an entity. Candidates: ${candidates.join(', ')}`,
    );
    this.candidates = candidates;
  }
}

export class InvalidQueryError extends MetricSqlError {
  constructor(message: string) {
    super('INVALID_QUERY', message);
  }
}

export class UnsupportedOperationError extends MetricSqlError {
  constructor(message: string) {
    super('UNSUPPORTED_OPERATION', message);
  }
}

/**
 * Close matches for an unknown name: case-insensitive prefix or substring hits,
 * prefix hits first, at most `max` of them.
 */
export function suggestNames(name: string, candidates: Iterable<string>, max = 5): string[] {
  const needle = name.trim().toLowerCase();
  if (!needle) return [];
  const prefix: string[] = [];
  const partial: string[] = [];
  for (const candidate of candidates) {
    const c = candidate.toLowerCase();
    if (c === needle) continue;
    if (c.startsWith(needle) || needle.startsWith(c)) prefix.push(candidate);
    else if (c.includes(needle) || needle.includes(c)) partial.push(candidate);
  }
  return [...prefix.sort(), ...partial.sort()].slice(0, max);
}
