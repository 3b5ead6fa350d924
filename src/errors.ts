/**
 * Pipeline errors.
 *
 * Structural problems in the input (bad labels, dates, duplicate keys) abort
 * processing of the affected season file. Missing history is not an error:
 * it shows up as null feature values.
 */

export type PipelineErrorKind =
  | 'UnrecognizedOutcome'
  | 'MalformedDate'
  | 'AmbiguousMatch'
  | 'InvalidFixtureRow'
  | 'TeamNameMismatch'
  | 'ColumnCollision';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

export class UnrecognizedOutcomeError extends PipelineError {
  readonly kind = 'UnrecognizedOutcome';

  constructor(readonly label: string, readonly rowIndex?: number) {
    super(`Unrecognized outcome "${label}"${atRow(rowIndex)}; expected W, D or L`);
    this.name = 'UnrecognizedOutcomeError';
  }
}

export class MalformedDateError extends PipelineError {
  readonly kind = 'MalformedDate';

  constructor(readonly value: string, readonly rowIndex?: number) {
    super(`Malformed date "${value}"${atRow(rowIndex)}`);
    this.name = 'MalformedDateError';
  }
}

export class AmbiguousMatchError extends PipelineError {
  readonly kind = 'AmbiguousMatch';

  constructor(readonly team: string, readonly date: string, readonly matches: number) {
    super(`Ambiguous match for ${team} on ${date}: ${matches} records with conflicting match data`);
    this.name = 'AmbiguousMatchError';
  }
}

export class InvalidFixtureRowError extends PipelineError {
  readonly kind = 'InvalidFixtureRow';

  constructor(readonly issues: string[], readonly rowIndex?: number) {
    super(`Invalid fixture row${atRow(rowIndex)}: ${issues.join('; ')}`);
    this.name = 'InvalidFixtureRowError';
  }
}

export class TeamNameMismatchError extends PipelineError {
  readonly kind = 'TeamNameMismatch';

  constructor(readonly teamCount: number, readonly opponentCount: number) {
    super(`Cannot standardise team names: ${teamCount} team names vs ${opponentCount} opponent names`);
    this.name = 'TeamNameMismatchError';
  }
}

export class ColumnCollisionError extends PipelineError {
  readonly kind = 'ColumnCollision';

  constructor(readonly columns: string[]) {
    super(`Team indicator columns collide with feature columns: ${columns.join(', ')}`);
    this.name = 'ColumnCollisionError';
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

function atRow(rowIndex: number | undefined): string {
  return rowIndex === undefined ? '' : ` at row ${rowIndex + 1}`;
}
