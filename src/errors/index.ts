/**
 * Error taxonomy for an evaluation.
 *
 * Fatal errors abort the evaluation before anything is persisted. Non-fatal
 * errors degrade the evaluation and end up as warnings on the scorecard.
 */

export type ErrorKind =
  | 'RubricNotFound'
  | 'InvalidRubric'
  | 'TranscriptUnavailable'
  | 'SubjectUndetected'
  | 'HistoryCorrupt';

export abstract class SkillgradeError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly fatal: boolean;
}

/** An explicitly requested rubric does not exist. */
export class RubricNotFoundError extends SkillgradeError {
  readonly kind = 'RubricNotFound';
  readonly fatal = true;
  readonly rubric: string;
  readonly rubricsDir: string;

  constructor(rubric: string, rubricsDir: string) {
    super(`Rubric not found: ${rubric} (searched in ${rubricsDir})`);
    this.name = 'RubricNotFoundError';
    this.rubric = rubric;
    this.rubricsDir = rubricsDir;
  }
}

/** A rubric file failed validation, most often because its weights do not sum to 1.0. */
export class InvalidRubricError extends SkillgradeError {
  readonly kind = 'InvalidRubric';
  readonly fatal = true;
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Invalid rubric ${source}: ${reason}`);
    this.name = 'InvalidRubricError';
    this.source = source;
  }
}

export class TranscriptUnavailableError extends SkillgradeError {
  readonly kind = 'TranscriptUnavailable';
  readonly fatal = true;
  readonly transcript: string;

  constructor(transcript: string, reason: string) {
    super(`Transcript unavailable: ${transcript} (${reason})`);
    this.name = 'TranscriptUnavailableError';
    this.transcript = transcript;
  }
}

/** Automatic mode could not tell which skill or agent produced a transcript. */
export class SubjectUndetectedError extends SkillgradeError {
  readonly kind = 'SubjectUndetected';
  readonly fatal = false;
  readonly transcript: string;

  constructor(transcript: string) {
    super(`Could not detect the subject of transcript ${transcript}`);
    this.name = 'SubjectUndetectedError';
    this.transcript = transcript;
  }
}

export class HistoryCorruptError extends SkillgradeError {
  readonly kind = 'HistoryCorrupt';
  readonly fatal = false;
  readonly record: string;

  constructor(record: string, reason: string) {
    super(`History record ${record} excluded: ${reason}`);
    this.name = 'HistoryCorruptError';
    this.record = record;
  }
}

export function isSkillgradeError(error: unknown): error is SkillgradeError {
  return error instanceof SkillgradeError;
}
