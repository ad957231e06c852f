import { existsSync } from 'fs';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { HistoryCorruptError } from '../errors/index.js';
import { formatIssues } from '../config/loader.js';
import { ScorecardRecord, type Scorecard } from './scorecard-schema.js';

const MAX_NAME_ATTEMPTS = 1000;

export interface StoredScorecard {
  file: string;
  scorecard: Scorecard;
}

export interface ScorecardListing {
  records: StoredScorecard[];
  warnings: string[];
}

/** `2026-05-01T10:20:30.123Z` → `2026-05-01T10-20-30-123Z` */
export function fileTimestamp(iso: string): string {
  return iso.replace(/[:.]/g, '-');
}

function safeSubjectName(subject: string): string {
  return subject.replace(/[^A-Za-z0-9_.-]/g, '_');
}

export function scorecardFileName(subject: string, createdAt: string, attempt = 0): string {
  const safeSubject = safeSubjectName(subject);
  const suffix = attempt === 0 ? '' : `-${attempt}`;
  return `${safeSubject}-${fileTimestamp(createdAt)}${suffix}.json`;
}

/** Matches the file names `scorecardFileName` produces for one subject. */
export function scorecardFilePattern(subject: string): RegExp {
  const escaped = safeSubjectName(subject).replace(/[.]/g, '\\.');
  return new RegExp(`^${escaped}-\\d{4}-\\d{2}-\\d{2}T\\d{2}-\\d{2}-\\d{2}-\\d{3}Z(?:-\\d+)?\\.json$`);
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Append-only store of scorecards, one JSON file per evaluation. Existing
 * files are never overwritten.
 */
export class ScorecardStore {
  private readonly scoresDir: string;

  constructor(scoresDir: string) {
    this.scoresDir = scoresDir;
  }

  get directory(): string {
    return this.scoresDir;
  }

  async save(scorecard: Scorecard): Promise<string> {
    await mkdir(this.scoresDir, { recursive: true });
    const content = JSON.stringify(scorecard, null, 2) + '\n';

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const filePath = join(this.scoresDir, scorecardFileName(scorecard.subject, scorecard.createdAt, attempt));
      try {
        await writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
        return filePath;
      } catch (e) {
        if (!isAlreadyExists(e)) throw e;
      }
    }

    throw new Error(`Could not find a free file name for ${scorecard.subject} in ${this.scoresDir}`);
  }

  async load(file: string): Promise<Scorecard> {
    const content = await readFile(join(this.scoresDir, file), 'utf-8');
    return this.parse(file, content);
  }

  /**
   * Valid records, newest first; unreadable or invalid files become warnings.
   * With a subject, only that subject's files are read.
   */
  async list(subject?: string): Promise<ScorecardListing> {
    if (!existsSync(this.scoresDir)) {
      return { records: [], warnings: [] };
    }

    const pattern = subject === undefined ? /\.json$/ : scorecardFilePattern(subject);
    const files = (await readdir(this.scoresDir)).filter(f => pattern.test(f));
    const records: StoredScorecard[] = [];
    const warnings: string[] = [];

    for (const file of files) {
      try {
        const scorecard = await this.load(file);
        if (subject !== undefined && scorecard.subject !== subject) {
          continue;
        }
        records.push({ file, scorecard });
      } catch (e) {
        warnings.push(e instanceof Error ? e.message : String(e));
      }
    }

    records.sort((a, b) =>
      b.scorecard.createdAt.localeCompare(a.scorecard.createdAt) || b.file.localeCompare(a.file),
    );
    return { records, warnings };
  }

  private parse(file: string, content: string): Scorecard {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (e) {
      throw new HistoryCorruptError(file, e instanceof Error ? e.message : String(e));
    }

    const result = ScorecardRecord.safeParse(raw);
    if (!result.success) {
      throw new HistoryCorruptError(file, formatIssues(result.error));
    }
    return result.data;
  }
}
