import Database from 'better-sqlite3';
import { JobMetadata, ReviewJob } from '../../../domain/entities/ReviewJob';
import { IJobRepository } from '../../../domain/repositories/IJobRepository';
import { JobStatus } from '../../../domain/value-objects/JobStatus';
import { getDatabase, withPersistence } from './database';

interface JobRow {
  id: string;
  pull_request_id: string;
  status: string;
  progress_percent: number;
  progress_message: string | null;
  files_analyzed: number | null;
  error_message: string | null;
  started_at: string | null;
  completed_at: string | null;
  duration_ms: number | null;
  metadata: string;
  created_at: string;
}

export class SqliteJobRepository implements IJobRepository {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db || getDatabase();
  }

  async save(job: ReviewJob): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO review_jobs (id, pull_request_id, status, progress_percent, progress_message, files_analyzed,
        error_message, started_at, completed_at, duration_ms, metadata, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        progress_percent = excluded.progress_percent,
        progress_message = excluded.progress_message,
        files_analyzed = excluded.files_analyzed,
        error_message = excluded.error_message,
        started_at = excluded.started_at,
        completed_at = excluded.completed_at,
        duration_ms = excluded.duration_ms,
        metadata = excluded.metadata
    `);

    withPersistence('Saving job', () =>
      stmt.run(
        job.id,
        job.pullRequestId,
        job.status.value,
        job.progressPercent,
        job.progressMessage,
        job.filesAnalyzed,
        job.errorMessage,
        job.startedAt?.toISOString() ?? null,
        job.completedAt?.toISOString() ?? null,
        job.durationMs,
        JSON.stringify(job.metadata),
        job.createdAt.toISOString(),
      ),
    );
  }

  async findById(id: string): Promise<ReviewJob | null> {
    const stmt = this.db.prepare('SELECT * FROM review_jobs WHERE id = ?');
    const row = stmt.get(id) as JobRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findByPullRequestId(pullRequestId: string): Promise<ReviewJob[]> {
    const stmt = this.db.prepare(
      'SELECT * FROM review_jobs WHERE pull_request_id = ? ORDER BY created_at DESC, rowid DESC',
    );
    const rows = stmt.all(pullRequestId) as JobRow[];
    return rows.map((row) => this.mapToEntity(row));
  }

  async findLatestByPullRequestId(pullRequestId: string): Promise<ReviewJob | null> {
    const stmt = this.db.prepare(`
      SELECT * FROM review_jobs
      WHERE pull_request_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT 1
    `);
    const row = stmt.get(pullRequestId) as JobRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findStuck(createdBefore: Date): Promise<ReviewJob[]> {
    const stmt = this.db.prepare(`
      SELECT * FROM review_jobs
      WHERE status IN ('pending', 'processing') AND created_at < ?
      ORDER BY created_at ASC
    `);
    const rows = stmt.all(createdBefore.toISOString()) as JobRow[];
    return rows.map((row) => this.mapToEntity(row));
  }

  async averageCompletedDurationMs(): Promise<number | null> {
    const stmt = this.db.prepare(`
      SELECT AVG(duration_ms) AS average FROM review_jobs
      WHERE status = 'completed' AND duration_ms IS NOT NULL
    `);
    const row = stmt.get() as { average: number | null };
    return row.average;
  }

  private mapToEntity(row: JobRow): ReviewJob {
    return ReviewJob.reconstitute({
      id: row.id,
      pullRequestId: row.pull_request_id,
      status: JobStatus.fromString(row.status),
      progressPercent: row.progress_percent,
      progressMessage: row.progress_message,
      filesAnalyzed: row.files_analyzed,
      errorMessage: row.error_message,
      startedAt: row.started_at ? new Date(row.started_at) : null,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      durationMs: row.duration_ms,
      metadata: parseMetadata(row.metadata),
      createdAt: new Date(row.created_at),
    });
  }
}

function parseMetadata(raw: string): JobMetadata {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    return {};
  }
  const metadata: JobMetadata = {};
  if ('trigger' in parsed && (parsed.trigger === 'webhook' || parsed.trigger === 'manual')) {
    metadata.trigger = parsed.trigger;
  }
  if ('deliveryId' in parsed && typeof parsed.deliveryId === 'string') {
    metadata.deliveryId = parsed.deliveryId;
  }
  if ('diffFromCache' in parsed && typeof parsed.diffFromCache === 'boolean') {
    metadata.diffFromCache = parsed.diffFromCache;
  }
  if ('diffBytes' in parsed && typeof parsed.diffBytes === 'number') {
    metadata.diffBytes = parsed.diffBytes;
  }
  if ('inferenceMs' in parsed && typeof parsed.inferenceMs === 'number') {
    metadata.inferenceMs = parsed.inferenceMs;
  }
  if ('suggestionCount' in parsed && typeof parsed.suggestionCount === 'number') {
    metadata.suggestionCount = parsed.suggestionCount;
  }
  return metadata;
}
