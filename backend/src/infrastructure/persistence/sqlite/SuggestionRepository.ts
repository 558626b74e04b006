import Database from 'better-sqlite3';
import { Suggestion, SuggestionMetadata } from '../../../domain/entities/Suggestion';
import { ISuggestionRepository, SuggestionFilter } from '../../../domain/repositories/ISuggestionRepository';
import { ConfidenceScore } from '../../../domain/value-objects/ConfidenceScore';
import { parseSeverity } from '../../../domain/value-objects/Severity';
import { parseSuggestionStatus } from '../../../domain/value-objects/SuggestionStatus';
import { getDatabase, withPersistence } from './database';

interface SuggestionRow {
  id: string;
  job_id: string;
  file_path: string;
  line_number: number;
  line_end: number | null;
  category: string;
  severity: string;
  message: string;
  explanation: string;
  suggested_fix: string | null;
  confidence_score: number;
  status: string;
  user_feedback: string | null;
  responded_at: string | null;
  metadata: string;
  created_at: string;
  updated_at: string;
}

export class SqliteSuggestionRepository implements ISuggestionRepository {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db || getDatabase();
  }

  async save(suggestion: Suggestion): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO suggestions (id, job_id, file_path, line_number, line_end, category, severity, message, explanation,
        suggested_fix, confidence_score, status, user_feedback, responded_at, metadata, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        user_feedback = excluded.user_feedback,
        responded_at = excluded.responded_at,
        updated_at = excluded.updated_at
    `);

    withPersistence('Saving suggestion', () =>
      stmt.run(
        suggestion.id,
        suggestion.jobId,
        suggestion.filePath,
        suggestion.lineNumber,
        suggestion.lineEnd,
        suggestion.category,
        suggestion.severity,
        suggestion.message,
        suggestion.explanation,
        suggestion.suggestedFix,
        suggestion.confidenceScore.value,
        suggestion.status,
        suggestion.userFeedback,
        suggestion.respondedAt?.toISOString() ?? null,
        JSON.stringify(suggestion.metadata),
        suggestion.createdAt.toISOString(),
        suggestion.updatedAt.toISOString(),
      ),
    );
  }

  async findById(id: string): Promise<Suggestion | null> {
    const stmt = this.db.prepare('SELECT * FROM suggestions WHERE id = ?');
    const row = stmt.get(id) as SuggestionRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findByJobId(jobId: string, filter: SuggestionFilter = {}): Promise<Suggestion[]> {
    const conditions = ['job_id = ?'];
    const params: Array<string | number> = [jobId];

    if (filter.status) {
      conditions.push('status = ?');
      params.push(filter.status);
    }
    if (filter.severity) {
      conditions.push('severity = ?');
      params.push(filter.severity);
    }
    if (filter.minConfidence !== undefined) {
      conditions.push('confidence_score >= ?');
      params.push(filter.minConfidence);
    }

    const stmt = this.db.prepare(`
      SELECT * FROM suggestions
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at ASC, rowid ASC
    `);
    const rows = stmt.all(...params) as SuggestionRow[];
    return rows.map((row) => this.mapToEntity(row));
  }

  async countByJobId(jobId: string): Promise<number> {
    const stmt = this.db.prepare('SELECT COUNT(*) AS total FROM suggestions WHERE job_id = ?');
    const row = stmt.get(jobId) as { total: number };
    return row.total;
  }

  async acceptanceRate(): Promise<number> {
    const stmt = this.db.prepare(`
      SELECT
        SUM(CASE WHEN status = 'accepted' THEN 1 ELSE 0 END) AS accepted,
        COUNT(*) AS responded
      FROM suggestions
      WHERE status IN ('accepted', 'rejected', 'ignored')
    `);
    const row = stmt.get() as { accepted: number | null; responded: number };
    if (row.responded === 0) {
      return 0;
    }
    return (row.accepted ?? 0) / row.responded;
  }

  private mapToEntity(row: SuggestionRow): Suggestion {
    return Suggestion.reconstitute({
      id: row.id,
      jobId: row.job_id,
      filePath: row.file_path,
      lineNumber: row.line_number,
      lineEnd: row.line_end,
      category: row.category,
      severity: parseSeverity(row.severity),
      message: row.message,
      explanation: row.explanation,
      suggestedFix: row.suggested_fix,
      confidenceScore: ConfidenceScore.create(row.confidence_score),
      status: parseSuggestionStatus(row.status),
      userFeedback: row.user_feedback,
      respondedAt: row.responded_at ? new Date(row.responded_at) : null,
      metadata: parseMetadata(row.metadata),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    });
  }
}

function parseMetadata(raw: string): SuggestionMetadata {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    return {};
  }
  const metadata: SuggestionMetadata = {};
  if ('ruleId' in parsed && typeof parsed.ruleId === 'string') {
    metadata.ruleId = parsed.ruleId;
  }
  if ('language' in parsed && typeof parsed.language === 'string') {
    metadata.language = parsed.language;
  }
  if ('similarPatterns' in parsed && Array.isArray(parsed.similarPatterns)) {
    metadata.similarPatterns = parsed.similarPatterns.filter((p: unknown): p is string => typeof p === 'string');
  }
  return metadata;
}
