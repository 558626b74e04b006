import Database from 'better-sqlite3';
import { PullRequest, PullRequestState } from '../../../domain/entities/PullRequest';
import { IPullRequestRepository } from '../../../domain/repositories/IPullRequestRepository';
import { getDatabase, withPersistence } from './database';

interface PullRequestRow {
  id: string;
  repository_id: string;
  number: number;
  title: string;
  author: string;
  base_branch: string;
  head_branch: string;
  state: string;
  html_url: string;
  created_at: string;
  updated_at: string;
}

export class SqlitePullRequestRepository implements IPullRequestRepository {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db || getDatabase();
  }

  async save(pullRequest: PullRequest): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO pull_requests (id, repository_id, number, title, author, base_branch, head_branch, state, html_url, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        title = excluded.title,
        author = excluded.author,
        base_branch = excluded.base_branch,
        head_branch = excluded.head_branch,
        state = excluded.state,
        html_url = excluded.html_url,
        updated_at = excluded.updated_at
    `);

    withPersistence('Saving pull request', () =>
      stmt.run(
        pullRequest.id,
        pullRequest.repositoryId,
        pullRequest.number,
        pullRequest.title,
        pullRequest.author,
        pullRequest.baseBranch,
        pullRequest.headBranch,
        pullRequest.state,
        pullRequest.htmlUrl,
        pullRequest.createdAt.toISOString(),
        pullRequest.updatedAt.toISOString(),
      ),
    );
  }

  async findById(id: string): Promise<PullRequest | null> {
    const stmt = this.db.prepare('SELECT * FROM pull_requests WHERE id = ?');
    const row = stmt.get(id) as PullRequestRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findByRepositoryAndNumber(repositoryId: string, number: number): Promise<PullRequest | null> {
    const stmt = this.db.prepare('SELECT * FROM pull_requests WHERE repository_id = ? AND number = ?');
    const row = stmt.get(repositoryId, number) as PullRequestRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  private mapToEntity(row: PullRequestRow): PullRequest {
    return PullRequest.reconstitute({
      id: row.id,
      repositoryId: row.repository_id,
      number: row.number,
      title: row.title,
      author: row.author,
      baseBranch: row.base_branch,
      headBranch: row.head_branch,
      state: parseState(row.state),
      htmlUrl: row.html_url,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    });
  }
}

function parseState(value: string): PullRequestState {
  return value === 'closed' ? 'closed' : 'open';
}
