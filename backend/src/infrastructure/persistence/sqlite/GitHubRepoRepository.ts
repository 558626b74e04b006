import Database from 'better-sqlite3';
import { GitHubRepo } from '../../../domain/entities/GitHubRepo';
import { IGitHubRepoRepository } from '../../../domain/repositories/IGitHubRepoRepository';
import { getDatabase, withPersistence } from './database';

interface GitHubRepoRow {
  id: string;
  github_repo_id: number;
  owner: string;
  name: string;
  language: string | null;
  webhook_id: number | null;
  webhook_secret: string | null;
  auto_analyze: number;
  created_at: string;
}

export class SqliteGitHubRepoRepository implements IGitHubRepoRepository {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db || getDatabase();
  }

  async save(repo: GitHubRepo): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO repositories (id, github_repo_id, owner, name, language, webhook_id, webhook_secret, auto_analyze, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        owner = excluded.owner,
        name = excluded.name,
        language = excluded.language,
        webhook_id = excluded.webhook_id,
        webhook_secret = excluded.webhook_secret,
        auto_analyze = excluded.auto_analyze
    `);

    withPersistence('Saving repository', () =>
      stmt.run(
        repo.id,
        repo.githubRepoId,
        repo.owner,
        repo.name,
        repo.language,
        repo.webhookId,
        repo.webhookSecret,
        repo.autoAnalyze ? 1 : 0,
        repo.createdAt.toISOString(),
      ),
    );
  }

  async findById(id: string): Promise<GitHubRepo | null> {
    const stmt = this.db.prepare('SELECT * FROM repositories WHERE id = ?');
    const row = stmt.get(id) as GitHubRepoRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findByGithubRepoId(githubRepoId: number): Promise<GitHubRepo | null> {
    const stmt = this.db.prepare('SELECT * FROM repositories WHERE github_repo_id = ?');
    const row = stmt.get(githubRepoId) as GitHubRepoRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findAll(): Promise<GitHubRepo[]> {
    const stmt = this.db.prepare('SELECT * FROM repositories ORDER BY created_at DESC');
    const rows = stmt.all() as GitHubRepoRow[];
    return rows.map((row) => this.mapToEntity(row));
  }

  async delete(id: string): Promise<void> {
    const stmt = this.db.prepare('DELETE FROM repositories WHERE id = ?');
    withPersistence('Deleting repository', () => stmt.run(id));
  }

  private mapToEntity(row: GitHubRepoRow): GitHubRepo {
    return GitHubRepo.reconstitute({
      id: row.id,
      githubRepoId: row.github_repo_id,
      owner: row.owner,
      name: row.name,
      language: row.language,
      webhookId: row.webhook_id,
      webhookSecret: row.webhook_secret,
      autoAnalyze: row.auto_analyze === 1,
      createdAt: new Date(row.created_at),
    });
  }
}
