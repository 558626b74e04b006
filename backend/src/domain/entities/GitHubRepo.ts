import { v4 as uuidv4 } from 'uuid';

export interface GitHubRepoProps {
  id?: string;
  githubRepoId: number;
  owner: string;
  name: string;
  language?: string | null;
  webhookId?: number | null;
  webhookSecret?: string | null;
  autoAnalyze?: boolean;
  createdAt?: Date;
}

/**
 * Entity representing a GitHub repository registered for pull request review
 */
export class GitHubRepo {
  private readonly _id: string;
  private readonly _githubRepoId: number;
  private readonly _owner: string;
  private readonly _name: string;
  private readonly _language: string | null;
  private _webhookId: number | null;
  private _webhookSecret: string | null;
  private _autoAnalyze: boolean;
  private readonly _createdAt: Date;

  private constructor(props: GitHubRepoProps) {
    this._id = props.id || uuidv4();
    this._githubRepoId = props.githubRepoId;
    this._owner = props.owner;
    this._name = props.name;
    this._language = props.language ?? null;
    this._webhookId = props.webhookId ?? null;
    this._webhookSecret = props.webhookSecret ?? null;
    this._autoAnalyze = props.autoAnalyze ?? true;
    this._createdAt = props.createdAt || new Date();
  }

  static create(props: Omit<GitHubRepoProps, 'id' | 'createdAt'>): GitHubRepo {
    if (!Number.isInteger(props.githubRepoId) || props.githubRepoId <= 0) {
      throw new Error(`Invalid GitHub repository id: ${props.githubRepoId}`);
    }
    if (!props.owner || !props.name) {
      throw new Error('Repository owner and name cannot be empty');
    }
    return new GitHubRepo(props);
  }

  static reconstitute(props: GitHubRepoProps): GitHubRepo {
    return new GitHubRepo(props);
  }

  static parseFullName(fullName: string): { owner: string; name: string } {
    const match = fullName.trim().match(/^([\w.-]+)\/([\w.-]+)$/);
    if (!match) {
      throw new Error(`Invalid repository name: ${fullName}`);
    }
    return { owner: match[1], name: match[2] };
  }

  get id(): string {
    return this._id;
  }

  get githubRepoId(): number {
    return this._githubRepoId;
  }

  get owner(): string {
    return this._owner;
  }

  get name(): string {
    return this._name;
  }

  get fullName(): string {
    return `${this._owner}/${this._name}`;
  }

  get language(): string | null {
    return this._language;
  }

  get webhookId(): number | null {
    return this._webhookId;
  }

  get webhookSecret(): string | null {
    return this._webhookSecret;
  }

  get autoAnalyze(): boolean {
    return this._autoAnalyze;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  get htmlUrl(): string {
    return `https://github.com/${this._owner}/${this._name}`;
  }

  attachWebhook(webhookId: number, secret: string): void {
    this._webhookId = webhookId;
    this._webhookSecret = secret;
  }

  detachWebhook(): void {
    this._webhookId = null;
    this._webhookSecret = null;
  }

  setAutoAnalyze(enabled: boolean): void {
    this._autoAnalyze = enabled;
  }

  equals(other: GitHubRepo): boolean {
    return this._id === other._id;
  }
}
