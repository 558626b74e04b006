import { v4 as uuidv4 } from 'uuid';

export type PullRequestState = 'open' | 'closed';

export interface PullRequestProps {
  id?: string;
  repositoryId: string;
  number: number;
  title: string;
  author: string;
  baseBranch: string;
  headBranch: string;
  state?: PullRequestState;
  htmlUrl: string;
  createdAt?: Date;
  updatedAt?: Date;
}

export type PullRequestDetails = Pick<PullRequestProps, 'title' | 'author' | 'baseBranch' | 'headBranch' | 'htmlUrl'> & {
  state: PullRequestState;
};

/**
 * Entity representing a pull request of a registered repository.
 * Upserted from webhook deliveries; (repositoryId, number) is unique.
 */
export class PullRequest {
  private readonly _id: string;
  private readonly _repositoryId: string;
  private readonly _number: number;
  private _title: string;
  private _author: string;
  private _baseBranch: string;
  private _headBranch: string;
  private _state: PullRequestState;
  private _htmlUrl: string;
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  private constructor(props: PullRequestProps) {
    this._id = props.id || uuidv4();
    this._repositoryId = props.repositoryId;
    this._number = props.number;
    this._title = props.title;
    this._author = props.author;
    this._baseBranch = props.baseBranch;
    this._headBranch = props.headBranch;
    this._state = props.state || 'open';
    this._htmlUrl = props.htmlUrl;
    this._createdAt = props.createdAt || new Date();
    this._updatedAt = props.updatedAt || this._createdAt;
  }

  static create(props: Omit<PullRequestProps, 'id' | 'createdAt' | 'updatedAt'>): PullRequest {
    if (!Number.isInteger(props.number) || props.number <= 0) {
      throw new Error(`Invalid pull request number: ${props.number}`);
    }
    if (!props.repositoryId) {
      throw new Error('Pull request must belong to a repository');
    }
    return new PullRequest(props);
  }

  static reconstitute(props: PullRequestProps): PullRequest {
    return new PullRequest(props);
  }

  get id(): string {
    return this._id;
  }

  get repositoryId(): string {
    return this._repositoryId;
  }

  get number(): number {
    return this._number;
  }

  get title(): string {
    return this._title;
  }

  get author(): string {
    return this._author;
  }

  get baseBranch(): string {
    return this._baseBranch;
  }

  get headBranch(): string {
    return this._headBranch;
  }

  get state(): PullRequestState {
    return this._state;
  }

  get htmlUrl(): string {
    return this._htmlUrl;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get isOpen(): boolean {
    return this._state === 'open';
  }

  refresh(details: PullRequestDetails, at: Date = new Date()): void {
    this._title = details.title;
    this._author = details.author;
    this._baseBranch = details.baseBranch;
    this._headBranch = details.headBranch;
    this._state = details.state;
    this._htmlUrl = details.htmlUrl;
    this._updatedAt = at;
  }

  equals(other: PullRequest): boolean {
    return this._id === other._id;
  }
}
