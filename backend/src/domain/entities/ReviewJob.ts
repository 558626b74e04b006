import { v4 as uuidv4 } from 'uuid';
import { JobStatus, JobStatusValue } from '../value-objects/JobStatus';

export type JobTrigger = 'webhook' | 'manual';

/**
 * Optional, open-ended details about a run. Kept apart from the required
 * fields so adding a key never weakens the job contract.
 */
export interface JobMetadata {
  trigger?: JobTrigger;
  deliveryId?: string;
  diffFromCache?: boolean;
  diffBytes?: number;
  inferenceMs?: number;
  suggestionCount?: number;
}

export interface ReviewJobProps {
  id?: string;
  pullRequestId: string;
  status?: JobStatus;
  progressPercent?: number;
  progressMessage?: string | null;
  filesAnalyzed?: number | null;
  errorMessage?: string | null;
  startedAt?: Date | null;
  completedAt?: Date | null;
  durationMs?: number | null;
  metadata?: JobMetadata;
  createdAt?: Date;
}

/** Plain JSON form of a job, used for cached terminal snapshots. */
export interface ReviewJobSnapshot {
  id: string;
  pullRequestId: string;
  status: JobStatusValue;
  progressPercent: number;
  progressMessage: string | null;
  filesAnalyzed: number | null;
  errorMessage: string | null;
  startedAt: string | null;
  completedAt: string | null;
  durationMs: number | null;
  metadata: JobMetadata;
  createdAt: string;
}

/**
 * Entity representing one run of the review pipeline against a pull request.
 * Implements the pending -> processing -> completed | failed state machine;
 * terminal jobs are never reopened, a re-analysis is a new job.
 */
export class ReviewJob {
  private readonly _id: string;
  private readonly _pullRequestId: string;
  private _status: JobStatus;
  private _progressPercent: number;
  private _progressMessage: string | null;
  private _filesAnalyzed: number | null;
  private _errorMessage: string | null;
  private _startedAt: Date | null;
  private _completedAt: Date | null;
  private _durationMs: number | null;
  private _metadata: JobMetadata;
  private readonly _createdAt: Date;

  private constructor(props: ReviewJobProps) {
    this._id = props.id || uuidv4();
    this._pullRequestId = props.pullRequestId;
    this._status = props.status || JobStatus.pending();
    this._progressPercent = props.progressPercent ?? 0;
    this._progressMessage = props.progressMessage ?? null;
    this._filesAnalyzed = props.filesAnalyzed ?? null;
    this._errorMessage = props.errorMessage ?? null;
    this._startedAt = props.startedAt ?? null;
    this._completedAt = props.completedAt ?? null;
    this._durationMs = props.durationMs ?? null;
    this._metadata = { ...props.metadata };
    this._createdAt = props.createdAt || new Date();
  }

  static create(props: { pullRequestId: string; metadata?: JobMetadata }): ReviewJob {
    if (!props.pullRequestId) {
      throw new Error('Pull request reference cannot be empty');
    }
    return new ReviewJob({ pullRequestId: props.pullRequestId, metadata: props.metadata });
  }

  static reconstitute(props: ReviewJobProps): ReviewJob {
    const job = new ReviewJob(props);
    if (job._status.isTerminal !== (job._completedAt !== null)) {
      throw new Error(`Job ${job._id} is ${job._status.value} but completedAt is ${job._completedAt ? 'set' : 'missing'}`);
    }
    return job;
  }

  static fromSnapshot(snapshot: ReviewJobSnapshot): ReviewJob {
    return ReviewJob.reconstitute({
      id: snapshot.id,
      pullRequestId: snapshot.pullRequestId,
      status: JobStatus.fromString(snapshot.status),
      progressPercent: snapshot.progressPercent,
      progressMessage: snapshot.progressMessage,
      filesAnalyzed: snapshot.filesAnalyzed,
      errorMessage: snapshot.errorMessage,
      startedAt: snapshot.startedAt ? new Date(snapshot.startedAt) : null,
      completedAt: snapshot.completedAt ? new Date(snapshot.completedAt) : null,
      durationMs: snapshot.durationMs,
      metadata: snapshot.metadata,
      createdAt: new Date(snapshot.createdAt),
    });
  }

  get id(): string {
    return this._id;
  }

  get pullRequestId(): string {
    return this._pullRequestId;
  }

  get status(): JobStatus {
    return this._status;
  }

  get progressPercent(): number {
    return this._progressPercent;
  }

  get progressMessage(): string | null {
    return this._progressMessage;
  }

  get filesAnalyzed(): number | null {
    return this._filesAnalyzed;
  }

  get errorMessage(): string | null {
    return this._errorMessage;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  get durationMs(): number | null {
    return this._durationMs;
  }

  get metadata(): Readonly<JobMetadata> {
    return this._metadata;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  start(at: Date = new Date()): void {
    this.transitionTo(JobStatus.processing());
    this._startedAt = at;
    this._progressPercent = 0;
  }

  updateProgress(percent: number, message: string): void {
    if (!this._status.isProcessing) {
      throw new Error('Cannot update progress for a job that is not processing');
    }
    if (percent < 0 || percent > 100) {
      throw new Error(`Progress must be between 0 and 100, got ${percent}`);
    }
    if (percent < this._progressPercent) {
      throw new Error(`Progress cannot go backwards (${this._progressPercent} -> ${percent})`);
    }
    this._progressPercent = percent;
    this._progressMessage = message;
  }

  recordFilesAnalyzed(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Files analyzed must be a non-negative integer, got ${count}`);
    }
    this._filesAnalyzed = count;
  }

  annotate(metadata: JobMetadata): void {
    this._metadata = { ...this._metadata, ...metadata };
  }

  complete(at: Date = new Date()): void {
    this.transitionTo(JobStatus.completed());
    this._progressPercent = 100;
    this._progressMessage = 'Analysis completed';
    this.finish(at);
  }

  fail(errorMessage: string, at: Date = new Date()): void {
    this.transitionTo(JobStatus.failed());
    this._errorMessage = errorMessage;
    this._progressMessage = 'Analysis failed';
    this.finish(at);
  }

  toSnapshot(): ReviewJobSnapshot {
    return {
      id: this._id,
      pullRequestId: this._pullRequestId,
      status: this._status.value,
      progressPercent: this._progressPercent,
      progressMessage: this._progressMessage,
      filesAnalyzed: this._filesAnalyzed,
      errorMessage: this._errorMessage,
      startedAt: this._startedAt?.toISOString() ?? null,
      completedAt: this._completedAt?.toISOString() ?? null,
      durationMs: this._durationMs,
      metadata: { ...this._metadata },
      createdAt: this._createdAt.toISOString(),
    };
  }

  equals(other: ReviewJob): boolean {
    return this._id === other._id;
  }

  private finish(at: Date): void {
    this._completedAt = at;
    this._durationMs = this._startedAt ? at.getTime() - this._startedAt.getTime() : null;
  }

  private transitionTo(newStatus: JobStatus): void {
    if (!this._status.canTransitionTo(newStatus)) {
      throw new Error(`Invalid status transition from ${this._status.value} to ${newStatus.value}`);
    }
    this._status = newStatus;
  }
}
