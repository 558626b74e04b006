/**
 * Value Object representing the status of a review job
 * Implements a simple state machine
 */
export type JobStatusValue = 'pending' | 'processing' | 'completed' | 'failed';

const VALID_STATUSES: readonly JobStatusValue[] = ['pending', 'processing', 'completed', 'failed'];

export class JobStatus {
  private readonly _value: JobStatusValue;

  private constructor(value: JobStatusValue) {
    this._value = value;
  }

  static pending(): JobStatus {
    return new JobStatus('pending');
  }

  static processing(): JobStatus {
    return new JobStatus('processing');
  }

  static completed(): JobStatus {
    return new JobStatus('completed');
  }

  static failed(): JobStatus {
    return new JobStatus('failed');
  }

  static isValue(value: string): value is JobStatusValue {
    return VALID_STATUSES.some(status => status === value);
  }

  static fromString(value: string): JobStatus {
    if (!JobStatus.isValue(value)) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatus(value);
  }

  get value(): JobStatusValue {
    return this._value;
  }

  get isPending(): boolean {
    return this._value === 'pending';
  }

  get isProcessing(): boolean {
    return this._value === 'processing';
  }

  get isCompleted(): boolean {
    return this._value === 'completed';
  }

  get isFailed(): boolean {
    return this._value === 'failed';
  }

  get isTerminal(): boolean {
    return this._value === 'completed' || this._value === 'failed';
  }

  canTransitionTo(newStatus: JobStatus): boolean {
    // pending -> processing
    // processing -> completed | failed
    const transitions: Record<JobStatusValue, JobStatusValue[]> = {
      pending: ['processing'],
      processing: ['completed', 'failed'],
      completed: [],
      failed: [],
    };

    return transitions[this._value].includes(newStatus._value);
  }

  equals(other: JobStatus): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
