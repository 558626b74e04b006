import { v4 as uuidv4 } from 'uuid';
import { ConfidenceScore } from '../value-objects/ConfidenceScore';
import { Severity } from '../value-objects/Severity';
import { SuggestionStatusValue } from '../value-objects/SuggestionStatus';

export interface SuggestionMetadata {
  ruleId?: string;
  language?: string;
  similarPatterns?: string[];
}

export interface SuggestionProps {
  id?: string;
  jobId: string;
  filePath: string;
  lineNumber: number;
  lineEnd?: number | null;
  category: string;
  severity: Severity;
  message: string;
  explanation: string;
  suggestedFix?: string | null;
  confidenceScore: ConfidenceScore;
  status?: SuggestionStatusValue;
  userFeedback?: string | null;
  respondedAt?: Date | null;
  metadata?: SuggestionMetadata;
  createdAt?: Date;
  updatedAt?: Date;
}

export type NewSuggestionProps = Omit<
  SuggestionProps,
  'id' | 'status' | 'userFeedback' | 'respondedAt' | 'createdAt' | 'updatedAt'
>;

/**
 * A single finding produced for one job.
 * respondedAt is null exactly while the suggestion is pending; accept, reject
 * and ignore may be called repeatedly and the latest call wins.
 */
export class Suggestion {
  private readonly _id: string;
  private readonly _jobId: string;
  private readonly _filePath: string;
  private readonly _lineNumber: number;
  private readonly _lineEnd: number | null;
  private readonly _category: string;
  private readonly _severity: Severity;
  private readonly _message: string;
  private readonly _explanation: string;
  private readonly _suggestedFix: string | null;
  private readonly _confidenceScore: ConfidenceScore;
  private _status: SuggestionStatusValue;
  private _userFeedback: string | null;
  private _respondedAt: Date | null;
  private readonly _metadata: SuggestionMetadata;
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  private constructor(props: SuggestionProps) {
    this._id = props.id || uuidv4();
    this._jobId = props.jobId;
    this._filePath = props.filePath;
    this._lineNumber = props.lineNumber;
    this._lineEnd = props.lineEnd ?? null;
    this._category = props.category;
    this._severity = props.severity;
    this._message = props.message;
    this._explanation = props.explanation;
    this._suggestedFix = props.suggestedFix ?? null;
    this._confidenceScore = props.confidenceScore;
    this._status = props.status || 'pending';
    this._userFeedback = props.userFeedback ?? null;
    this._respondedAt = props.respondedAt ?? null;
    this._metadata = { ...props.metadata };
    this._createdAt = props.createdAt || new Date();
    this._updatedAt = props.updatedAt || this._createdAt;
  }

  static create(props: NewSuggestionProps): Suggestion {
    if (!props.filePath || props.filePath.trim() === '') {
      throw new Error('Suggestion file path cannot be empty');
    }
    if (!Number.isInteger(props.lineNumber) || props.lineNumber < 0) {
      throw new Error(`Line number must be a non-negative integer, got ${props.lineNumber}`);
    }
    if (props.lineEnd != null && props.lineEnd < props.lineNumber) {
      throw new Error(`Line end ${props.lineEnd} is before line ${props.lineNumber}`);
    }
    return new Suggestion(props);
  }

  static reconstitute(props: SuggestionProps): Suggestion {
    const suggestion = new Suggestion(props);
    if ((suggestion._status === 'pending') !== (suggestion._respondedAt === null)) {
      throw new Error(`Suggestion ${suggestion._id} is ${suggestion._status} with inconsistent respondedAt`);
    }
    return suggestion;
  }

  get id(): string {
    return this._id;
  }

  get jobId(): string {
    return this._jobId;
  }

  get filePath(): string {
    return this._filePath;
  }

  get lineNumber(): number {
    return this._lineNumber;
  }

  get lineEnd(): number | null {
    return this._lineEnd;
  }

  get category(): string {
    return this._category;
  }

  get severity(): Severity {
    return this._severity;
  }

  get message(): string {
    return this._message;
  }

  get explanation(): string {
    return this._explanation;
  }

  get suggestedFix(): string | null {
    return this._suggestedFix;
  }

  get confidenceScore(): ConfidenceScore {
    return this._confidenceScore;
  }

  get status(): SuggestionStatusValue {
    return this._status;
  }

  get userFeedback(): string | null {
    return this._userFeedback;
  }

  get respondedAt(): Date | null {
    return this._respondedAt;
  }

  get metadata(): Readonly<SuggestionMetadata> {
    return this._metadata;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get isPending(): boolean {
    return this._status === 'pending';
  }

  accept(feedback?: string | null, at: Date = new Date()): void {
    this.respond('accepted', feedback, at);
  }

  reject(feedback?: string | null, at: Date = new Date()): void {
    this.respond('rejected', feedback, at);
  }

  ignore(feedback?: string | null, at: Date = new Date()): void {
    this.respond('ignored', feedback, at);
  }

  equals(other: Suggestion): boolean {
    return this._id === other._id;
  }

  private respond(status: Exclude<SuggestionStatusValue, 'pending'>, feedback: string | null | undefined, at: Date): void {
    this._status = status;
    this._userFeedback = feedback ?? null;
    this._respondedAt = at;
    this._updatedAt = at;
  }
}
