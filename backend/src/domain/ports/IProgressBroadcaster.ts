import { Observable } from 'rxjs';
import { JobEvent, JobEventBody } from '@pr-sentinel/shared';

export interface IProgressBroadcaster {
  publish(jobId: string, event: JobEventBody): void;
  subscribe(jobId: string): Observable<JobEvent>;
  subscriberCount(jobId: string): number;
}

export const PROGRESS_BROADCASTER = Symbol('IProgressBroadcaster');
