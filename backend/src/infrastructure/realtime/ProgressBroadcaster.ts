import { Logger } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { JobEvent, JobEventBody, JobEventType } from '@pr-sentinel/shared';
import { IProgressBroadcaster } from '../../domain/ports/IProgressBroadcaster';

const TERMINAL_EVENT_TYPES: readonly JobEventType[] = ['complete', 'error'];

interface Topic {
  subject: Subject<JobEvent>;
  subscribers: number;
}

/**
 * In-process fan-out of job events, one topic per job (`job/<id>`).
 * Publishing with no subscribers is a no-op; a terminal event completes the
 * topic and releases it.
 */
export class ProgressBroadcaster implements IProgressBroadcaster {
  private readonly logger = new Logger(ProgressBroadcaster.name);
  private readonly topics = new Map<string, Topic>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  static topic(jobId: string): string {
    return `job/${jobId}`;
  }

  publish(jobId: string, body: JobEventBody): void {
    const name = ProgressBroadcaster.topic(jobId);
    const topic = this.topics.get(name);
    if (!topic) {
      return;
    }
    const event: JobEvent = { ...body, jobId, timestamp: this.now().toISOString() };
    topic.subject.next(event);
    if (TERMINAL_EVENT_TYPES.includes(body.type)) {
      this.topics.delete(name);
      topic.subject.complete();
      this.logger.debug(`Closed ${name} after ${body.type}`);
    }
  }

  subscribe(jobId: string): Observable<JobEvent> {
    const name = ProgressBroadcaster.topic(jobId);
    return new Observable<JobEvent>((subscriber) => {
      let topic = this.topics.get(name);
      if (!topic) {
        topic = { subject: new Subject<JobEvent>(), subscribers: 0 };
        this.topics.set(name, topic);
      }
      const current = topic;
      current.subscribers++;
      const subscription = current.subject.subscribe(subscriber);
      return () => {
        subscription.unsubscribe();
        current.subscribers--;
        if (current.subscribers === 0 && this.topics.get(name) === current) {
          this.topics.delete(name);
        }
      };
    });
  }

  subscriberCount(jobId: string): number {
    return this.topics.get(ProgressBroadcaster.topic(jobId))?.subscribers ?? 0;
  }
}

