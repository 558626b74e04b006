import { Controller, Get, Inject, MessageEvent, Param, Query, Sse } from '@nestjs/common';
import { catchError, defer, finalize, from, map, Observable, of, ReplaySubject, switchMap, throwError } from 'rxjs';
import { JobEvent } from '@pr-sentinel/shared';
import {
  JobListResponseDto,
  JobResponseDto,
  StuckJobsQueryDto,
  SuggestionListResponseDto,
  SuggestionQueryDto,
} from '../dto';
import {
  IJobRepository,
  IProgressBroadcaster,
  ISuggestionRepository,
  JOB_REPOSITORY,
  PROGRESS_BROADCASTER,
  SUGGESTION_REPOSITORY,
} from '../../../domain';
import { GetJobStatusQuery } from '../../../application/queries/GetJobStatus';
import { ListSuggestionsQuery } from '../../../application/queries/ListSuggestions';
import { ResultCache } from '../../../application/services/ResultCache';
import { toHttpException } from './http-errors';

const DEFAULT_STUCK_MINUTES = 30;

@Controller('jobs')
export class JobsController {
  constructor(
    @Inject(JOB_REPOSITORY)
    private readonly jobRepo: IJobRepository,
    @Inject(SUGGESTION_REPOSITORY)
    private readonly suggestionRepo: ISuggestionRepository,
    @Inject(PROGRESS_BROADCASTER)
    private readonly broadcaster: IProgressBroadcaster,
    private readonly cache: ResultCache,
  ) {}

  @Get('stuck')
  async findStuck(@Query() query: StuckJobsQueryDto): Promise<JobListResponseDto> {
    const jobs = new GetJobStatusQuery(this.jobRepo, this.suggestionRepo, this.cache);
    return jobs.listStuck(query.olderThanMinutes ?? DEFAULT_STUCK_MINUTES);
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<JobResponseDto> {
    const query = new GetJobStatusQuery(this.jobRepo, this.suggestionRepo, this.cache);
    try {
      return await query.getById(id);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':id/suggestions')
  async findSuggestions(@Param('id') id: string, @Query() filter: SuggestionQueryDto): Promise<SuggestionListResponseDto> {
    const query = new ListSuggestionsQuery(this.jobRepo, this.suggestionRepo);
    try {
      return await query.execute(id, {
        status: filter.status,
        severity: filter.severity,
        minConfidence: filter.minConfidence,
      });
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * Live events for a job. The broadcaster subscription is opened before the
   * job is read and buffered, so an event published during the read is
   * replayed. A job that has already finished gets a single terminal event
   * built from its stored state.
   */
  @Sse(':id/events')
  events(@Param('id') id: string): Observable<MessageEvent> {
    const query = new GetJobStatusQuery(this.jobRepo, this.suggestionRepo, this.cache);
    const stream = defer(() => {
      const live = new ReplaySubject<JobEvent>();
      const connection = this.broadcaster.subscribe(id).subscribe(live);
      return from(query.getById(id)).pipe(
        switchMap((job): Observable<JobEvent> => {
          const terminal = terminalEvent(job);
          if (terminal) {
            connection.unsubscribe();
            return of(terminal);
          }
          return live;
        }),
        catchError((error: unknown) => throwError(() => toHttpException(error))),
        finalize(() => connection.unsubscribe()),
      );
    });
    return stream.pipe(map((event): MessageEvent => ({ type: event.type, data: event })));
  }
}

function terminalEvent(job: JobResponseDto): JobEvent | null {
  const timestamp = new Date().toISOString();
  if (job.status === 'completed') {
    return { type: 'complete', jobId: job.id, payload: { count: job.suggestionCount }, timestamp };
  }
  if (job.status === 'failed') {
    return { type: 'error', jobId: job.id, payload: { message: job.errorMessage ?? 'Analysis failed' }, timestamp };
  }
  return null;
}
