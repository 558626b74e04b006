import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError as ClassValidationError } from 'class-validator';
import {
  IInferenceGateway,
  InferenceRequest,
  InferredSuggestion,
} from '../../domain/ports/IInferenceGateway';
import { InferenceError } from '../../domain/errors';
import { Severity } from '../../domain/value-objects/Severity';
import { InferenceResponseDto, InferredSuggestionDto, SNAKE_CASE_ALIASES, WireSeverity } from './InferenceResponse.dto';

const SEVERITY_MAP: Record<WireSeverity, Severity> = {
  critical: 'critical',
  major: 'moderate',
  moderate: 'moderate',
  minor: 'minor',
  info: 'minor',
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Calls the external analysis service over HTTP.
 * The response is validated as a whole; one bad suggestion rejects the batch.
 */
export class HttpInferenceGateway implements IInferenceGateway {
  private readonly logger = new Logger(HttpInferenceGateway.name);

  constructor(
    private readonly baseUrl: string,
    private readonly fetchFn: FetchLike = fetch,
  ) {}

  async analyze(request: InferenceRequest, signal: AbortSignal): Promise<InferredSuggestion[]> {
    const url = `${this.baseUrl}/ai/analyze/pr`;
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({
          subjectId: request.subjectId,
          diff: request.diff,
          files: request.files,
          language: request.language ?? 'unknown',
        }),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new InferenceError(`AI service unreachable: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new InferenceError(`AI service responded ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new InferenceError('AI service returned a non-JSON body', { cause: error });
    }

    const suggestions = await this.validateResponse(body);
    this.logger.debug(`AI service returned ${suggestions.length} suggestions for ${request.subjectId}`);
    return suggestions.map(toInferredSuggestion);
  }

  private async validateResponse(body: unknown): Promise<InferredSuggestionDto[]> {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new InferenceError('AI service response is not an object');
    }
    const dto = plainToInstance(InferenceResponseDto, withCamelCaseFields(body));
    const errors = await validate(dto);
    if (errors.length > 0) {
      throw new InferenceError(`AI service response is invalid: ${describeErrors(errors)}`);
    }

    for (const [index, suggestion] of dto.suggestions.entries()) {
      const start = suggestion.lineNumber ?? 0;
      if (suggestion.lineEnd != null && suggestion.lineEnd < start) {
        throw new InferenceError(`AI service response is invalid: suggestions.${index}.lineEnd is before lineNumber`);
      }
    }
    return dto.suggestions;
  }
}

function toInferredSuggestion(dto: InferredSuggestionDto): InferredSuggestion {
  return {
    filePath: dto.filePath,
    lineNumber: dto.lineNumber ?? 0,
    lineEnd: dto.lineEnd ?? null,
    category: dto.category,
    severity: SEVERITY_MAP[dto.severity],
    message: dto.message,
    explanation: dto.explanation ?? '',
    suggestedFix: dto.suggestedFix ?? null,
    confidenceScore: dto.confidenceScore,
  };
}

/** Renames snake_case suggestion fields unless the camelCase one is also present. */
function withCamelCaseFields(body: object): object {
  if (!('suggestions' in body) || !Array.isArray(body.suggestions)) {
    return body;
  }
  const suggestions: unknown[] = body.suggestions.map((item: unknown) => {
    if (typeof item !== 'object' || item === null) {
      return item;
    }
    return Object.fromEntries(
      Object.entries(item).map(([key, value]) => {
        const alias = SNAKE_CASE_ALIASES[key];
        return alias && !(alias in item) ? [alias, value] : [key, value];
      }),
    );
  });
  return { ...body, suggestions };
}

function describeErrors(errors: ClassValidationError[], parent = ''): string {
  return errors
    .flatMap((error) => {
      const path = parent ? `${parent}.${error.property}` : error.property;
      const own = error.constraints ? [`${path} (${Object.keys(error.constraints).join(', ')})`] : [];
      const nested = error.children && error.children.length > 0 ? [describeErrors(error.children, path)] : [];
      return [...own, ...nested];
    })
    .join('; ');
}
