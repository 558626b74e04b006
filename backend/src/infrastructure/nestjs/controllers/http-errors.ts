import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  HttpException,
  NotFoundException,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import { ReviewError } from '../../../domain/errors';

/**
 * Maps pipeline errors onto HTTP responses. Anything unrecognised is
 * returned unchanged and ends up as a 500.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof HttpException || !(error instanceof ReviewError)) {
    return error;
  }
  switch (error.code) {
    case 'NOT_FOUND':
      return new NotFoundException(error.message);
    case 'VALIDATION':
      return new BadRequestException(error.message);
    case 'UNAUTHORIZED':
      return new UnauthorizedException(error.message);
    case 'CONFLICT':
      return new ConflictException(error.message);
    case 'CAPACITY':
    case 'SHUTTING_DOWN':
    case 'UPSTREAM_UNAVAILABLE':
      return new ServiceUnavailableException(error.message);
    case 'UPSTREAM_REQUEST':
    case 'TRANSIENT_UPSTREAM':
      return new BadGatewayException(error.message);
    default:
      return error;
  }
}
