export * from './repository.dto';
export * from './job.dto';
export * from './suggestion.dto';
