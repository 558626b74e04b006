// Commands
export * from './commands/RegisterRepository';
export * from './commands/UpdateRepository';
export * from './commands/DeleteRepository';
export * from './commands/HandleWebhookEvent';
export * from './commands/RespondToSuggestion';

// Queries
export * from './queries/GetJobStatus';
export * from './queries/ListSuggestions';
export * from './queries/GetReviewStats';
export * from './queries/ListRepositories';

// Services
export * from './services/BoundedWorkerPool';
export * from './services/ResultCache';
export * from './services/ReviewOrchestrator';

export * from './mappers';
