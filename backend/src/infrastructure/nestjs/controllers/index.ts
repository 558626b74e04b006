export { RepositoriesController } from './repositories.controller';
export { JobsController } from './jobs.controller';
export { PullRequestsController } from './pull-requests.controller';
export { SuggestionsController } from './suggestions.controller';
export { StatsController } from './stats.controller';
export { WebhooksController } from './webhooks.controller';
export { HealthController } from './health.controller';
