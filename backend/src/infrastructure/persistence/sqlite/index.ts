export { getDatabase, createDatabase, createTestDatabase, withPersistence } from './database';
export { SqliteGitHubRepoRepository } from './GitHubRepoRepository';
export { SqlitePullRequestRepository } from './PullRequestRepository';
export { SqliteJobRepository } from './JobRepository';
export { SqliteSuggestionRepository } from './SuggestionRepository';
