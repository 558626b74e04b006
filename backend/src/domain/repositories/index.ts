export * from './IGitHubRepoRepository';
export * from './IPullRequestRepository';
export * from './IJobRepository';
export * from './ISuggestionRepository';
