export * from './GitHubApiClient';
export * from './ResilientGitHubClient';
export * from './WebhookSignature';
export * from './WebhookPayload';
