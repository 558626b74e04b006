// External service ports (interfaces)
export * from './IGitHubApiClient';
export * from './IInferenceGateway';
export * from './ICacheStore';
export * from './IProgressBroadcaster';
