export { GitHubRepo, GitHubRepoProps } from './GitHubRepo';
export { PullRequest, PullRequestProps, PullRequestDetails, PullRequestState } from './PullRequest';
export { ReviewJob, ReviewJobProps, ReviewJobSnapshot, JobMetadata, JobTrigger } from './ReviewJob';
export { Suggestion, SuggestionProps, NewSuggestionProps, SuggestionMetadata } from './Suggestion';
