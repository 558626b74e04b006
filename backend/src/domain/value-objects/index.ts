export * from './JobStatus';
export * from './SuggestionStatus';
export * from './Severity';
export * from './ConfidenceScore';
