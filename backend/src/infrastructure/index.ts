// Persistence
export * from './persistence/sqlite';

// GitHub
export * from './github';

// Inference
export * from './inference';

// Cache
export * from './cache';

// Realtime
export * from './realtime/ProgressBroadcaster';

// Resilience
export * from './resilience';

// Configuration
export * from './config/ReviewConfig';

// NestJS
export * from './nestjs';
