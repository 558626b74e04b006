export * from './CircuitBreaker';
export * from './retry';
