export * from './ReviewErrors';
