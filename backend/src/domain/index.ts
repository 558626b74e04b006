export * from './entities';
export * from './value-objects';
export * from './repositories';
export * from './ports';
export * from './errors';
