export * from './controllers';
export * from './modules';
