export * from './interfaces';
export * from './operation.errors';
export * from './operation-handlers';
