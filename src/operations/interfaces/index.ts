export * from './operation.interface';
