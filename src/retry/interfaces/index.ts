export * from './retry.interface';
