export * from './live.interface';
