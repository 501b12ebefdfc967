export * from './rate-limit.interface';
