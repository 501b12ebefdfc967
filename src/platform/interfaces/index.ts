export * from './platform.interface';
