export * from './broadcast.interface';
