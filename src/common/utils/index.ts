export * from './mutex.util';
export * from './sleep.util';
