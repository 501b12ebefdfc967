export * from './account-store.interface';
