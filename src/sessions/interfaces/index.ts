export * from './session.interface';
