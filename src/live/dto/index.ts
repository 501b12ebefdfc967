export * from './monitor.dto';
