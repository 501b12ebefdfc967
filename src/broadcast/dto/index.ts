export * from './start-broadcast.dto';
