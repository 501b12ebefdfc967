export * from './audit-query.dto';
