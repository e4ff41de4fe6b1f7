export * from './database-handle.interface';
