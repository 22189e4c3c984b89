export * from './models';
export * from './in_memory_stores';
export * from './mongo_stores';
export { COLLECTIONS, setupDatabase } from './database';
