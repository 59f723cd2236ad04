/**
 * Archive Module
 */

export type { WorkflowArchive } from './archive.js';
export type { SqlClient } from './postgres.js';

export { InMemoryWorkflowArchive } from './archive.js';
export { PostgresWorkflowArchive, poolClient } from './postgres.js';
