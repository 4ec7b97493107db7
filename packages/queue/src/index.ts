/**
 * Queue package: BullMQ queues for bundle validation, with an in-memory
 * fallback when Redis is not configured.
 */

export * from './types';
export * from './queues';
export * from './connection';
export * from './producer';
export * from './adapter';
