/**
 * @buildmeta/core - Shared types and utilities for the metadata server
 *
 * This package contains:
 * - Wire schemas (Zod) and the wire-stable result/vote enums
 * - Telemetry abstraction and logging helpers
 * - Database factory and dialect descriptor types
 */

export * from './database';
export * from './dialect';
export * from './logger';
export * from './schemas';
export * from './telemetry';
