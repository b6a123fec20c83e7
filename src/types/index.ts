/**
 * @fileoverview Shared type definitions used across modules.
 *
 * - setup options and resolved configuration
 * - cluster detection results
 * - environment check results
 */

export * from './types.ts';
export * from './cluster-types.ts';
export * from './check-types.ts';
