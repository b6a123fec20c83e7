/**
 * @fileoverview Setup workflows: environment checks, install sequence and
 * the helpers they drive.
 */

export * from './modules/index.ts';
