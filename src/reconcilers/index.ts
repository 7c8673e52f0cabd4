/**
 * Reconcilers module - state management for release resources
 *
 * @module reconcilers
 */

export * as release from './release/index.js';
