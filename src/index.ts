/**
 * Caret - an editing engine core for text editors
 *
 * Main entry point exporting types, the editor facade and its building blocks.
 */

// =============================================================================
// Types
// =============================================================================

export * from './types/index.ts';

// =============================================================================
// Editor and Building Blocks
// =============================================================================

export * from './store/index.ts';

// =============================================================================
// API Namespaces
// =============================================================================

export { query, scan } from './api/index.ts';
