/**
 * Complexity-stratified API namespaces.
 *
 * - `query.*`: O(1) and single-line operations
 * - `scan.*`: O(n) operations (full document traversals)
 */

export { query } from './query.ts';
export { scan } from './scan.ts';
