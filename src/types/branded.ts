/**
 * Branded types for type-safe offset handling.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. A column counts
 * Unicode scalar values, while string storage is indexed by UTF-16 code units;
 * the two only agree on text without astral characters, so they must not be
 * interchangeable.
 *
 * Usage:
 * ```typescript
 * const index = codeUnitOffset(2);
 * const column = columnOffset(1);
 *
 * // Type error: can't assign CodeUnitOffset to ColumnOffset
 * const wrong: ColumnOffset = index;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 * The brand is a phantom type that only exists in the type system.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 * The brand only exists at compile time - no runtime overhead.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Offset Types
// =============================================================================

/**
 * Storage offset into a line string.
 * Represents a position in terms of UTF-16 code units (JavaScript's string indexing).
 *
 * Use when:
 * - Calling `slice`/`substring` on stored line text
 * - Converting a column before touching storage
 */
export type CodeUnitOffset = Branded<number, 'CodeUnitOffset'>;

/**
 * Column offset within a line.
 * Represents a position in terms of Unicode scalar values: a CJK character or
 * an emoji outside the BMP counts as one column.
 *
 * Use when:
 * - User-facing cursor positions
 * - Search match coordinates
 */
export type ColumnOffset = Branded<number, 'ColumnOffset'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a CodeUnitOffset from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function codeUnitOffset(value: number): CodeUnitOffset {
  return value as CodeUnitOffset;
}

/**
 * Create a ColumnOffset from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function columnOffset(value: number): ColumnOffset {
  return value as ColumnOffset;
}
