/**
 * Schema Metadata Interfaces
 *
 * Runtime view of the unique constraints declared on a table.
 *
 * @packageDocumentation
 */

/**
 * Unique index metadata, as discovered from the system catalog
 *
 * @example
 * ```typescript
 * { name: '16390', fields: ['email'] }
 * { name: '16402', fields: ['user_id', 'post_id'] }
 * ```
 */
export interface UniqueConstraint {
  /** Catalog identifier of the index */
  name: string;
  /** Columns that must be matched to detect a collision */
  fields: string[];
}
