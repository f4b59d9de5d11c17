/**
 * Core Interfaces
 *
 * @packageDocumentation
 */

export type { Connection, ResultSet, Row, SqlCommand } from './connection.js';

export type { UniqueConstraint } from './schema-metadata.js';
