/**
 * AJV JSON Schema for schema snapshots loaded from files or the local store.
 */

import { Ajv, type JSONSchemaType } from 'ajv';
import type { ColumnInfo, SchemaSnapshot, TableInfo } from '../db/types.js';

const columnSchema: JSONSchemaType<ColumnInfo> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    dataType: { type: 'string', minLength: 1 },
    mode: { type: 'string', enum: ['NULLABLE', 'REQUIRED', 'REPEATED'] },
    description: { type: 'string', nullable: true },
  },
  required: ['name', 'dataType', 'mode'],
  additionalProperties: false,
};

const tableSchema: JSONSchemaType<TableInfo> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    fullName: { type: 'string', minLength: 1 },
    description: { type: 'string', nullable: true },
    rowCount: { type: 'number', minimum: 0, nullable: true },
    columns: { type: 'array', items: columnSchema },
  },
  required: ['name', 'fullName', 'columns'],
  additionalProperties: false,
};

export const schemaSnapshotSchema: JSONSchemaType<SchemaSnapshot> = {
  type: 'object',
  properties: {
    project: { type: 'string', minLength: 1 },
    dataset: { type: 'string', minLength: 1 },
    tables: { type: 'array', items: tableSchema },
    capturedAt: { type: 'string' },
  },
  required: ['project', 'dataset', 'tables', 'capturedAt'],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateSnapshot = ajv.compile(schemaSnapshotSchema);

/** Parse and validate snapshot JSON; throws with every schema error listed. */
export function parseSchemaSnapshot(json: string): SchemaSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Schema snapshot is not valid JSON: ${msg}`);
  }

  if (validateSnapshot(parsed)) {
    return parsed;
  }

  const errors = validateSnapshot.errors
    ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
    .join('; ');
  throw new Error(`Invalid schema snapshot: ${errors ?? 'unknown validation error'}`);
}
