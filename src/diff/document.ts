/**
 * Diff Documents
 *
 * The JSON shape the CLI reads for each side of a diff. A document names its
 * container kind explicitly; nested JSON inside records and dictionaries
 * becomes vectors (arrays) and records (objects).
 */

import { z } from 'zod';
import { ArgumentError } from '../errors.js';
import { Matrix } from '../matrix.js';
import { positionalIds } from './alignment.js';
import { diffDict, diffMatrix, diffRecord, diffSet, diffVector } from './dispatch.js';
import type { Difference, IndexedDiffOptions } from './types.js';

export const IdentifierSchema = z.union([z.string(), z.number()]);

export type Identifier = z.infer<typeof IdentifierSchema>;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Set members are compared by value, so only scalars are accepted. */
export const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type Scalar = z.infer<typeof ScalarSchema>;

export const SetDocumentSchema = z.object({
  kind: z.literal('set'),
  values: z.array(ScalarSchema),
});

export const VectorDocumentSchema = z.object({
  kind: z.literal('vector'),
  values: z.array(JsonValueSchema),
  /** Element identifiers; positional when absent */
  ids: z.array(IdentifierSchema).optional(),
});

export const MatrixDocumentSchema = z.object({
  kind: z.literal('matrix'),
  rows: z.array(z.array(JsonValueSchema)),
  rowIds: z.array(IdentifierSchema).optional(),
  colIds: z.array(IdentifierSchema).optional(),
});

export const RecordDocumentSchema = z.object({
  kind: z.literal('record'),
  fields: z.record(z.string(), JsonValueSchema),
});

export const DictDocumentSchema = z.object({
  kind: z.literal('dict'),
  entries: z.array(z.tuple([JsonValueSchema, JsonValueSchema])),
});

export const DiffDocumentSchema = z.discriminatedUnion('kind', [
  SetDocumentSchema,
  VectorDocumentSchema,
  MatrixDocumentSchema,
  RecordDocumentSchema,
  DictDocumentSchema,
]);

export type DiffDocument = z.infer<typeof DiffDocumentSchema>;
export type SetDocument = z.infer<typeof SetDocumentSchema>;
export type VectorDocument = z.infer<typeof VectorDocumentSchema>;
export type MatrixDocument = z.infer<typeof MatrixDocumentSchema>;
export type RecordDocument = z.infer<typeof RecordDocumentSchema>;
export type DictDocument = z.infer<typeof DictDocumentSchema>;

/**
 * Validate parsed JSON as a document.
 */
export function parseDocument(raw: unknown): DiffDocument {
  return DiffDocumentSchema.parse(raw);
}

/**
 * JSON inside a document → a diffable value: arrays become vectors, objects
 * become records, scalars stay as they are.
 */
export function fromJson(value: JsonValue): unknown {
  if (Array.isArray(value)) {
    return value.map(fromJson);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, fromJson(entry)]));
  }
  return value;
}

export function documentMatrix(doc: MatrixDocument): Matrix<unknown> {
  return Matrix.fromRows(doc.rows.map((row) => row.map(fromJson)));
}

/**
 * Dictionary keys must be usable as Map keys by value, so only scalars are
 * accepted.
 */
export function documentMap(doc: DictDocument): Map<unknown, unknown> {
  const map = new Map<unknown, unknown>();
  for (const [key, value] of doc.entries) {
    if (typeof key === 'object' && key !== null) {
      throw new ArgumentError(`Dictionary keys must be scalars, got ${JSON.stringify(key)}`);
    }
    if (map.has(key)) {
      throw new ArgumentError(`Dictionary contains duplicate key ${JSON.stringify(key)}`);
    }
    map.set(key, fromJson(value));
  }
  return map;
}

/**
 * Diff two documents of the same kind. Identifiers must be given on both
 * sides or on neither.
 */
export function diffDocuments(
  a: DiffDocument,
  b: DiffDocument,
  options: IndexedDiffOptions = {},
): Difference {
  if (a.kind === 'set' && b.kind === 'set') {
    return diffSet(new Set(a.values), new Set(b.values));
  }
  if (a.kind === 'vector' && b.kind === 'vector') {
    const prev = a.values.map(fromJson);
    const next = b.values.map(fromJson);
    const ids = pairIdentifiers(a.ids, b.ids, 'ids');
    return ids
      ? diffVector(prev, next, { oldIds: ids[0], newIds: ids[1] }, options)
      : diffVector(prev, next, options);
  }
  if (a.kind === 'matrix' && b.kind === 'matrix') {
    const prev = documentMatrix(a);
    const next = documentMatrix(b);
    const rowIds = pairIdentifiers(a.rowIds, b.rowIds, 'rowIds');
    const colIds = pairIdentifiers(a.colIds, b.colIds, 'colIds');
    if (!rowIds && !colIds) {
      return diffMatrix(prev, next, options);
    }
    const ids = {
      oldRowIds: rowIds?.[0] ?? positionalIds(prev.rows),
      newRowIds: rowIds?.[1] ?? positionalIds(next.rows),
      oldColIds: colIds?.[0] ?? positionalIds(prev.cols),
      newColIds: colIds?.[1] ?? positionalIds(next.cols),
    };
    return diffMatrix(prev, next, ids, options);
  }
  if (a.kind === 'record' && b.kind === 'record') {
    return diffRecord(recordOf(a), recordOf(b));
  }
  if (a.kind === 'dict' && b.kind === 'dict') {
    return diffDict(documentMap(a), documentMap(b));
  }
  throw new ArgumentError(`Cannot diff ${a.kind} against ${b.kind}`);
}

function recordOf(doc: RecordDocument): Record<string, unknown> {
  return Object.fromEntries(Object.entries(doc.fields).map(([key, value]) => [key, fromJson(value)]));
}

function pairIdentifiers(
  prev: Identifier[] | undefined,
  next: Identifier[] | undefined,
  field: string,
): [Identifier[], Identifier[]] | undefined {
  if (prev === undefined && next === undefined) {
    return undefined;
  }
  if (prev === undefined || next === undefined) {
    throw new ArgumentError(`"${field}" must be given for both documents or for neither`);
  }
  return [prev, next];
}
