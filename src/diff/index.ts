/**
 * Diff Module
 *
 * Structural differences between two versions of a set, vector, matrix,
 * record or dictionary.
 */

export type {
  Delta,
  DeltaFn,
  DeltaOptions,
  DictDifference,
  Difference,
  DiffKind,
  DiffRecord,
  IndexedDiffOptions,
  IndexPair,
  MatrixDifference,
  MatrixIdentifiers,
  RecordDifference,
  SetDifference,
  VectorDifference,
  VectorIdentifiers,
} from './types.js';
export { isDifference } from './types.js';

export type { ValueVector } from './values.js';
export { DenseVector, SparseVector, toValueVector } from './values.js';

export type { Alignment } from './alignment.js';
export {
  alignIdentifiers,
  checkIdentifiers,
  indexPositions,
  positionalIds,
  positionsOf,
} from './alignment.js';

export {
  describeType,
  diff,
  diffDict,
  diffKind,
  diffMatrix,
  diffRecord,
  diffSet,
  diffValues,
  diffVector,
  elementDelta,
  isPlainRecord,
} from './dispatch.js';
export { diffMatrixBy } from './matrix.js';
export { diffDictBy, diffRecordBy } from './record.js';
export { diffVectorBy } from './vector.js';

export {
  added,
  addedIndices,
  common,
  hasChanges,
  modified,
  modifiedIndices,
  removed,
  removedIndices,
} from './accessors.js';

export { differenceEquals, hashDifference, valuesEqual } from './equality.js';

export type { FormatOptions } from './format.js';
export {
  DEFAULT_MAX_ITEMS,
  differenceToJSON,
  formatDifference,
  formatDifferenceInline,
  formatValue,
} from './format.js';

export type {
  DiffDocument,
  DictDocument,
  Identifier,
  JsonValue,
  MatrixDocument,
  RecordDocument,
  Scalar,
  SetDocument,
  VectorDocument,
} from './document.js';
export { DiffDocumentSchema, diffDocuments, fromJson, parseDocument } from './document.js';
