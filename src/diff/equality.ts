/**
 * Equality and hashing for difference values.
 *
 * Both walk the same attributes per kind. Sets and field maps compare by
 * membership; index and value sequences compare in order. Leaves compare
 * with SameValueZero, so `0` equals `-0` and `NaN` equals `NaN`.
 */

import { createHash } from 'node:crypto';
import { Matrix } from '../matrix.js';
import { isPlainRecord } from './dispatch.js';
import type { Difference } from './types.js';
import { isDifference } from './types.js';
import type { ValueVector } from './values.js';

export function differenceEquals(a: Difference, b: Difference): boolean {
  switch (a.kind) {
    case 'set':
      return (
        b.kind === 'set' &&
        setsEqual(a.common, b.common) &&
        setsEqual(a.added, b.added) &&
        setsEqual(a.removed, b.removed)
      );
    case 'vector':
      return (
        b.kind === 'vector' &&
        sequencesEqual(a.modifiedIndices, b.modifiedIndices) &&
        sequencesEqual(a.addedIndices, b.addedIndices) &&
        sequencesEqual(a.removedIndices, b.removedIndices) &&
        vectorsEqual(a.modifiedValues, b.modifiedValues) &&
        sequencesEqual(a.addedValues, b.addedValues) &&
        sequencesEqual(a.removedValues, b.removedValues)
      );
    case 'matrix':
      return (
        b.kind === 'matrix' &&
        sequencesEqual(a.modifiedIndices, b.modifiedIndices) &&
        sequencesEqual(a.addedIndices, b.addedIndices) &&
        sequencesEqual(a.removedIndices, b.removedIndices) &&
        vectorsEqual(a.modifiedValues, b.modifiedValues) &&
        sequencesEqual(a.addedValues, b.addedValues) &&
        sequencesEqual(a.removedValues, b.removedValues)
      );
    case 'record':
      return (
        b.kind === 'record' &&
        recordsEqual(a.modified, b.modified) &&
        recordsEqual(a.added, b.added) &&
        recordsEqual(a.removed, b.removed)
      );
    case 'dict':
      return (
        b.kind === 'dict' &&
        mapsEqual(a.modified, b.modified) &&
        mapsEqual(a.added, b.added) &&
        mapsEqual(a.removed, b.removed)
      );
  }
}

/**
 * Structural equality for the values a difference holds. Arrays, matrices,
 * sets, maps and plain records compare by content; any other object compares
 * by identity.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b || (a !== a && b !== b)) {
    return true;
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  if (isDifference(a) || isDifference(b)) {
    return isDifference(a) && isDifference(b) && differenceEquals(a, b);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    return Array.isArray(a) && Array.isArray(b) && sequencesEqual(a, b);
  }
  if (a instanceof Matrix || b instanceof Matrix) {
    return (
      a instanceof Matrix &&
      b instanceof Matrix &&
      a.rows === b.rows &&
      a.cols === b.cols &&
      sequencesEqual(a.toArray(), b.toArray())
    );
  }
  if (a instanceof Set || b instanceof Set) {
    return a instanceof Set && b instanceof Set && setsEqual(a, b);
  }
  if (a instanceof Map || b instanceof Map) {
    return a instanceof Map && b instanceof Map && mapsEqual(a, b);
  }
  // Other objects (dates, class instances) are equal only to themselves.
  return isPlainRecord(a) && isPlainRecord(b) && recordsEqual(a, b);
}

/**
 * SHA-256 hex digest of a canonical encoding. Differences that compare equal
 * under {@link differenceEquals} hash equally.
 */
export function hashDifference(d: Difference): string {
  return createHash('sha256').update(encode(d)).digest('hex');
}

// ─── Comparison helpers ──────────────────────────────────────

function sequencesEqual(a: readonly unknown[], b: readonly unknown[]): boolean {
  return a.length === b.length && a.every((value, index) => valuesEqual(value, b[index]));
}

function vectorsEqual(a: ValueVector<unknown>, b: ValueVector<unknown>): boolean {
  return sequencesEqual(a.toArray(), b.toArray());
}

function setsEqual(a: ReadonlySet<unknown>, b: ReadonlySet<unknown>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const value of a) {
    if (!b.has(value)) {
      return false;
    }
  }
  return true;
}

function mapsEqual(a: ReadonlyMap<unknown, unknown>, b: ReadonlyMap<unknown, unknown>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [key, value] of a) {
    if (!b.has(key) || !valuesEqual(value, b.get(key))) {
      return false;
    }
  }
  return true;
}

function recordsEqual(a: Readonly<Record<string, unknown>>, b: Readonly<Record<string, unknown>>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
}

// ─── Canonical encoding ──────────────────────────────────────

function encode(value: unknown): string {
  switch (typeof value) {
    case 'number':
      return Number.isNaN(value) ? 'n:NaN' : `n:${Object.is(value, -0) ? 0 : value}`;
    case 'bigint':
      return `b:${value}`;
    case 'string':
      return `s:${JSON.stringify(value)}`;
    case 'boolean':
      return `t:${value}`;
    case 'symbol':
      return `y:${value.description ?? ''}`;
    case 'function':
      return `f:${value.name}`;
    case 'object':
      return value === null ? 'null' : encodeObject(value);
  }
  return 'u';
}

function encodeObject(value: object): string {
  if (isDifference(value)) {
    return encodeDifference(value);
  }
  if (Array.isArray(value)) {
    return encodeList(value);
  }
  if (value instanceof Matrix) {
    return `M${value.rows}x${value.cols}${encodeList(value.toArray())}`;
  }
  if (value instanceof Set) {
    return `S${encodeUnordered([...value].map(encode))}`;
  }
  if (value instanceof Map) {
    return `D${encodeUnordered([...value].map(([key, entry]) => `${encode(key)}=${encode(entry)}`))}`;
  }
  return `R${encodeUnordered(Object.entries(value).map(([key, entry]) => `${JSON.stringify(key)}=${encode(entry)}`))}`;
}

function encodeDifference(d: Difference): string {
  switch (d.kind) {
    case 'set':
      return `<set ${encode(d.common)} ${encode(d.added)} ${encode(d.removed)}>`;
    case 'vector':
    case 'matrix':
      return [
        `<${d.kind}`,
        encode(d.modifiedIndices),
        encode(d.addedIndices),
        encode(d.removedIndices),
        encodeList(d.modifiedValues.toArray()),
        encodeList(d.addedValues),
        encodeList(d.removedValues),
      ].join(' ') + '>';
    case 'record':
    case 'dict':
      return `<${d.kind} ${encode(d.modified)} ${encode(d.added)} ${encode(d.removed)}>`;
  }
}

function encodeList(values: readonly unknown[]): string {
  return `[${values.map(encode).join(',')}]`;
}

function encodeUnordered(parts: string[]): string {
  return `{${parts.sort().join(',')}}`;
}
