/**
 * Text encoding of runtime values for the trace store.
 */

import { MAX_VALUE_LENGTH } from './config.js';

/**
 * Cut a stored string to the store's cap, counted in code points so a
 * surrogate pair is never split. Values at or under the cap are returned
 * as-is.
 */
export function truncate(text: string, maxLength = MAX_VALUE_LENGTH): string {
  if (text.length <= maxLength) {
    return text;
  }
  const codePoints = Array.from(text);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('') : text;
}

function describeOpaque(value: unknown): string {
  if (typeof value === 'function') {
    return `<function ${value.name || 'anonymous'}>`;
  }
  if (typeof value === 'symbol') {
    return value.toString();
  }
  if (typeof value === 'bigint') {
    return `${value}n`;
  }
  if (typeof value === 'object' && value !== null) {
    const constructorName = value.constructor?.name;
    try {
      const s = String(value);
      if (s !== '[object Object]') {
        return s;
      }
    } catch {
      // String() can throw for objects with a hostile toString
    }
    return `<${constructorName || 'Object'}>`;
  }
  return String(value);
}

function replacer(_key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'bigint':
    case 'function':
    case 'symbol':
      return describeOpaque(value);
    case 'undefined':
      return null;
    default:
      break;
  }
  if (value instanceof Map) {
    return Object.fromEntries(
      Array.from(value.entries(), ([k, v]) => [typeof k === 'string' ? k : describeOpaque(k), v])
    );
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  return value;
}

/**
 * Convert a value to its human-readable text form.
 *
 * Strings are stored raw, everything JSON can represent is stored as JSON,
 * and anything else (circular graphs, promises, class instances with a
 * custom toString) falls back to its string representation.
 */
export function toTextForm(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'function' || typeof value === 'symbol' || typeof value === 'bigint') {
    return describeOpaque(value);
  }
  if (value instanceof Promise) {
    return '<Promise>';
  }
  try {
    const json = JSON.stringify(value, replacer);
    return json === undefined ? describeOpaque(value) : json;
  } catch {
    return describeOpaque(value);
  }
}

/**
 * Text form of a value, truncated to the store's cap.
 */
export function serializeValue(value: unknown): string {
  return truncate(toTextForm(value));
}
