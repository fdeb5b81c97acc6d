import { isRecord } from '../types';

/**
 * Renders a tool result the way it is shown to the model:
 * objects and arrays as JSON, everything else as plain text.
 */
export const stringifyObservation = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '<none>';
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
};

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(value[key])]),
    );
  }
  return value;
};

// JSON with object keys sorted at every depth
export const canonicalJson = (value: unknown): string =>
  JSON.stringify(sortKeys(value));
