import { DecodeError, FailedEventStoreError } from '../common/error';

/**
 * Converts between the in-memory event that a handler processes and the text
 * that is stored in the `event_data` column.
 */
export interface EventCodec<TEvent = unknown> {
  /**
   * Turn the event into its stored text form.
   * @throws FailedEventStoreError with the ENCODE_ERROR code if the event contains values that cannot be represented.
   */
  encode(event: TEvent): string;
  /**
   * Rebuild the event from its stored text form.
   * @throws DecodeError if the text is malformed.
   */
  decode(text: string): TEvent;
}

const envelopeFormat = 'failed-event';
const envelopeVersion = 1;
const tagKey = '$type';

type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * The default codec writes a JSON envelope that names its own format and
 * version. JSON values are kept as they are. Dates, bigints, undefined, and
 * non-finite numbers are written as tagged objects (`{"$type": ...}`) so the
 * event can be rebuilt without knowing its schema. Objects that use the
 * `$type` key themselves are escaped with the "object" tag.
 */
export const jsonEventCodec: EventCodec = {
  encode: (event: unknown): string =>
    JSON.stringify({
      format: envelopeFormat,
      version: envelopeVersion,
      data: toJson(event, new Set()),
    }),

  decode: (text: string): unknown => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DecodeError('The failed event data is not valid JSON.', error);
    }
    if (!isRecord(parsed) || parsed.format !== envelopeFormat) {
      throw new DecodeError(
        `The failed event data is not a "${envelopeFormat}" envelope.`,
      );
    }
    if (parsed.version !== envelopeVersion) {
      throw new DecodeError(
        `The failed event data version ${String(
          parsed.version,
        )} is not supported.`,
      );
    }
    if (!('data' in parsed)) {
      throw new DecodeError('The failed event data envelope has no data.');
    }
    return fromJson(parsed.data);
  },
};

const encodeError = (message: string) =>
  new FailedEventStoreError(message, 'ENCODE_ERROR');

const toJson = (value: unknown, ancestors: Set<object>): JsonValue => {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (Number.isFinite(value)) {
        return Object.is(value, -0) ? { [tagKey]: 'number', value: '-0' } : value;
      }
      return { [tagKey]: 'number', value: String(value) };
    case 'bigint':
      return { [tagKey]: 'bigint', value: value.toString() };
    case 'undefined':
      return { [tagKey]: 'undefined' };
    case 'function':
    case 'symbol':
      throw encodeError(`A ${typeof value} value cannot be stored.`);
  }
  if (value === null) {
    return null;
  }
  if (typeof value !== 'object') {
    throw encodeError(`A ${typeof value} value cannot be stored.`);
  }
  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time)) {
      throw encodeError('An invalid date cannot be stored.');
    }
    return { [tagKey]: 'date', value: value.toISOString() };
  }
  if (ancestors.has(value)) {
    throw encodeError('An event with circular references cannot be stored.');
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return Array.from(value, (item: unknown) => toJson(item, ancestors));
    }
    const prototype = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) {
      throw encodeError(
        'Only plain objects, arrays, and dates can be stored as event data.',
      );
    }
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      setProperty(result, key, toJson(item, ancestors));
    }
    return tagKey in result ? { [tagKey]: 'object', value: result } : result;
  } finally {
    ancestors.delete(value);
  }
};

const fromJson = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(fromJson);
  }
  if (!isRecord(value)) {
    return value;
  }
  if (!(tagKey in value)) {
    return fromEntries(value);
  }
  const tag = value[tagKey];
  const tagged = value.value;
  switch (tag) {
    case 'undefined':
      return undefined;
    case 'bigint':
      if (typeof tagged === 'string' && /^-?\d+$/.test(tagged)) {
        return BigInt(tagged);
      }
      break;
    case 'number':
      if (tagged === 'NaN') return NaN;
      if (tagged === 'Infinity') return Infinity;
      if (tagged === '-Infinity') return -Infinity;
      if (tagged === '-0') return -0;
      break;
    case 'date':
      if (typeof tagged === 'string' && !Number.isNaN(Date.parse(tagged))) {
        return new Date(tagged);
      }
      break;
    case 'object':
      if (isRecord(tagged)) {
        return fromEntries(tagged);
      }
      break;
  }
  throw new DecodeError(
    `The failed event data contains an invalid "${String(tag)}" value.`,
  );
};

const fromEntries = (value: Record<string, unknown>) => {
  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    setProperty(result, key, fromJson(item));
  }
  return result;
};

// Plain assignment of a "__proto__" key would replace the prototype.
const setProperty = <T>(
  target: Record<string, T>,
  key: string,
  value: T,
): void => {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
