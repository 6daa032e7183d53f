// Recursive JSON types.
export type JsonPrimitive = string | number | boolean | null;

// Declared as an interface to break the circular type alias restriction.
export interface JsonObject {
  [key: string]: JsonValue;
}

export interface JsonArray extends Array<JsonValue> {}

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * Marks a property the schema declares but the payload leaves out.
 * Distinct from `null`, which the payload states explicitly.
 */
export const REDFISH_ABSENT: unique symbol = Symbol('REDFISH_ABSENT');
export type Absent = typeof REDFISH_ABSENT;

/** Anything the engines accept as a payload value. */
export type PayloadInput = JsonValue | Absent;

/**
 * Closed classification of a payload value. The property and object engines
 * switch on `kind` instead of probing the raw value.
 */
export type PayloadValue =
  | { kind: 'absent' }
  | { kind: 'null' }
  | { kind: 'primitive'; value: string | number | boolean }
  | { kind: 'object'; value: JsonObject }
  | { kind: 'array'; value: JsonArray };

export function isAbsent(value: PayloadInput): value is Absent {
  return value === REDFISH_ABSENT;
}

export function toPayloadValue(value: PayloadInput): PayloadValue {
  if (value === REDFISH_ABSENT) return { kind: 'absent' };
  if (value === null) return { kind: 'null' };
  if (Array.isArray(value)) return { kind: 'array', value };
  if (typeof value === 'object') return { kind: 'object', value };
  return { kind: 'primitive', value };
}

/**
 * Short description of a payload value's JSON kind, used in diagnostics.
 */
export function describeKind(value: PayloadInput): string {
  const classified = toPayloadValue(value);
  switch (classified.kind) {
    case 'absent':
      return 'absent';
    case 'null':
      return 'null';
    case 'array':
      return 'array';
    case 'object':
      return 'object';
    case 'primitive':
      if (typeof classified.value === 'number') {
        return Number.isInteger(classified.value) ? 'integer' : 'number';
      }
      return typeof classified.value;
  }
}
