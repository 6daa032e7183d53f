import type { JsonValue } from '../types.js';

/**
 * Coercion families the EDM primitive types fall into.
 */
export type PrimitiveKind =
  | 'Int'
  | 'Decimal'
  | 'String'
  | 'Guid'
  | 'Boolean'
  | 'DateTimeOffset'
  | 'Date'
  | 'TimeOfDay'
  | 'Duration'
  | 'Primitive';

const EDM_KINDS: Record<string, PrimitiveKind> = {
  'Edm.Int': 'Int',
  'Edm.Int16': 'Int',
  'Edm.Int32': 'Int',
  'Edm.Int64': 'Int',
  'Edm.Byte': 'Int',
  'Edm.SByte': 'Int',
  'Edm.Decimal': 'Decimal',
  'Edm.Double': 'Decimal',
  'Edm.Single': 'Decimal',
  'Edm.String': 'String',
  'Edm.Guid': 'Guid',
  'Edm.Boolean': 'Boolean',
  'Edm.DateTimeOffset': 'DateTimeOffset',
  'Edm.Date': 'Date',
  'Edm.TimeOfDay': 'TimeOfDay',
  'Edm.Duration': 'Duration',
  'Edm.Primitive': 'Primitive',
  'Edm.PrimitiveType': 'Primitive',
};

const GUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DATE_TIME_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;
const DATE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OF_DAY = /^\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const DURATION = /^-?P(?!$)(\d+D)?(T(?=\d)(\d+H)?(\d+M)?(\d+(\.\d+)?S)?)?$/;

const LEXICAL_FORMS: Partial<Record<PrimitiveKind, RegExp>> = {
  Guid: GUID,
  DateTimeOffset: DATE_TIME_OFFSET,
  Date: DATE,
  TimeOfDay: TIME_OF_DAY,
  Duration: DURATION,
};

export function isEdmType(typeName: string): boolean {
  return typeName.startsWith('Edm.');
}

/**
 * Coercion family of an `Edm.*` type. Unlisted EDM types (streams,
 * geography) accept any primitive. `undefined` for non-EDM names.
 */
export function edmKind(typeName: string): PrimitiveKind | undefined {
  if (!isEdmType(typeName)) return undefined;
  return EDM_KINDS[typeName] ?? 'Primitive';
}

export type Coercion =
  | { ok: true; value: string | number | boolean }
  | { ok: false; reason: string };

function fail(reason: string): Coercion {
  return { ok: false, reason };
}

// Decimal notation only: `Number()` would also take hex, binary and padded strings.
const DECIMAL_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function isNumericString(value: string): boolean {
  return DECIMAL_NUMBER.test(value) && Number.isFinite(Number(value));
}

/**
 * Coerces a non-null payload value to a primitive kind.
 *
 * Lenient mode accepts anything the kind can be read from (numeric strings
 * for numbers, any string for lexically constrained kinds, any value for
 * strings). Strict mode additionally demands integral integers, real
 * booleans and the lexical form of GUIDs, dates, times and durations.
 */
export function coercePrimitive(kind: PrimitiveKind, value: JsonValue, strict: boolean): Coercion {
  if (value === null) return fail('null is not a primitive value');

  switch (kind) {
    case 'Int': {
      let n: number | undefined;
      if (typeof value === 'number') n = value;
      else if (typeof value === 'string' && isNumericString(value)) n = Number(value);
      if (n === undefined) return fail('not a number');
      if (strict && !Number.isInteger(n)) return fail('not an integer');
      return { ok: true, value: n };
    }
    case 'Decimal': {
      if (typeof value === 'number') return { ok: true, value };
      if (typeof value === 'string' && isNumericString(value)) return { ok: true, value: Number(value) };
      return fail('not a number');
    }
    case 'String': {
      if (typeof value === 'string') return { ok: true, value };
      return { ok: true, value: typeof value === 'object' ? JSON.stringify(value) : String(value) };
    }
    case 'Boolean': {
      if (typeof value === 'boolean') return { ok: true, value };
      if (!strict && (value === 'true' || value === 'false')) return { ok: true, value: value === 'true' };
      return fail('not a boolean');
    }
    case 'Primitive': {
      if (typeof value === 'object') return fail('not a primitive value');
      return { ok: true, value };
    }
    case 'Guid':
    case 'DateTimeOffset':
    case 'Date':
    case 'TimeOfDay':
    case 'Duration': {
      if (typeof value !== 'string') return fail('not a string');
      const form = LEXICAL_FORMS[kind];
      if (strict && form && !form.test(value)) return fail(`not a valid ${kind}`);
      return { ok: true, value };
    }
  }
}
