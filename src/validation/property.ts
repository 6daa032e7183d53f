import { RedfishType } from '../csdl/redfish-type.js';
import type { AnnotationDef } from '../csdl/types.js';
import { describeKind, toPayloadValue } from '../types.js';
import type { JsonValue, PayloadInput } from '../types.js';
import { MissingSchemaError, PropertyCoercionError } from './errors.js';
import type { ValidationIssue } from './errors.js';
import { coercePrimitive, edmKind } from './primitives.js';
import type { Coercion, PrimitiveKind } from './primitives.js';

/**
 * What a populated entry holds:
 * - `absent`: declared by the schema, missing from the payload;
 * - `null`: explicitly null in the payload;
 * - `value`: present and accepted;
 * - `invalid`: present but not accepted (lenient population only).
 */
export type ValueState = 'absent' | 'null' | 'value' | 'invalid';

export type PropertyContents =
  | { state: 'absent' }
  | { state: 'null' }
  | { state: 'value'; raw: JsonValue; value: string | number | boolean }
  | { state: 'invalid'; raw: JsonValue; issue: ValidationIssue };

type PropertyShape =
  | { kind: 'primitive'; primitive: PrimitiveKind }
  | { kind: 'enum'; members: string[] }
  | { kind: 'reference' };

export interface PropertyOptions {
  /**
   * Property path used in issues and errors.
   * @default the declared type name
   */
  name?: string;
  /**
   * Whether an explicit null is acceptable under strict checking.
   * @default true
   */
  nullable?: boolean;
  /** Property annotations; `Validation.Pattern/Minimum/Maximum` are enforced under strict checking. */
  annotations?: AnnotationDef[];
}

function shapeOf(type: string | RedfishType): PropertyShape {
  if (!(type instanceof RedfishType)) {
    const primitive = edmKind(type);
    if (!primitive) throw new MissingSchemaError(type);
    return { kind: 'primitive', primitive };
  }
  switch (type.kind) {
    case 'EnumType':
      return { kind: 'enum', members: type.definition.members };
    case 'TypeDefinition':
      return { kind: 'primitive', primitive: edmKind(type.definition.underlyingType ?? '') ?? 'Primitive' };
    case 'EntityType':
      return { kind: 'reference' };
    case 'ComplexType':
      throw new TypeError(`${type.fullName} is a complex type; populate it with RedfishObject`);
  }
}

function annotationValue(annotations: readonly AnnotationDef[], term: string): string | undefined {
  return annotations.find((a) => a.term === term)?.value;
}

/**
 * A single scalar, enum or resource-reference value checked against its
 * declared type.
 *
 * Instances are immutable: `populate` returns a new property.
 *
 * @example
 * ```typescript
 * new RedfishProperty('Edm.Int').populate('1', true).value; // 1
 * new RedfishProperty('Edm.Int').populate(1.1, true);       // throws PropertyCoercionError
 * ```
 */
export class RedfishProperty {
  readonly name: string;
  readonly typeName: string;
  readonly nullable: boolean;
  readonly annotations: readonly AnnotationDef[];

  private readonly declared: string | RedfishType;
  private readonly options: PropertyOptions;
  private readonly shape: PropertyShape;
  private readonly contents: PropertyContents;

  constructor(
    type: string | RedfishType,
    options: PropertyOptions = {},
    contents: PropertyContents = { state: 'absent' },
  ) {
    this.declared = type;
    this.options = options;
    this.shape = shapeOf(type);
    this.typeName = typeof type === 'string' ? type : type.fullName;
    this.name = options.name ?? this.typeName;
    this.nullable = options.nullable ?? true;
    // A type definition's own constraints apply to every property using it.
    const inherited = type instanceof RedfishType && type.kind === 'TypeDefinition' ? type.annotations : [];
    this.annotations = [...inherited, ...(options.annotations ?? [])];
    this.contents = contents;
  }

  get kind(): PropertyShape['kind'] {
    return this.shape.kind;
  }

  get state(): ValueState {
    return this.contents.state;
  }

  /** Coerced value; `undefined` when absent, raw payload value when invalid. */
  get value(): JsonValue | undefined {
    switch (this.contents.state) {
      case 'absent':
        return undefined;
      case 'null':
        return null;
      case 'value':
        return this.contents.value;
      case 'invalid':
        return this.contents.raw;
    }
  }

  get issues(): ValidationIssue[] {
    return this.contents.state === 'invalid' ? [this.contents.issue] : [];
  }

  /**
   * Checks `value` against the declared type.
   *
   * @param value - Payload value, or `REDFISH_ABSENT` when the payload omits it.
   * @param check - Strict checking: reject instead of recording an issue.
   * @throws `PropertyCoercionError` if `check` is set and the value does not fit.
   */
  populate(value: PayloadInput, check = false): RedfishProperty {
    const payload = toPayloadValue(value);
    switch (payload.kind) {
      case 'absent':
        return this.withContents({ state: 'absent' });
      case 'null':
        if (check && !this.nullable) {
          throw new PropertyCoercionError(this.name, this.typeName, null, 'null', 'property is not nullable');
        }
        return this.withContents({ state: 'null' });
      case 'primitive':
      case 'object':
      case 'array': {
        const raw = payload.value;
        const result = this.coerce(raw, check);
        if (result.ok) return this.withContents({ state: 'value', raw, value: result.value });
        if (check) {
          throw new PropertyCoercionError(this.name, this.typeName, raw, describeKind(raw), result.reason);
        }
        return this.withContents({
          state: 'invalid',
          raw,
          issue: { path: this.name, message: `Expected ${this.typeName} but got ${describeKind(raw)}: ${result.reason}` },
        });
      }
    }
  }

  /** Payload value as received; `undefined` (omitted) when absent. */
  asJson(): JsonValue | undefined {
    switch (this.contents.state) {
      case 'absent':
        return undefined;
      case 'null':
        return null;
      case 'value':
      case 'invalid':
        return this.contents.raw;
    }
  }

  /** The referenced resource URI, for an accepted resource reference. */
  getLinks(): Set<string> {
    const links = new Set<string>();
    if (this.shape.kind === 'reference' && this.contents.state === 'value' && typeof this.contents.value === 'string') {
      links.add(this.contents.value);
    }
    return links;
  }

  private withContents(contents: PropertyContents): RedfishProperty {
    return new RedfishProperty(this.declared, this.options, contents);
  }

  private coerce(raw: JsonValue, check: boolean): Coercion {
    switch (this.shape.kind) {
      case 'enum': {
        if (typeof raw === 'string' && this.shape.members.includes(raw)) return { ok: true, value: raw };
        return { ok: false, reason: `not one of ${this.shape.members.join(', ')}` };
      }
      case 'reference': {
        if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) {
          const id = raw['@odata.id'];
          if (typeof id === 'string') return { ok: true, value: id };
        }
        return { ok: false, reason: 'not a resource reference with @odata.id' };
      }
      case 'primitive': {
        const result = coercePrimitive(this.shape.primitive, raw, check);
        return result.ok && check ? this.checkConstraints(result.value) : result;
      }
    }
  }

  private checkConstraints(value: string | number | boolean): Coercion {
    const pattern = annotationValue(this.annotations, 'Validation.Pattern');
    if (pattern !== undefined && typeof value === 'string' && !new RegExp(pattern).test(value)) {
      return { ok: false, reason: `does not match pattern ${pattern}` };
    }
    if (typeof value === 'number') {
      const minimum = annotationValue(this.annotations, 'Validation.Minimum');
      if (minimum !== undefined && value < Number(minimum)) {
        return { ok: false, reason: `below minimum ${minimum}` };
      }
      const maximum = annotationValue(this.annotations, 'Validation.Maximum');
      if (maximum !== undefined && value > Number(maximum)) {
        return { ok: false, reason: `above maximum ${maximum}` };
      }
    }
    return { ok: true, value };
  }
}
