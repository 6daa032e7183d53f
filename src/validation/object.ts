import type { RedfishType, ResolvedProperty } from '../csdl/redfish-type.js';
import { REDFISH_ABSENT, describeKind, toPayloadValue } from '../types.js';
import type { JsonObject, JsonValue, PayloadInput } from '../types.js';
import { matchKey } from '../utils.js';
import { MissingSchemaError, PropertyCoercionError } from './errors.js';
import type { ValidationIssue } from './errors.js';
import { isEdmType } from './primitives.js';
import { RedfishProperty } from './property.js';
import type { ValueState } from './property.js';

/** A single (non-collection) entry of a populated object. */
export type RedfishElement = RedfishProperty | RedfishObject;

/** Any entry of a populated object. */
export type RedfishEntry = RedfishElement | RedfishCollection;

export interface RedfishObjectOptions {
  /**
   * Path of this object inside its parent; prefixes the paths of its
   * properties in issues and errors.
   * @default ''
   */
  name?: string;
  /**
   * Whether an explicit null is acceptable under strict checking.
   * @default true
   */
  nullable?: boolean;
  /**
   * Minimum similarity for matching a payload key to a declared property.
   * @default the catalog's `minSimilarity`
   */
  minSimilarity?: number;
}

export type ObjectContents =
  | { state: 'absent' }
  | { state: 'null' }
  | { state: 'invalid'; raw: JsonValue; issue: ValidationIssue }
  | {
      state: 'value';
      type: RedfishType;
      properties: Map<string, RedfishEntry>;
      annotations: JsonObject;
      additionalProperties: JsonObject;
      unknownKeys: string[];
      matchedKeys: Map<string, string>;
      issues: ValidationIssue[];
    };

function childPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}

// ---------------------------------------------------------------------------
// Entry factories
// ---------------------------------------------------------------------------

/**
 * Returns a factory for unpopulated (absent) elements of a property's type.
 * The type is resolved once, from the document of the type declaring the
 * property.
 */
function elementFactory(property: ResolvedProperty, minSimilarity: number): (path: string) => RedfishElement {
  const { nullable, annotations } = property;
  if (isEdmType(property.type)) {
    return (path) => new RedfishProperty(property.type, { name: path, nullable, annotations });
  }
  const type = property.declaredBy.owner.getTypeInSchemaDoc(property.type);
  if (type.kind === 'ComplexType') {
    return (path) => new RedfishObject(type, { name: path, nullable, minSimilarity }, { state: 'absent' });
  }
  return (path) => new RedfishProperty(type, { name: path, nullable, annotations });
}

function createEntry(property: ResolvedProperty, parentPath: string, minSimilarity: number): RedfishEntry {
  const path = childPath(parentPath, property.name);
  const create = elementFactory(property, minSimilarity);
  if (property.isCollection) {
    return new RedfishCollection(path, property.nullable, (index) => create(`${path}[${index}]`));
  }
  return create(path);
}

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

type CollectionContents =
  | { state: 'absent' }
  | { state: 'null' }
  | { state: 'invalid'; raw: JsonValue; issue: ValidationIssue }
  | { state: 'value'; items: RedfishElement[] };

/**
 * A `Collection(...)` property; each element is populated on its own.
 */
export class RedfishCollection {
  readonly name: string;
  readonly nullable: boolean;

  private readonly createItem: (index: number) => RedfishElement;
  private readonly contents: CollectionContents;

  constructor(
    name: string,
    nullable: boolean,
    createItem: (index: number) => RedfishElement,
    contents: CollectionContents = { state: 'absent' },
  ) {
    this.name = name;
    this.nullable = nullable;
    this.createItem = createItem;
    this.contents = contents;
  }

  get state(): ValueState {
    return this.contents.state;
  }

  get items(): RedfishElement[] {
    return this.contents.state === 'value' ? [...this.contents.items] : [];
  }

  get issues(): ValidationIssue[] {
    if (this.contents.state === 'invalid') return [this.contents.issue];
    return this.items.flatMap((item) => item.issues);
  }

  /**
   * @throws `PropertyCoercionError` if `check` is set and the value is not an
   *   array, or an element does not fit.
   */
  populate(value: PayloadInput, check = false): RedfishCollection {
    const payload = toPayloadValue(value);
    switch (payload.kind) {
      case 'absent':
        return this.withContents({ state: 'absent' });
      case 'null':
        if (check && !this.nullable) {
          throw new PropertyCoercionError(this.name, 'Collection', null, 'null', 'property is not nullable');
        }
        return this.withContents({ state: 'null' });
      case 'primitive':
      case 'object': {
        const raw = payload.value;
        if (check) throw new PropertyCoercionError(this.name, 'Collection', raw, describeKind(raw), 'expected an array');
        return this.withContents({
          state: 'invalid',
          raw,
          issue: { path: this.name, message: `Expected an array but got ${describeKind(raw)}` },
        });
      }
      case 'array':
        return this.withContents({
          state: 'value',
          items: payload.value.map((item, i) => this.createItem(i).populate(item, check)),
        });
    }
  }

  asJson(): JsonValue | undefined {
    switch (this.contents.state) {
      case 'absent':
        return undefined;
      case 'null':
        return null;
      case 'invalid':
        return this.contents.raw;
      case 'value':
        return this.contents.items.map((item) => item.asJson() ?? null);
    }
  }

  getLinks(): Set<string> {
    const links = new Set<string>();
    for (const item of this.items) {
      for (const link of item.getLinks()) links.add(link);
    }
    return links;
  }

  private withContents(contents: CollectionContents): RedfishCollection {
    return new RedfishCollection(this.name, this.nullable, this.createItem, contents);
  }
}

// ---------------------------------------------------------------------------
// Objects
// ---------------------------------------------------------------------------

/**
 * An entity or complex type paired with a payload object: one entry per
 * declared property (own and inherited).
 *
 * `new RedfishObject(type)` is the schema skeleton: every property absent.
 * `populate` returns a new object and never changes this one.
 *
 * @example
 * ```typescript
 * const type = catalog.getTypeInCatalog('ExampleResource.v1_0_0.ExampleResource');
 * const object = new RedfishObject(type).populate(payload);
 * object.asJson();   // payload values, absent properties omitted
 * object.getLinks(); // Set of @odata.id URIs found in navigation properties
 * ```
 */
export class RedfishObject {
  /** Type the object was declared with; `type` may be a derived one named by `@odata.type`. */
  readonly declaredType: RedfishType;
  readonly name: string;
  readonly nullable: boolean;

  private readonly options: RedfishObjectOptions;
  private readonly contents: ObjectContents;

  constructor(type: RedfishType, options: RedfishObjectOptions = {}, contents?: ObjectContents) {
    this.declaredType = type;
    this.options = options;
    this.name = options.name ?? '';
    this.nullable = options.nullable ?? true;
    this.contents = contents ?? this.skeleton();
  }

  get state(): ValueState {
    return this.contents.state;
  }

  /** Type the properties were populated against. */
  get type(): RedfishType {
    return this.contents.state === 'value' ? this.contents.type : this.declaredType;
  }

  get properties(): ReadonlyMap<string, RedfishEntry> {
    return this.contents.state === 'value' ? this.contents.properties : new Map<string, RedfishEntry>();
  }

  /** Payload keys containing `@` (`@odata.id`, `Members@odata.count`, ...) or naming an action (`#Example.Reset`), as received. */
  get annotations(): JsonObject {
    return this.contents.state === 'value' ? { ...this.contents.annotations } : {};
  }

  /** Undeclared keys kept because the type is open. */
  get additionalProperties(): JsonObject {
    return this.contents.state === 'value' ? { ...this.contents.additionalProperties } : {};
  }

  /** Undeclared keys of a closed type; they are not part of `asJson()`. */
  get unknownKeys(): string[] {
    return this.contents.state === 'value' ? [...this.contents.unknownKeys] : [];
  }

  /** Declared name -> payload key, for properties found by similarity rather than verbatim. */
  get matchedKeys(): ReadonlyMap<string, string> {
    return this.contents.state === 'value' ? this.contents.matchedKeys : new Map<string, string>();
  }

  /** Issues of this object and everything below it. */
  get issues(): ValidationIssue[] {
    switch (this.contents.state) {
      case 'absent':
      case 'null':
        return [];
      case 'invalid':
        return [this.contents.issue];
      case 'value': {
        const nested = [...this.contents.properties.values()].flatMap((entry) => entry.issues);
        return [...this.contents.issues, ...nested];
      }
    }
  }

  get(name: string): RedfishEntry | undefined {
    return this.properties.get(name);
  }

  /**
   * Populates every declared property from `payload`. Missing keys become
   * absent entries; keys are looked up with `matchKey`.
   *
   * @param payload - Payload object, or `REDFISH_ABSENT`.
   * @param check   - Strict checking, passed down to every entry.
   * @throws `PropertyCoercionError` if `check` is set and anything does not fit.
   * @throws `MissingSchemaError` if a property's type cannot be resolved.
   */
  populate(payload: PayloadInput, check = false): RedfishObject {
    const value = toPayloadValue(payload);
    switch (value.kind) {
      case 'absent':
        return this.withContents({ state: 'absent' });
      case 'null':
        if (check && !this.nullable) {
          throw new PropertyCoercionError(this.label(), this.declaredType.fullName, null, 'null', 'property is not nullable');
        }
        return this.withContents({ state: 'null' });
      case 'primitive':
      case 'array': {
        const raw = value.value;
        if (check) {
          throw new PropertyCoercionError(this.label(), this.declaredType.fullName, raw, describeKind(raw), 'expected an object');
        }
        return this.withContents({
          state: 'invalid',
          raw,
          issue: { path: this.label(), message: `Expected ${this.declaredType.fullName} object but got ${describeKind(raw)}` },
        });
      }
      case 'object':
        return this.withContents(this.populateObject(value.value, check));
    }
  }

  /**
   * Plain JSON of the populated tree: annotations, then every non-absent
   * declared property, then additional properties of open types.
   */
  asJson(): JsonValue | undefined {
    switch (this.contents.state) {
      case 'absent':
        return undefined;
      case 'null':
        return null;
      case 'invalid':
        return this.contents.raw;
      case 'value': {
        const out: JsonObject = { ...this.contents.annotations };
        for (const [name, entry] of this.contents.properties) {
          const json = entry.asJson();
          if (json !== undefined) out[name] = json;
        }
        return { ...out, ...this.contents.additionalProperties };
      }
    }
  }

  /** Every resource link found below this object. */
  getLinks(): Set<string> {
    const links = new Set<string>();
    for (const entry of this.properties.values()) {
      for (const link of entry.getLinks()) links.add(link);
    }
    return links;
  }

  private get minSimilarity(): number {
    return this.options.minSimilarity ?? this.declaredType.owner.catalog.minSimilarity;
  }

  private label(): string {
    return this.name || this.declaredType.fullName;
  }

  private withContents(contents: ObjectContents): RedfishObject {
    return new RedfishObject(this.declaredType, this.options, contents);
  }

  private skeleton(): ObjectContents {
    const properties = new Map<string, RedfishEntry>();
    for (const property of this.declaredType.properties.values()) {
      properties.set(property.name, createEntry(property, this.name, this.minSimilarity));
    }
    return {
      state: 'value',
      type: this.declaredType,
      properties,
      annotations: {},
      additionalProperties: {},
      unknownKeys: [],
      matchedKeys: new Map<string, string>(),
      issues: [],
    };
  }

  private populateObject(payload: JsonObject, check: boolean): ObjectContents {
    const issues: ValidationIssue[] = [];
    const type = this.payloadType(payload, check, issues);
    const logger = type.owner.catalog.logger;

    const annotations: JsonObject = {};
    const keys: string[] = [];
    for (const [key, value] of Object.entries(payload)) {
      // `#Namespace.Action` keys advertise bound actions and travel with the annotations.
      if (key.includes('@') || key.startsWith('#')) annotations[key] = value;
      else keys.push(key);
    }

    const assigned = this.assignKeys([...type.properties.keys()], keys);
    const claimed = new Set(assigned.values());
    const matchedKeys = new Map<string, string>();
    const properties = new Map<string, RedfishEntry>();

    for (const property of type.properties.values()) {
      const key = assigned.get(property.name);
      if (key !== undefined && key !== property.name) {
        matchedKeys.set(property.name, key);
        issues.push({
          path: childPath(this.name, property.name),
          message: `Property "${property.name}" read from payload key "${key}"`,
        });
        logger.debug('Matched property by similarity', { type: type.fullName, property: property.name, key });
      }
      const entry = createEntry(property, this.name, this.minSimilarity);
      properties.set(property.name, entry.populate(key !== undefined ? payload[key] : REDFISH_ABSENT, check));
    }

    const additionalProperties: JsonObject = {};
    const unknownKeys: string[] = [];
    for (const key of keys) {
      if (claimed.has(key)) continue;
      if (type.isOpen) additionalProperties[key] = payload[key];
      else unknownKeys.push(key);
    }

    return { state: 'value', type, properties, annotations, additionalProperties, unknownKeys, matchedKeys, issues };
  }

  /**
   * Declared name -> payload key. Verbatim keys are claimed first, then
   * case-insensitive ones, then similar ones, each pass across all
   * properties. The similarity pass never takes a key that equals a declared
   * name ignoring case.
   */
  private assignKeys(declared: string[], keys: string[]): Map<string, string> {
    const assigned = new Map<string, string>();
    const taken = new Set<string>();
    const claim = (name: string, key: string) => {
      assigned.set(name, key);
      taken.add(key);
    };

    for (const name of declared) {
      if (keys.includes(name)) claim(name, name);
    }
    for (const name of declared) {
      if (assigned.has(name)) continue;
      const key = matchKey(name, keys, taken, 1);
      if (key !== name) claim(name, key);
    }

    const declaredLower = new Set(declared.map((name) => name.toLowerCase()));
    const reserved = keys.filter((key) => declaredLower.has(key.toLowerCase()));
    for (const name of declared) {
      if (assigned.has(name)) continue;
      const key = matchKey(name, keys, [...taken, ...reserved], this.minSimilarity);
      if (key !== name && keys.includes(key)) claim(name, key);
    }
    return assigned;
  }

  /**
   * The type named by the payload's `@odata.type`, when it is related to the
   * declared type by inheritance; otherwise the declared type.
   */
  private payloadType(payload: JsonObject, check: boolean, issues: ValidationIssue[]): RedfishType {
    const odataType = payload['@odata.type'];
    if (typeof odataType !== 'string') return this.declaredType;
    const typeName = odataType.startsWith('#') ? odataType.slice(1) : odataType;
    if (typeName === this.declaredType.fullName) return this.declaredType;

    const path = childPath(this.name, '@odata.type');
    let candidate: RedfishType;
    try {
      candidate = this.declaredType.owner.catalog.getTypeInCatalog(typeName);
    } catch (err) {
      if (check || !(err instanceof MissingSchemaError)) throw err;
      issues.push({ path, message: `${typeName} is not in the catalog; populated as ${this.declaredType.fullName}` });
      return this.declaredType;
    }

    if (candidate.isA(this.declaredType) || this.declaredType.isA(candidate)) return candidate;
    if (check) {
      throw new PropertyCoercionError(path, this.declaredType.fullName, odataType, candidate.fullName, 'unrelated type');
    }
    issues.push({ path, message: `${typeName} is unrelated to ${this.declaredType.fullName}; populated as the latter` });
    return this.declaredType;
  }
}
