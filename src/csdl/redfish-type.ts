import type { SchemaDoc } from './document.js';
import type { ActionDef, AnnotationDef, NamespaceDef, PropertyDef, TypeDef, TypeKind } from './types.js';

/**
 * A property as seen on a resolved type, remembering which type in the
 * inheritance chain declared it. Its `type` is resolved from that type's
 * document, not from the document of the type it was inherited into.
 */
export interface ResolvedProperty extends PropertyDef {
  declaredBy: RedfishType;
}

/**
 * A type definition resolved against its catalog: base type linked and the
 * full property set merged along the inheritance chain.
 *
 * Instances are created and cached by the catalog; there is one per
 * canonical full name.
 */
export class RedfishType {
  /** `Namespace.TypeName` of the namespace that actually declares the type. */
  readonly fullName: string;
  readonly namespace: string;
  readonly name: string;
  readonly kind: TypeKind;
  readonly definition: TypeDef;
  readonly owner: SchemaDoc;
  readonly baseType?: RedfishType;
  readonly properties: ReadonlyMap<string, ResolvedProperty>;
  readonly actions: ReadonlyMap<string, ActionDef>;

  constructor(owner: SchemaDoc, namespace: NamespaceDef, definition: TypeDef, baseType?: RedfishType) {
    this.owner = owner;
    this.namespace = namespace.name;
    this.name = definition.name;
    this.fullName = `${namespace.name}.${definition.name}`;
    this.kind = definition.kind;
    this.definition = definition;
    this.baseType = baseType;

    // Base type properties come first; a redeclaration replaces the inherited one.
    const properties = new Map<string, ResolvedProperty>(baseType?.properties ?? []);
    for (const property of definition.properties) {
      properties.set(property.name, { ...property, declaredBy: this });
    }
    this.properties = properties;

    // Actions are usually declared in the unversioned namespace and bound to a
    // versioned type, so every namespace of the document is searched.
    const actions = new Map<string, ActionDef>(baseType?.actions ?? []);
    for (const declaring of owner.namespaces.values()) {
      for (const action of declaring.actions) {
        if (action.bindingType === this.fullName) actions.set(action.name, action);
      }
    }
    this.actions = actions;
  }

  get isAbstract(): boolean {
    return this.definition.abstract;
  }

  /** Open types (`OpenType="true"`) accept properties they do not declare. */
  get isOpen(): boolean {
    return this.definition.openType || (this.baseType?.isOpen ?? false);
  }

  get annotations(): AnnotationDef[] {
    return this.definition.annotations;
  }

  getProperty(name: string): ResolvedProperty | undefined {
    return this.properties.get(name);
  }

  /** Full names from this type up to the root of its inheritance chain. */
  lineage(): string[] {
    const names: string[] = [];
    for (let t: RedfishType | undefined = this; t; t = t.baseType) {
      names.push(t.fullName);
    }
    return names;
  }

  /**
   * True when `other` is this type or one of its ancestors.
   */
  isA(other: RedfishType | string): boolean {
    const name = typeof other === 'string' ? other : other.fullName;
    return this.lineage().includes(name);
  }

  toString(): string {
    return this.fullName;
  }
}
