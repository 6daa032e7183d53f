import type { NamespaceName } from './version.js';

/**
 * A CSDL annotation (`<Annotation Term="Validation.Pattern" String="..."/>`).
 * `value` holds whichever constant attribute the annotation carries.
 */
export interface AnnotationDef {
  term: string;
  value?: string;
}

/**
 * A structural or navigation property (`<Property>` / `<NavigationProperty>`).
 */
export interface PropertyDef {
  name: string;
  /** Qualified type with any `Collection(...)` wrapper removed. */
  type: string;
  isCollection: boolean;
  /** CSDL `Nullable`; defaults to true. */
  nullable: boolean;
  isNavigation: boolean;
  /** Set by the `Redfish.Required` annotation. */
  required: boolean;
  /** `OData.Permissions` member, e.g. `OData.Permission/Read`. */
  permissions?: string;
  annotations: AnnotationDef[];
}

export interface ParameterDef {
  name: string;
  type: string;
  isCollection: boolean;
  nullable: boolean;
}

/**
 * A bound action (`<Action IsBound="true">`). The first parameter names the
 * type the action is bound to.
 */
export interface ActionDef {
  name: string;
  bindingType?: string;
  parameters: ParameterDef[];
}

export type TypeKind = 'EntityType' | 'ComplexType' | 'EnumType' | 'TypeDefinition';

export interface TypeDef {
  name: string;
  kind: TypeKind;
  /** Qualified base type name (`BaseType` attribute). */
  baseType?: string;
  abstract: boolean;
  openType: boolean;
  properties: PropertyDef[];
  /** Member names, for enum types. */
  members: string[];
  /** `UnderlyingType`, for type definitions. */
  underlyingType?: string;
  annotations: AnnotationDef[];
}

/**
 * One `<Schema>` element of a document.
 */
export interface NamespaceDef extends NamespaceName {
  alias?: string;
  /** Document that declares this namespace. */
  fileName: string;
  types: Map<string, TypeDef>;
  actions: ActionDef[];
}

export interface IncludeDef {
  namespace: string;
  alias?: string;
}

/**
 * One `<edmx:Reference>`: the document it points at and the namespaces it
 * makes visible.
 */
export interface ReferenceDef {
  uri: string;
  /** Last path segment of `uri`, used to find the document in a catalog. */
  fileName: string;
  includes: IncludeDef[];
}

/**
 * The parsed form of one CSDL document.
 */
export interface ParsedDocument {
  fileName: string;
  namespaces: Map<string, NamespaceDef>;
  references: ReferenceDef[];
  /** Non-fatal findings noted while parsing and indexing. */
  diagnostics: string[];
}
