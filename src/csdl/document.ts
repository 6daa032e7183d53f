import type { SchemaCatalog } from '../catalog.js';
import { splitQualifiedName } from '../utils.js';
import { MissingSchemaError } from '../validation/errors.js';
import { parseCsdl } from './parser.js';
import { RedfishType } from './redfish-type.js';
import type { NamespaceDef, ParsedDocument, ReferenceDef } from './types.js';
import { parseNamespaceName, rankNamespaces, selectNamespace } from './version.js';
import type { NamespaceName } from './version.js';

/**
 * Where a reference name led: the namespace chosen for it and the document
 * expected to declare that namespace.
 */
export interface ReferenceTarget {
  /** Namespace chosen for the reference, after alias and version fallback. */
  namespace: string;
  /** File the namespace is included from; absent for local and well-known targets. */
  fileName?: string;
  uri?: string;
  alias?: string;
  /** Declared by this document itself. */
  local: boolean;
  /** Resolved only because the namespace is always available. */
  wellKnown: boolean;
}

interface ReferenceCandidate extends NamespaceName {
  target: ReferenceTarget;
}

/**
 * One CSDL document inside a catalog. Resolves reference names and type
 * names as seen from this document.
 */
export class SchemaDoc {
  readonly fileName: string;
  readonly namespaces: ReadonlyMap<string, NamespaceDef>;
  readonly references: readonly ReferenceDef[];
  readonly diagnostics: readonly string[];
  readonly catalog: SchemaCatalog;

  private readonly candidates: ReferenceCandidate[] = [];
  private readonly aliases = new Map<string, string>();
  private readonly referenceCache = new Map<string, ReferenceTarget>();

  constructor(document: ParsedDocument, catalog: SchemaCatalog) {
    this.fileName = document.fileName;
    this.namespaces = document.namespaces;
    this.references = document.references;
    this.diagnostics = document.diagnostics;
    this.catalog = catalog;

    // Local namespaces first so they win over an include of the same name.
    for (const namespace of document.namespaces.values()) {
      this.candidates.push({
        name: namespace.name,
        base: namespace.base,
        version: namespace.version,
        target: { namespace: namespace.name, alias: namespace.alias, local: true, wellKnown: false },
      });
      if (namespace.alias) this.aliases.set(namespace.alias, namespace.name);
    }
    for (const reference of document.references) {
      for (const include of reference.includes) {
        this.candidates.push({
          ...parseNamespaceName(include.namespace),
          target: {
            namespace: include.namespace,
            fileName: reference.fileName,
            uri: reference.uri,
            alias: include.alias,
            local: false,
            wellKnown: false,
          },
        });
        if (include.alias) this.aliases.set(include.alias, include.namespace);
      }
    }
  }

  /**
   * Parses `text` and wraps it as a document of `catalog`. The document is
   * not added to the catalog.
   */
  static fromText(text: string, catalog: SchemaCatalog, fileName: string): SchemaDoc {
    return new SchemaDoc(parseCsdl(text, fileName), catalog);
  }

  /** True when this document declares any version of the namespace `base`. */
  declaresBase(base: string): boolean {
    for (const namespace of this.namespaces.values()) {
      if (namespace.base === base) return true;
    }
    return false;
  }

  /**
   * Resolves a reference name (`ExampleResource`, `ExampleResource.v1_0_1`,
   * an include alias, or a well-known namespace) to the namespace standing in
   * for it. Exact matches win, then the newest declared version not above the
   * requested one, then the unversioned namespace.
   *
   * @throws `MissingSchemaError` if no declared or well-known namespace fits.
   */
  getReference(referenceName: string): ReferenceTarget {
    const cached = this.referenceCache.get(referenceName);
    if (cached) return cached;

    const expanded = this.expandAlias(referenceName);
    const candidate = selectNamespace(expanded, this.candidates);
    let target: ReferenceTarget;
    if (candidate) {
      target = candidate.target;
    } else if (this.catalog.isWellKnown(expanded)) {
      target = { namespace: expanded, local: false, wellKnown: true };
    } else {
      throw new MissingSchemaError(referenceName, this.fileName);
    }

    this.referenceCache.set(referenceName, target);
    return target;
  }

  /**
   * Resolves a qualified type name as seen from this document, following
   * references into other documents of the catalog. An already resolved type
   * is returned as is.
   *
   * @throws `MissingSchemaError` if no reachable document declares the type.
   * @throws `CircularReferenceError` if the type's base-type chain loops.
   */
  getTypeInSchemaDoc(typeName: string | RedfishType): RedfishType {
    if (typeName instanceof RedfishType) return typeName;
    return this.findType(typeName, new Set<string>());
  }

  private findType(typeName: string, visited: Set<string>): RedfishType {
    const { namespace, name } = splitQualifiedName(typeName);
    if (!namespace) throw new MissingSchemaError(typeName, this.fileName);

    for (const local of rankNamespaces(this.expandAlias(namespace), this.namespaces.values())) {
      const definition = local.types.get(name);
      if (definition) return this.catalog.materializeType(this, local, definition);
    }

    visited.add(this.fileName);
    const target = this.getReference(namespace);
    if (target.local) throw new MissingSchemaError(typeName, this.fileName);

    const document = this.catalog.getDocumentForReference(target);
    if (visited.has(document.fileName)) throw new MissingSchemaError(typeName, this.fileName);
    return document.findType(`${target.namespace}.${name}`, visited);
  }

  private expandAlias(name: string): string {
    for (const [alias, namespace] of this.aliases) {
      if (name === alias) return namespace;
      if (name.startsWith(`${alias}.`)) return `${namespace}${name.slice(alias.length)}`;
    }
    return name;
  }
}
