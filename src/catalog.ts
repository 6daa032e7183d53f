import { readdir } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { SchemaDoc } from './csdl/document.js';
import type { ReferenceTarget } from './csdl/document.js';
import { parseCsdlFile, parseCsdl } from './csdl/parser.js';
import { RedfishType } from './csdl/redfish-type.js';
import type { NamespaceDef, ParsedDocument, TypeDef } from './csdl/types.js';
import { parseNamespaceName, selectNamespace } from './csdl/version.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { DEFAULT_MIN_SIMILARITY, splitQualifiedName } from './utils.js';
import {
  CatalogLoadError,
  CircularReferenceError,
  MissingSchemaError,
} from './validation/errors.js';
import type { DocumentFailure } from './validation/errors.js';

/**
 * Options for `SchemaCatalog.load` and `SchemaCatalog.fromDocuments`.
 */
export interface CatalogOptions {
  /**
   * File extensions read from the schema directory.
   * @default ['.xml']
   */
  extensions?: string[];
  /**
   * When `true`, documents that fail to parse are listed on
   * `catalog.failures` instead of raising `CatalogLoadError`.
   * @default false
   */
  allowInvalidDocuments?: boolean;
  /**
   * Namespace bases that always resolve, whether or not a document declares
   * or references them.
   * @default ['Redfish', 'RedfishExtension']
   */
  wellKnownNamespaces?: string[];
  /**
   * Receives load diagnostics and similarity-based key matches.
   * Defaults to a stderr logger at `warn`.
   */
  logger?: Logger;
  /**
   * Minimum similarity (0..1) for a payload key to be matched to a declared
   * property whose exact name is missing.
   * @default 0.8
   */
  minSimilarity?: number;
}

/** A document handed over as text, e.g. by a transport that fetched it. */
export interface DocumentSource {
  fileName: string;
  text: string;
}

export const DEFAULT_WELL_KNOWN_NAMESPACES = ['Redfish', 'RedfishExtension'];

interface NamespaceEntry {
  name: string;
  base: string;
  version?: NamespaceDef['version'];
  namespace: NamespaceDef;
  document: SchemaDoc;
}

interface ResolvedOptions {
  allowInvalidDocuments: boolean;
  wellKnownNamespaces: string[];
  logger: Logger;
  minSimilarity: number;
}

function resolveOptions(options: CatalogOptions): ResolvedOptions {
  const {
    allowInvalidDocuments = false,
    wellKnownNamespaces = DEFAULT_WELL_KNOWN_NAMESPACES,
    logger = createLogger({ name: 'csdl-catalog' }),
    minSimilarity = DEFAULT_MIN_SIMILARITY,
  } = options;
  return { allowInvalidDocuments, wellKnownNamespaces, logger, minSimilarity };
}

function describeFailure(fileName: string, error: unknown): DocumentFailure {
  return { fileName, message: error instanceof Error ? error.message : String(error), error };
}

function builtInDocument(base: string): ParsedDocument {
  const fileName = `${base} (built-in)`;
  const namespace: NamespaceDef = {
    ...parseNamespaceName(base),
    fileName,
    types: new Map<string, TypeDef>(),
    actions: [],
  };
  return { fileName, namespaces: new Map([[base, namespace]]), references: [], diagnostics: [] };
}

/**
 * An immutable set of CSDL documents indexed by file name and namespace,
 * with a cache of resolved types.
 *
 * Build it once with `load` or `fromDocuments`, then query it. Resolution
 * fills the caches lazily; it is pure, so the order of queries never
 * changes an answer.
 *
 * @example
 * ```typescript
 * const catalog = await SchemaCatalog.load('./schemas');
 * const type = catalog.getTypeInCatalog('ExampleResource.v1_0_0.ExampleResource');
 * const object = new RedfishObject(type).populate(payload);
 * ```
 */
export class SchemaCatalog {
  readonly logger: Logger;
  readonly minSimilarity: number;
  readonly wellKnownNamespaces: readonly string[];
  /** Documents that were left out, with the reason. */
  readonly failures: readonly DocumentFailure[];

  private readonly documentsByFile = new Map<string, SchemaDoc>();
  private readonly namespacesByName = new Map<string, NamespaceEntry>();
  private readonly namespacesByBase = new Map<string, NamespaceEntry[]>();
  // Canonical full name -> resolved type, for the catalog's own documents.
  private readonly types = new Map<string, RedfishType>();
  // Same, per document built outside the catalog (`SchemaDoc.fromText`).
  private readonly detachedTypes = new WeakMap<SchemaDoc, Map<string, RedfishType>>();
  // Name as requested -> resolved type.
  private readonly lookups = new Map<string, RedfishType>();
  // Types whose base chain is being resolved, outermost first.
  private readonly resolving: { document: SchemaDoc; fullName: string }[] = [];

  private constructor(documents: ParsedDocument[], failures: DocumentFailure[], options: ResolvedOptions) {
    this.logger = options.logger;
    this.minSimilarity = options.minSimilarity;
    this.wellKnownNamespaces = options.wellKnownNamespaces;
    this.failures = failures;

    for (const parsed of documents) {
      this.addDocument(parsed);
    }
    for (const base of options.wellKnownNamespaces) {
      if (!this.namespacesByBase.has(base)) this.addDocument(builtInDocument(base));
    }
  }

  /**
   * Reads and parses every schema document in a directory.
   *
   * @throws `CatalogLoadError` if the directory cannot be read, or if any
   *   document fails to parse and `allowInvalidDocuments` is not set. The
   *   error then carries the catalog built from the other documents.
   */
  static async load(directoryPath: string, options: CatalogOptions = {}): Promise<SchemaCatalog> {
    const { extensions = ['.xml'] } = options;
    const resolved = resolveOptions(options);
    const directory = resolve(directoryPath);

    let entries: string[];
    try {
      const dirents = await readdir(directory, { withFileTypes: true });
      entries = dirents
        .filter((d) => d.isFile() && extensions.includes(extname(d.name).toLowerCase()))
        .map((d) => d.name)
        .sort();
    } catch (err) {
      throw new CatalogLoadError(`Cannot read schema directory: ${directory}`, [], undefined, err);
    }

    const results = await Promise.allSettled(entries.map((name) => parseCsdlFile(resolve(directory, name))));
    const documents: ParsedDocument[] = [];
    const failures: DocumentFailure[] = [];
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        documents.push(result.value);
      } else {
        failures.push(describeFailure(entries[i], result.reason));
      }
    });

    resolved.logger.debug('Read schema directory', { directory, documents: entries.length });
    return SchemaCatalog.build(documents, failures, resolved);
  }

  /**
   * Builds a catalog from document texts already in memory.
   *
   * @throws `CatalogLoadError` as `load` does for documents that fail to parse.
   */
  static fromDocuments(sources: DocumentSource[], options: CatalogOptions = {}): SchemaCatalog {
    const resolved = resolveOptions(options);
    const documents: ParsedDocument[] = [];
    const failures: DocumentFailure[] = [];
    for (const source of sources) {
      try {
        documents.push(parseCsdl(source.text, source.fileName));
      } catch (err) {
        failures.push(describeFailure(source.fileName, err));
      }
    }
    return SchemaCatalog.build(documents, failures, resolved);
  }

  private static build(
    documents: ParsedDocument[],
    failures: DocumentFailure[],
    options: ResolvedOptions,
  ): SchemaCatalog {
    const catalog = new SchemaCatalog(documents, failures, options);
    for (const failure of failures) {
      options.logger.warn('Schema document failed to load', {
        fileName: failure.fileName,
        reason: failure.message,
      });
    }
    if (failures.length > 0 && !options.allowInvalidDocuments) {
      throw new CatalogLoadError(`${failures.length} schema document(s) failed to load`, failures, catalog);
    }
    return catalog;
  }

  private addDocument(parsed: ParsedDocument): void {
    if (this.documentsByFile.has(parsed.fileName)) {
      this.logger.warn('Duplicate schema file name; the later document is ignored', {
        fileName: parsed.fileName,
      });
      return;
    }
    const diagnostics = [...parsed.diagnostics];
    const document = new SchemaDoc({ ...parsed, diagnostics }, this);
    this.documentsByFile.set(parsed.fileName, document);

    for (const namespace of parsed.namespaces.values()) {
      const existing = this.namespacesByName.get(namespace.name);
      if (existing) {
        const message = `Namespace ${namespace.name} is already declared by ${existing.document.fileName}`;
        diagnostics.push(message);
        this.logger.warn(message, { fileName: parsed.fileName });
        continue;
      }
      const entry: NamespaceEntry = {
        name: namespace.name,
        base: namespace.base,
        version: namespace.version,
        namespace,
        document,
      };
      this.namespacesByName.set(namespace.name, entry);
      const sameBase = this.namespacesByBase.get(namespace.base) ?? [];
      sameBase.push(entry);
      this.namespacesByBase.set(namespace.base, sameBase);
    }

    this.logger.debug('Loaded schema document', {
      fileName: parsed.fileName,
      namespaces: [...parsed.namespaces.keys()],
    });
  }

  get documents(): SchemaDoc[] {
    return [...this.documentsByFile.values()];
  }

  /** Every indexed namespace name, well-known built-ins included. */
  namespaces(): string[] {
    return [...this.namespacesByName.keys()];
  }

  isWellKnown(namespace: string): boolean {
    return this.wellKnownNamespaces.includes(parseNamespaceName(namespace).base);
  }

  getSchemaDocByFile(fileName: string): SchemaDoc | undefined {
    return this.documentsByFile.get(fileName);
  }

  /**
   * Finds the document declaring the namespace of a namespace or type name
   * (`Example`, `Example.v1_0_0`, `Example.v1_0_0.Example`), with version
   * fallback.
   *
   * @throws `MissingSchemaError` if no indexed namespace fits.
   */
  getSchemaDocByClass(qualifiedOrBareName: string): SchemaDoc {
    return this.findNamespace(qualifiedOrBareName).document;
  }

  /**
   * Same lookup as `getSchemaDocByClass`, returning the namespace record.
   */
  getSchemaInCatalog(qualifiedNamespaceOrType: string): NamespaceDef {
    return this.findNamespace(qualifiedNamespaceOrType).namespace;
  }

  /**
   * Resolves a qualified type name to its merged definition. Repeated calls
   * with the same name return the same instance; a resolved type is
   * returned as is.
   *
   * @throws `MissingSchemaError` if the type cannot be found.
   * @throws `CircularReferenceError` if its base-type chain loops.
   */
  getTypeInCatalog(qualifiedTypeName: string | RedfishType): RedfishType {
    if (qualifiedTypeName instanceof RedfishType) return qualifiedTypeName;
    const cached = this.lookups.get(qualifiedTypeName);
    if (cached) return cached;

    const document = this.getSchemaDocByClass(qualifiedTypeName);
    const type = document.getTypeInSchemaDoc(qualifiedTypeName);
    this.lookups.set(qualifiedTypeName, type);
    return type;
  }

  /**
   * Finds the document a reference points at: the referenced file when the
   * catalog holds it and it declares the namespace, otherwise whichever
   * document declares the namespace.
   */
  getDocumentForReference(target: ReferenceTarget): SchemaDoc {
    if (target.fileName) {
      const document = this.documentsByFile.get(target.fileName);
      if (document?.declaresBase(parseNamespaceName(target.namespace).base)) return document;
    }
    return this.getSchemaDocByClass(target.namespace);
  }

  /**
   * Returns the cached resolved type for a definition found in `document`,
   * creating it (and its base chain) on first use.
   *
   * @internal Called by `SchemaDoc` once it has located a definition.
   */
  materializeType(document: SchemaDoc, namespace: NamespaceDef, definition: TypeDef): RedfishType {
    const fullName = `${namespace.name}.${definition.name}`;
    const cache = this.typeCacheFor(document);
    const cached = cache.get(fullName);
    if (cached) return cached;

    const start = this.resolving.findIndex((r) => r.document === document && r.fullName === fullName);
    if (start >= 0) {
      throw new CircularReferenceError([...this.resolving.slice(start).map((r) => r.fullName), fullName]);
    }

    this.resolving.push({ document, fullName });
    try {
      const baseType = definition.baseType ? document.getTypeInSchemaDoc(definition.baseType) : undefined;
      const type = new RedfishType(document, namespace, definition, baseType);
      cache.set(fullName, type);
      return type;
    } finally {
      this.resolving.pop();
    }
  }

  // A detached document may redeclare a namespace of the catalog; its types
  // must never stand in for the catalog's.
  private typeCacheFor(document: SchemaDoc): Map<string, RedfishType> {
    if (this.documentsByFile.get(document.fileName) === document) return this.types;
    let cache = this.detachedTypes.get(document);
    if (!cache) {
      cache = new Map<string, RedfishType>();
      this.detachedTypes.set(document, cache);
    }
    return cache;
  }

  private findNamespace(name: string): NamespaceEntry {
    const { namespace } = splitQualifiedName(name);
    // The whole name may be a namespace; failing that, drop the type segment.
    for (const candidate of namespace ? [name, namespace] : [name]) {
      const sameBase = this.namespacesByBase.get(parseNamespaceName(candidate).base) ?? [];
      const entry = selectNamespace(candidate, sameBase);
      if (entry) return entry;
    }
    throw new MissingSchemaError(name);
  }
}
