import type { SchemaCatalog } from '../catalog.js';

/**
 * Represents a single non-fatal finding recorded while populating a payload.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when a namespace or type cannot be found in any reachable document.
 */
export class MissingSchemaError extends Error {
  public readonly schemaName: string;
  /** Document the lookup started from, when there was one. */
  public readonly fileName?: string;

  constructor(schemaName: string, fileName?: string) {
    super(
      fileName
        ? `Schema for "${schemaName}" not found (searched from ${fileName})`
        : `Schema for "${schemaName}" not found in catalog`,
    );
    this.name = 'MissingSchemaError';
    this.schemaName = schemaName;
    this.fileName = fileName;
    Object.setPrototypeOf(this, MissingSchemaError.prototype);
  }
}

/**
 * Thrown when a base-type chain loops back on itself.
 */
export class CircularReferenceError extends Error {
  /** Full type names in chain order; the first name is repeated at the end. */
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular base type reference: ${cycle.join(' -> ')}`);
    this.name = 'CircularReferenceError';
    this.cycle = cycle;
    Object.setPrototypeOf(this, CircularReferenceError.prototype);
  }
}

/**
 * Thrown when a single CSDL document cannot be parsed.
 */
export class CsdlParseError extends Error {
  public readonly fileName: string;

  constructor(fileName: string, message: string, cause?: unknown) {
    super(`${fileName}: ${message}`, { cause });
    this.name = 'CsdlParseError';
    this.fileName = fileName;
    Object.setPrototypeOf(this, CsdlParseError.prototype);
  }
}

/**
 * Why one document was left out of a catalog.
 */
export interface DocumentFailure {
  fileName: string;
  message: string;
  error: unknown;
}

/**
 * Thrown when the schema directory cannot be read, or when one or more
 * documents in it failed to parse. In the latter case `catalog` holds
 * whatever was built from the documents that did parse.
 */
export class CatalogLoadError extends Error {
  public readonly details: DocumentFailure[];
  public readonly catalog?: SchemaCatalog;

  constructor(message: string, details: DocumentFailure[], catalog?: SchemaCatalog, cause?: unknown) {
    const summary = details.map((d) => `  [${d.fileName}] ${d.message}`).join('\n');
    super(summary ? `${message}\n${summary}` : message, { cause });
    this.name = 'CatalogLoadError';
    this.details = details;
    this.catalog = catalog;
    Object.setPrototypeOf(this, CatalogLoadError.prototype);
  }
}

/**
 * Thrown under strict checking when a payload value does not fit the
 * declared type of its property.
 */
export class PropertyCoercionError extends Error {
  /** Property path, e.g. `Status.Health` or `Members[2]`. */
  public readonly property: string;
  public readonly expectedKind: string;
  public readonly actualValue: unknown;
  public readonly actualKind: string;

  constructor(
    property: string,
    expectedKind: string,
    actualValue: unknown,
    actualKind: string,
    reason?: string,
  ) {
    const detail = reason ? ` (${reason})` : '';
    super(`Property "${property}" expected ${expectedKind} but got ${actualKind}${detail}`);
    this.name = 'PropertyCoercionError';
    this.property = property;
    this.expectedKind = expectedKind;
    this.actualValue = actualValue;
    this.actualKind = actualKind;
    Object.setPrototypeOf(this, PropertyCoercionError.prototype);
  }
}
