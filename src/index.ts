export { SchemaCatalog, DEFAULT_WELL_KNOWN_NAMESPACES } from './catalog.js';
export type { CatalogOptions, DocumentSource } from './catalog.js';

export { SchemaDoc } from './csdl/document.js';
export type { ReferenceTarget } from './csdl/document.js';
export { parseCsdl, parseCsdlFile } from './csdl/parser.js';
export { RedfishType } from './csdl/redfish-type.js';
export type { ResolvedProperty } from './csdl/redfish-type.js';
export type {
  ActionDef,
  AnnotationDef,
  NamespaceDef,
  ParsedDocument,
  PropertyDef,
  ReferenceDef,
  TypeDef,
  TypeKind,
} from './csdl/types.js';
export { compareVersions, formatVersion, parseNamespaceName, parseVersion } from './csdl/version.js';
export type { NamespaceName, SchemaVersion } from './csdl/version.js';

export { RedfishProperty } from './validation/property.js';
export type { PropertyOptions, ValueState } from './validation/property.js';
export { RedfishObject, RedfishCollection } from './validation/object.js';
export type { RedfishElement, RedfishEntry, RedfishObjectOptions } from './validation/object.js';
export { edmKind } from './validation/primitives.js';
export type { PrimitiveKind } from './validation/primitives.js';

export {
  CatalogLoadError,
  CircularReferenceError,
  CsdlParseError,
  MissingSchemaError,
  PropertyCoercionError,
} from './validation/errors.js';
export type { DocumentFailure, ValidationIssue } from './validation/errors.js';

export { matchKey, similarity, DEFAULT_MIN_SIMILARITY } from './utils.js';
export { createLogger, silentLogger } from './logger.js';
export type { LogLevel, Logger, LoggerConfig } from './logger.js';
export { REDFISH_ABSENT } from './types.js';
export type { Absent, JsonObject, JsonValue, PayloadInput } from './types.js';
