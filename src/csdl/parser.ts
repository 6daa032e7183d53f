import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { fileNameFromUri } from '../utils.js';
import { CsdlParseError } from '../validation/errors.js';
import type {
  ActionDef,
  AnnotationDef,
  IncludeDef,
  NamespaceDef,
  ParameterDef,
  ParsedDocument,
  PropertyDef,
  ReferenceDef,
  TypeDef,
  TypeKind,
} from './types.js';
import { parseNamespaceName } from './version.js';

// ---------------------------------------------------------------------------
// Internal raw types (fast-xml-parser output)
// ---------------------------------------------------------------------------

type RawNode = Record<string, unknown>;

// Element names that must always be parsed as arrays. Namespace prefixes
// (edmx:) are stripped by the parser, so bare local names are enough.
const ALWAYS_ARRAY = new Set([
  'Reference',
  'Include',
  'Schema',
  'EntityType',
  'ComplexType',
  'EnumType',
  'TypeDefinition',
  'Action',
  'Parameter',
  'Property',
  'NavigationProperty',
  'Member',
  'Annotation',
]);

const TYPE_KINDS: TypeKind[] = ['EntityType', 'ComplexType', 'EnumType', 'TypeDefinition'];

// Attributes that carry an annotation's constant value, in lookup order.
const ANNOTATION_VALUE_ATTRIBUTES = ['String', 'EnumMember', 'Bool', 'Int', 'Decimal', 'Float'];

const COLLECTION_TYPE = /^Collection\((.+)\)$/;

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * Text handed to the parser is already a decoded JS string, so any other
 * declared encoding is stale and would make the document look malformed.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(
    /(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i,
    '$1 encoding="UTF-8"',
  );
}

function makeParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && ALWAYS_ARRAY.has(name),
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function attr(node: RawNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function boolAttr(node: RawNode, name: string, fallback: boolean): boolean {
  const value = attr(node, name);
  if (value === undefined) return fallback;
  return value.toLowerCase() === 'true';
}

/**
 * fast-xml-parser returns `""` for empty elements such as `<Schema/>`, so
 * children must be read through this guard rather than `?? {}`.
 */
function asObject(value: unknown): RawNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? (value as RawNode)
    : {};
}

function children(node: RawNode, name: string): RawNode[] {
  const value = node[name];
  return Array.isArray(value) ? value.map(asObject) : [];
}

function unwrapCollection(type: string): { type: string; isCollection: boolean } {
  const match = COLLECTION_TYPE.exec(type);
  return match ? { type: match[1], isCollection: true } : { type, isCollection: false };
}

// ---------------------------------------------------------------------------
// Annotation / property parsing
// ---------------------------------------------------------------------------

function parseAnnotation(raw: RawNode): AnnotationDef | undefined {
  const term = attr(raw, 'Term');
  if (!term) return undefined;
  for (const key of ANNOTATION_VALUE_ATTRIBUTES) {
    const value = attr(raw, key);
    if (value !== undefined) return { term, value };
  }
  // Long-form constant: <Annotation Term="..."><String>text</String></Annotation>
  const nested = raw.String;
  if (typeof nested === 'string') return { term, value: nested };
  return { term };
}

function parseAnnotations(raw: RawNode): AnnotationDef[] {
  return children(raw, 'Annotation')
    .map(parseAnnotation)
    .filter((a): a is AnnotationDef => a !== undefined);
}

function parseProperty(raw: RawNode, isNavigation: boolean, where: string): PropertyDef {
  const name = attr(raw, 'Name');
  const rawType = attr(raw, 'Type');
  if (!name || !rawType) {
    throw new Error(`${where}: ${isNavigation ? 'NavigationProperty' : 'Property'} needs Name and Type`);
  }
  const annotations = parseAnnotations(raw);
  const { type, isCollection } = unwrapCollection(rawType);
  return {
    name,
    type,
    isCollection,
    nullable: boolAttr(raw, 'Nullable', true),
    isNavigation,
    required: annotations.some((a) => a.term === 'Redfish.Required'),
    permissions: annotations.find((a) => a.term === 'OData.Permissions')?.value,
    annotations,
  };
}

function parseParameter(raw: RawNode): ParameterDef {
  const { type, isCollection } = unwrapCollection(attr(raw, 'Type') ?? 'Edm.String');
  return {
    name: attr(raw, 'Name') ?? '',
    type,
    isCollection,
    nullable: boolAttr(raw, 'Nullable', true),
  };
}

function parseAction(raw: RawNode): ActionDef | undefined {
  const name = attr(raw, 'Name');
  if (!name) return undefined;
  const parameters = children(raw, 'Parameter').map(parseParameter);
  const bound = boolAttr(raw, 'IsBound', false);
  return {
    name,
    bindingType: bound && parameters.length > 0 ? parameters[0].type : undefined,
    parameters,
  };
}

// ---------------------------------------------------------------------------
// Type parsing
// ---------------------------------------------------------------------------

function parseType(raw: RawNode, kind: TypeKind, where: string): TypeDef | undefined {
  const name = attr(raw, 'Name');
  if (!name) return undefined;
  const location = `${where}.${name}`;
  return {
    name,
    kind,
    baseType: attr(raw, 'BaseType'),
    abstract: boolAttr(raw, 'Abstract', false),
    openType: boolAttr(raw, 'OpenType', false),
    properties: [
      ...children(raw, 'Property').map((p) => parseProperty(p, false, location)),
      ...children(raw, 'NavigationProperty').map((p) => parseProperty(p, true, location)),
    ],
    members: children(raw, 'Member')
      .map((m) => attr(m, 'Name'))
      .filter((m): m is string => m !== undefined),
    underlyingType: attr(raw, 'UnderlyingType'),
    annotations: parseAnnotations(raw),
  };
}

function parseSchema(raw: RawNode, fileName: string, diagnostics: string[]): NamespaceDef | undefined {
  const name = attr(raw, 'Namespace');
  if (!name) {
    diagnostics.push('Schema element without a Namespace attribute was skipped');
    return undefined;
  }

  const types = new Map<string, TypeDef>();
  for (const kind of TYPE_KINDS) {
    for (const rawType of children(raw, kind)) {
      const type = parseType(rawType, kind, name);
      if (!type) {
        diagnostics.push(`${kind} without a Name in ${name} was skipped`);
        continue;
      }
      if (types.has(type.name)) {
        diagnostics.push(`Duplicate type ${name}.${type.name}; the first declaration is kept`);
        continue;
      }
      types.set(type.name, type);
    }
  }

  const actions = children(raw, 'Action')
    .map(parseAction)
    .filter((a): a is ActionDef => a !== undefined);

  return {
    ...parseNamespaceName(name),
    alias: attr(raw, 'Alias'),
    fileName,
    types,
    actions,
  };
}

function parseReference(raw: RawNode): ReferenceDef | undefined {
  const uri = attr(raw, 'Uri');
  if (!uri) return undefined;
  const includes: IncludeDef[] = [];
  for (const include of children(raw, 'Include')) {
    const namespace = attr(include, 'Namespace');
    if (namespace) includes.push({ namespace, alias: attr(include, 'Alias') });
  }
  return { uri, fileName: fileNameFromUri(uri), includes };
}

// ---------------------------------------------------------------------------
// Main parse functions
// ---------------------------------------------------------------------------

/**
 * Parses the text of one CSDL document (`<edmx:Edmx>` root).
 *
 * @param text     - Document contents.
 * @param fileName - Name the document is known by; references resolve to it.
 * @throws `CsdlParseError` if the text is not well-formed XML or has no Edmx root.
 */
export function parseCsdl(text: string, fileName: string): ParsedDocument {
  const content = normalizeXmlEncodingDeclaration(text);

  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new CsdlParseError(fileName, `malformed XML at ${line}:${col}: ${msg}`);
  }

  let parsed: RawNode;
  try {
    parsed = asObject(makeParser().parse(content));
  } catch (err) {
    throw new CsdlParseError(fileName, 'failed to parse XML content', err);
  }

  if (parsed.Edmx === undefined) {
    throw new CsdlParseError(fileName, 'root element <edmx:Edmx> not found');
  }
  const edmx = asObject(parsed.Edmx);
  const diagnostics: string[] = [];

  const references = children(edmx, 'Reference')
    .map(parseReference)
    .filter((r): r is ReferenceDef => r !== undefined);

  const namespaces = new Map<string, NamespaceDef>();
  try {
    for (const rawSchema of children(asObject(edmx.DataServices), 'Schema')) {
      const namespace = parseSchema(rawSchema, fileName, diagnostics);
      if (!namespace) continue;
      if (namespaces.has(namespace.name)) {
        diagnostics.push(`Namespace ${namespace.name} declared twice; the first declaration is kept`);
        continue;
      }
      namespaces.set(namespace.name, namespace);
    }
  } catch (err) {
    throw new CsdlParseError(fileName, err instanceof Error ? err.message : String(err), err);
  }

  if (namespaces.size === 0 && references.length === 0) {
    diagnostics.push('Document declares no references and no namespaces');
  }

  return { fileName, namespaces, references, diagnostics };
}

/**
 * Reads a CSDL document from disk and parses it. The document is known by
 * the file's base name.
 */
export async function parseCsdlFile(path: string): Promise<ParsedDocument> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new CsdlParseError(basename(path), `cannot read file ${path}`, err);
  }
  return parseCsdl(text, basename(path));
}
