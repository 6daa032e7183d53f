import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { create } from 'xmlbuilder2';
import type { TypeKind } from '../src/csdl/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const fixturesDir = resolve(__dirname, 'fixtures');
export const schemasDir = resolve(fixturesDir, 'schemas');
export const brokenDir = resolve(fixturesDir, 'broken');

const EDMX_NS = 'http://docs.oasis-open.org/odata/ns/edmx';
const EDM_NS = 'http://docs.oasis-open.org/odata/ns/edm';

// ---------------------------------------------------------------------------
// In-memory CSDL documents
// ---------------------------------------------------------------------------

export interface PropertySpec {
  name: string;
  type: string;
  nullable?: boolean;
  navigation?: boolean;
  /** Term -> String constant. */
  annotations?: Record<string, string>;
}

export interface TypeSpec {
  kind: TypeKind;
  name: string;
  baseType?: string;
  abstract?: boolean;
  openType?: boolean;
  properties?: PropertySpec[];
  members?: string[];
  underlyingType?: string;
}

export interface SchemaSpec {
  namespace: string;
  types?: TypeSpec[];
}

export interface ReferenceSpec {
  uri: string;
  includes: { namespace: string; alias?: string }[];
}

function attributes(entries: Record<string, string | boolean | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) out[key] = String(value);
  }
  return out;
}

/**
 * Serialises a CSDL document with the given schemas and references.
 */
export function buildCsdl(schemas: SchemaSpec[], references: ReferenceSpec[] = []): string {
  const root = create({ version: '1.0', encoding: 'UTF-8' }).ele(EDMX_NS, 'edmx:Edmx', { Version: '4.0' });

  for (const reference of references) {
    const ref = root.ele(EDMX_NS, 'edmx:Reference', { Uri: reference.uri });
    for (const include of reference.includes) {
      ref.ele(EDMX_NS, 'edmx:Include', attributes({ Namespace: include.namespace, Alias: include.alias }));
    }
  }

  const services = root.ele(EDMX_NS, 'edmx:DataServices');
  for (const schema of schemas) {
    const node = services.ele(EDM_NS, 'Schema', { Namespace: schema.namespace });
    for (const type of schema.types ?? []) {
      const typeNode = node.ele(
        EDM_NS,
        type.kind,
        attributes({
          Name: type.name,
          BaseType: type.baseType,
          Abstract: type.abstract,
          OpenType: type.openType,
          UnderlyingType: type.underlyingType,
        }),
      );
      for (const property of type.properties ?? []) {
        const propertyNode = typeNode.ele(
          EDM_NS,
          property.navigation ? 'NavigationProperty' : 'Property',
          attributes({ Name: property.name, Type: property.type, Nullable: property.nullable }),
        );
        for (const [term, value] of Object.entries(property.annotations ?? {})) {
          propertyNode.ele(EDM_NS, 'Annotation', { Term: term, String: value });
        }
      }
      for (const member of type.members ?? []) {
        typeNode.ele(EDM_NS, 'Member', { Name: member });
      }
    }
  }

  return root.end({ prettyPrint: true });
}
