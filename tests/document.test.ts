import { beforeAll, describe, expect, it } from 'vitest';
import { SchemaCatalog } from '../src/catalog.js';
import { SchemaDoc } from '../src/csdl/document.js';
import { silentLogger } from '../src/logger.js';
import { MissingSchemaError } from '../src/validation/errors.js';
import { buildCsdl, schemasDir } from './helpers.js';

let catalog: SchemaCatalog;
let example: SchemaDoc;

beforeAll(async () => {
  catalog = await SchemaCatalog.load(schemasDir, { logger: silentLogger });
  const doc = catalog.getSchemaDocByFile('Example_v1.xml');
  if (!doc) throw new Error('Example_v1.xml was not loaded');
  example = doc;
});

describe('SchemaDoc.getReference', () => {
  it('falls back to the newest included version not above the requested one', () => {
    expect(example.getReference('ExampleResource.v1_9_9')).toMatchObject({
      namespace: 'ExampleResource.v1_2_0',
      fileName: 'ExampleResource_v1.xml',
      local: false,
      wellKnown: false,
    });
    expect(example.getReference('ExampleResource.v1_0_1').namespace).toBe('ExampleResource.v1_0_0');
    expect(example.getReference('ExampleResource.v1_1_0').namespace).toBe('ExampleResource.v1_0_0');
  });

  it('resolves a bare reference to the unversioned include', () => {
    expect(example.getReference('ExampleResource').namespace).toBe('ExampleResource');
  });

  it('expands include aliases', () => {
    expect(example.getReference('OData')).toMatchObject({
      namespace: 'Org.OData.Core.V1',
      alias: 'OData',
      fileName: 'Org.OData.Core.V1.xml',
    });
  });

  it('resolves namespaces the document declares itself', () => {
    expect(example.getReference('Example.v1_1_0')).toMatchObject({ namespace: 'Example.v1_1_0', local: true });
  });

  it('resolves well-known namespaces nobody includes', () => {
    expect(example.getReference('RedfishExtension.v1_0_0')).toEqual({
      namespace: 'RedfishExtension.v1_0_0',
      local: false,
      wellKnown: true,
    });
    expect(example.getReference('Redfish').wellKnown).toBe(true);
  });

  it('returns the same answer for the same name', () => {
    expect(example.getReference('ExampleResource.v1_9_9')).toBe(example.getReference('ExampleResource.v1_9_9'));
  });

  it('throws for a namespace that is neither included nor well known', () => {
    let error: unknown;
    try {
      example.getReference('Unknown.v1_0_0');
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(MissingSchemaError);
    if (!(error instanceof MissingSchemaError)) return;
    expect(error.schemaName).toBe('Unknown.v1_0_0');
    expect(error.fileName).toBe('Example_v1.xml');
  });
});

describe('SchemaDoc.getTypeInSchemaDoc', () => {
  it('finds local types', () => {
    expect(example.getTypeInSchemaDoc('Example.v1_0_0.Actions').fullName).toBe('Example.v1_0_0.Actions');
  });

  it('follows references into other documents', () => {
    const status = example.getTypeInSchemaDoc('Resource.Status');
    expect(status.fullName).toBe('Resource.v1_0_0.Status');
    expect(status.owner.fileName).toBe('Resource_v1.xml');
  });

  it('applies version fallback across documents', () => {
    expect(example.getTypeInSchemaDoc('ExampleResource.v1_9_9.ExampleResource').fullName).toBe(
      'ExampleResource.v1_2_0.ExampleResource',
    );
  });

  it('returns a resolved type as is', () => {
    const type = example.getTypeInSchemaDoc('Example.v1_0_0.Example');
    expect(example.getTypeInSchemaDoc(type)).toBe(type);
  });

  it('throws for a type no namespace in reach declares', () => {
    expect(() => example.getTypeInSchemaDoc('Example.v1_0_0.Missing')).toThrow(MissingSchemaError);
    expect(() => example.getTypeInSchemaDoc('Resource.Missing')).toThrow(MissingSchemaError);
    expect(() => example.getTypeInSchemaDoc('Unqualified')).toThrow(MissingSchemaError);
  });
});

describe('SchemaDoc.fromText', () => {
  it('resolves a detached document against the catalog without adding it', () => {
    const text = buildCsdl(
      [
        {
          namespace: 'Scratch.v1_0_0',
          types: [{ kind: 'ComplexType', name: 'Scratch', properties: [{ name: 'Status', type: 'Resource.Status' }] }],
        },
      ],
      [{ uri: 'http://example.test/schemas/v1/Resource_v1.xml', includes: [{ namespace: 'Resource' }] }],
    );
    const doc = SchemaDoc.fromText(text, catalog, 'Scratch_v1.xml');

    expect(doc.getTypeInSchemaDoc('Resource.Status').fullName).toBe('Resource.v1_0_0.Status');
    expect(doc.getTypeInSchemaDoc('Scratch.v1_0_0.Scratch').properties.has('Status')).toBe(true);
    expect(catalog.getSchemaDocByFile('Scratch_v1.xml')).toBeUndefined();
  });

  it('keeps the types of a detached document out of the catalog', async () => {
    const fresh = await SchemaCatalog.load(schemasDir, { logger: silentLogger });
    const text = buildCsdl([
      {
        namespace: 'Example.v1_0_0',
        types: [{ kind: 'ComplexType', name: 'Links', properties: [{ name: 'Bogus', type: 'Edm.Boolean' }] }],
      },
    ]);
    const doc = SchemaDoc.fromText(text, fresh, 'Scratch_v1.xml');

    const detached = doc.getTypeInSchemaDoc('Example.v1_0_0.Links');
    expect(detached.properties.has('Bogus')).toBe(true);
    expect(doc.getTypeInSchemaDoc('Example.v1_0_0.Links')).toBe(detached);

    const links = fresh.getTypeInCatalog('Example.v1_0_0.Links');
    expect(links.owner.fileName).toBe('Example_v1.xml');
    expect([...links.properties.keys()]).toEqual(['Primary']);
    expect(doc.getTypeInSchemaDoc('Example.v1_0_0.Links')).toBe(detached);
  });
});
