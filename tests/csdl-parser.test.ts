import { resolve } from 'node:path';
import { describe, expect, it } from 'vitest';
import { parseCsdl, parseCsdlFile } from '../src/csdl/parser.js';
import { CsdlParseError } from '../src/validation/errors.js';
import { buildCsdl, schemasDir } from './helpers.js';

describe('parseCsdlFile', () => {
  it('indexes namespaces and references of a document', async () => {
    const doc = await parseCsdlFile(resolve(schemasDir, 'Example_v1.xml'));

    expect(doc.fileName).toBe('Example_v1.xml');
    expect([...doc.namespaces.keys()]).toEqual(['Example', 'Example.v1_0_0', 'Example.v1_1_0', 'Example.v1_2_0']);
    expect(doc.references).toHaveLength(3);
    expect(doc.references[0].fileName).toBe('Org.OData.Core.V1.xml');
    expect(doc.references[0].includes).toEqual([{ namespace: 'Org.OData.Core.V1', alias: 'OData' }]);
    expect(doc.references[2].fileName).toBe('ExampleResource_v1.xml');
    expect(doc.references[2].includes.map((i) => i.namespace)).toEqual([
      'ExampleResource',
      'ExampleResource.v1_0_0',
      'ExampleResource.v1_2_0',
    ]);
    expect(doc.diagnostics).toEqual([]);
  });

  it('reads properties, navigation properties and collections', async () => {
    const doc = await parseCsdlFile(resolve(schemasDir, 'Example_v1.xml'));
    const example = doc.namespaces.get('Example.v1_0_0')?.types.get('Example');
    expect(example).toBeDefined();
    if (!example) return;

    expect(example.kind).toBe('EntityType');
    expect(example.baseType).toBe('Example.Example');
    expect(example.properties.map((p) => p.name)).toEqual(['Status', 'Actions', 'Links', 'Resources']);

    const resources = example.properties[3];
    expect(resources.type).toBe('ExampleResource.ExampleResource');
    expect(resources.isCollection).toBe(true);
    expect(resources.isNavigation).toBe(true);
    expect(resources.nullable).toBe(true);
    expect(example.properties[1].nullable).toBe(false);
  });

  it('reads bound actions', async () => {
    const doc = await parseCsdlFile(resolve(schemasDir, 'Example_v1.xml'));
    const actions = doc.namespaces.get('Example')?.actions ?? [];

    expect(doc.namespaces.get('Example.v1_0_0')?.actions).toEqual([]);
    expect(actions).toHaveLength(1);
    expect(actions[0].name).toBe('Reset');
    expect(actions[0].bindingType).toBe('Example.v1_0_0.Actions');
    expect(actions[0].parameters.map((p) => p.name)).toEqual(['Example', 'ResetType']);
  });

  it('reads enums, type definitions and property annotations', async () => {
    const doc = await parseCsdlFile(resolve(schemasDir, 'Resource_v1.xml'));
    const resource = doc.namespaces.get('Resource');
    expect(resource).toBeDefined();
    if (!resource) return;

    expect(resource.types.get('Health')?.members).toEqual(['OK', 'Warning', 'Critical']);
    expect(resource.types.get('UUID')?.underlyingType).toBe('Edm.Guid');
    expect(resource.types.get('Oem')?.openType).toBe(true);
    expect(resource.types.get('Oem')?.annotations).toEqual([
      { term: 'OData.Description', value: 'Vendor-specific extensions.' },
    ]);
    expect(resource.types.get('Item')?.abstract).toBe(true);

    const id = doc.namespaces.get('Resource.v1_0_0')?.types.get('Resource')?.properties[0];
    expect(id?.name).toBe('Id');
    expect(id?.required).toBe(true);
    expect(id?.permissions).toBe('OData.Permission/Read');
    expect(id?.nullable).toBe(false);
  });

  it('keeps annotation constants as strings', async () => {
    const doc = await parseCsdlFile(resolve(schemasDir, 'ExampleResource_v1.xml'));
    const count = doc.namespaces
      .get('ExampleResource.v1_0_0')
      ?.types.get('ExampleResource')
      ?.properties.find((p) => p.name === 'Count');

    expect(count?.annotations).toEqual([{ term: 'Validation.Minimum', value: '0' }]);
  });

  it('rejects a file that cannot be read', async () => {
    await expect(parseCsdlFile(resolve(schemasDir, 'Missing_v1.xml'))).rejects.toBeInstanceOf(CsdlParseError);
  });
});

describe('parseCsdl', () => {
  it('rejects malformed XML with its position', () => {
    expect(() => parseCsdl('<edmx:Edmx><Schema></edmx:Edmx>', 'Bad_v1.xml')).toThrow(/^Bad_v1\.xml: malformed XML at/);
  });

  it('rejects a document without an Edmx root', () => {
    let error: unknown;
    try {
      parseCsdl('<root/>', 'Plain.xml');
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(CsdlParseError);
    if (!(error instanceof CsdlParseError)) return;
    expect(error.fileName).toBe('Plain.xml');
    expect(error.message).toBe('Plain.xml: root element <edmx:Edmx> not found');
  });

  it('reads long-form annotation strings', () => {
    const text = `<?xml version="1.0" encoding="UTF-8"?>
<edmx:Edmx xmlns:edmx="http://docs.oasis-open.org/odata/ns/edmx" Version="4.0">
  <edmx:DataServices>
    <Schema xmlns="http://docs.oasis-open.org/odata/ns/edm" Namespace="Note.v1_0_0">
      <ComplexType Name="Note">
        <Property Name="Text" Type="Edm.String">
          <Annotation Term="OData.LongDescription">
            <String>Free text.</String>
          </Annotation>
        </Property>
      </ComplexType>
    </Schema>
  </edmx:DataServices>
</edmx:Edmx>`;
    const doc = parseCsdl(text, 'Note_v1.xml');
    const property = doc.namespaces.get('Note.v1_0_0')?.types.get('Note')?.properties[0];

    expect(property?.annotations).toEqual([{ term: 'OData.LongDescription', value: 'Free text.' }]);
  });

  it('keeps the first of two types with the same name and notes it', () => {
    const text = buildCsdl([
      {
        namespace: 'Dup.v1_0_0',
        types: [
          { kind: 'ComplexType', name: 'Thing', properties: [{ name: 'First', type: 'Edm.String' }] },
          { kind: 'ComplexType', name: 'Thing', properties: [{ name: 'Second', type: 'Edm.String' }] },
        ],
      },
    ]);
    const doc = parseCsdl(text, 'Dup_v1.xml');

    expect(doc.namespaces.get('Dup.v1_0_0')?.types.get('Thing')?.properties[0].name).toBe('First');
    expect(doc.diagnostics).toEqual(['Duplicate type Dup.v1_0_0.Thing; the first declaration is kept']);
  });

  it('notes a document with nothing in it', () => {
    const doc = parseCsdl(buildCsdl([]), 'Empty.xml');
    expect(doc.namespaces.size).toBe(0);
    expect(doc.diagnostics).toEqual(['Document declares no references and no namespaces']);
  });
});
