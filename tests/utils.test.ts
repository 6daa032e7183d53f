import { describe, expect, it } from 'vitest';
import { editDistance, fileNameFromUri, matchKey, similarity, splitQualifiedName } from '../src/utils.js';

describe('editDistance', () => {
  it('counts insertions, deletions and substitutions', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('same', 'same')).toBe(0);
  });
});

describe('similarity', () => {
  it('ignores case', () => {
    expect(similarity('Name', 'NAME')).toBe(1);
  });

  it('scales the distance by the longer name', () => {
    expect(similarity('PropertyA', 'PropertyB')).toBeCloseTo(8 / 9);
    expect(similarity('abcd', 'wxyz')).toBe(0);
  });
});

describe('matchKey', () => {
  it('matches a similar key when the declared name is missing', () => {
    expect(matchKey('PropertyA', ['Name', 'PropertyB'])).toBe('PropertyB');
  });

  it('never matches an excluded key', () => {
    expect(matchKey('PropertyA', ['Name', 'PropertyB'], ['PropertyB'])).toBe('PropertyA');
  });

  it('returns the expected name when every similar key is excluded', () => {
    expect(matchKey('PropertyA', ['PropertyB', 'PropertyC'], ['PropertyB', 'PropertyC'])).toBe('PropertyA');
  });

  it('returns a verbatim key even when it is excluded', () => {
    expect(matchKey('Name', ['Name'], ['Name'])).toBe('Name');
  });

  it('prefers a case-insensitive match over a closer spelling', () => {
    expect(matchKey('Health', ['Healt', 'health'])).toBe('health');
  });

  it('returns the expected name when nothing is similar enough', () => {
    expect(matchKey('Status', ['Health', 'Id'])).toBe('Status');
    expect(matchKey('Status', [])).toBe('Status');
  });

  it('takes the earlier key on a tie', () => {
    expect(matchKey('Names', ['NameX', 'NameY'], [], 0.5)).toBe('NameX');
  });

  it('honours a custom threshold', () => {
    expect(matchKey('Description', ['Descripton'])).toBe('Descripton');
    expect(matchKey('Description', ['Descripton'], [], 0.95)).toBe('Description');
  });
});

describe('splitQualifiedName', () => {
  it('splits at the last dot', () => {
    expect(splitQualifiedName('Example.v1_0_0.Example')).toEqual({ namespace: 'Example.v1_0_0', name: 'Example' });
  });

  it('returns an empty namespace for a bare name', () => {
    expect(splitQualifiedName('Example')).toEqual({ namespace: '', name: 'Example' });
  });
});

describe('fileNameFromUri', () => {
  it('takes the last path segment', () => {
    expect(fileNameFromUri('http://example.test/schemas/v1/Resource_v1.xml')).toBe('Resource_v1.xml');
    expect(fileNameFromUri('http://example.test/schemas/Resource_v1.xml?version=1#top')).toBe('Resource_v1.xml');
    expect(fileNameFromUri('Resource_v1.xml')).toBe('Resource_v1.xml');
  });
});
