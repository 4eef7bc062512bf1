import { describe, expect, it } from 'vitest';
import { TableError } from '../src/errors';
import {
  ALL_SYSTEM_PROPERTIES,
  encodeSystemProperties,
  mergeSystemProperties,
  parseSystemProperties,
  readVersion,
  stripSystemProperties,
  systemPropertyName,
  type SystemProperty,
} from '../src/systemProperties/codec';
import type { QueryParameter } from '../src/types';
import { captureError } from './support/capture';

const set = (...properties: SystemProperty[]) => new Set<SystemProperty>(properties);

describe('encodeSystemProperties', () => {
  it('omits the parameter when nothing is requested', () => {
    expect(encodeSystemProperties(set())).toBeNull();
    expect(encodeSystemProperties(undefined)).toBeNull();
  });

  it('uses the wildcard for the full set', () => {
    expect(encodeSystemProperties(ALL_SYSTEM_PROPERTIES)).toBe('*');
    expect(encodeSystemProperties(set('Version', 'UpdatedAt', 'CreatedAt'))).toBe('*');
  });

  it('renders prefixed camelCase names in canonical order', () => {
    expect(encodeSystemProperties(set('Version'))).toBe('__version');
    expect(encodeSystemProperties(set('UpdatedAt'))).toBe('__updatedAt');
    expect(encodeSystemProperties(set('Version', 'CreatedAt'))).toBe('__createdAt,__version');
  });

  it('names single properties the same way', () => {
    expect(systemPropertyName('CreatedAt')).toBe('__createdAt');
  });
});

describe('parseSystemProperties', () => {
  it('reads the wildcard, lists and blanks', () => {
    expect(parseSystemProperties('*')).toBe(ALL_SYSTEM_PROPERTIES);
    expect([...parseSystemProperties(' __createdAt, __VERSION ')]).toEqual(['CreatedAt', 'Version']);
    expect([...parseSystemProperties('updatedAt')]).toEqual(['UpdatedAt']);
    expect(parseSystemProperties('').size).toBe(0);
  });

  it('rejects unknown names', () => {
    const err = captureError(() => parseSystemProperties('__version,__deleted'));
    expect(err).toBeInstanceOf(TableError);
    expect(err).toMatchObject({ kind: 'InvalidArgument', message: 'Unknown system property: __deleted' });
  });
});

describe('mergeSystemProperties', () => {
  it('appends the encoded value after the caller parameters', () => {
    const parameters: QueryParameter[] = [['mode', 'fast']];
    const merged = mergeSystemProperties(set('Version'), parameters);

    expect(merged).toEqual([
      ['mode', 'fast'],
      ['__systemproperties', '__version'],
    ]);
    expect(parameters).toEqual([['mode', 'fast']]);
  });

  it('lets an explicit parameter win regardless of casing', () => {
    const parameters: QueryParameter[] = [['__SystemProperties', '__createdAt']];
    expect(mergeSystemProperties(ALL_SYSTEM_PROPERTIES, parameters)).toEqual([['__SystemProperties', '__createdAt']]);
  });

  it('adds nothing for an empty set', () => {
    expect(mergeSystemProperties(set(), [])).toEqual([]);
    expect(mergeSystemProperties(undefined)).toEqual([]);
  });
});

describe('stripSystemProperties', () => {
  it('removes prefixed keys from a copy', () => {
    const original = { id: 1, __version: 'AAA', name: 'x' };
    const stripped = stripSystemProperties(original);

    expect(stripped).toEqual({ id: 1, name: 'x' });
    expect(original).toEqual({ id: 1, __version: 'AAA', name: 'x' });
  });

  it('deep-copies before removing', () => {
    const original = { id: 'a', __createdAt: 'then', tags: ['t'] };
    const stripped = stripSystemProperties(original);
    expect(stripped.tags).toEqual(['t']);
    expect(stripped.tags).not.toBe(original.tags);
  });

  it('returns the same reference when there is nothing to strip', () => {
    const original = { id: 'a', name: 'x' };
    expect(stripSystemProperties(original)).toBe(original);
  });
});

describe('readVersion', () => {
  it('matches the version key case-insensitively', () => {
    expect(readVersion({ __VERSION: 'abc' })).toBe('abc');
    expect(readVersion({ __Version: 3 })).toBe('3');
    expect(readVersion({ id: 1 })).toBeNull();
    expect(readVersion({ __version: null })).toBeNull();
  });
});
