import { describe, expect, it } from 'vitest';
import { cloneEntity, serializeEntity } from '../src/entity';
import { TableError } from '../src/errors';
import type { Entity } from '../src/types';
import { captureError } from './support/capture';

describe('serializeEntity', () => {
  it('writes nested and negative bigints as number literals', () => {
    expect(serializeEntity({ id: -9223372036854775808n, refs: [1n, 'x'], note: 'bigint' })).toBe(
      '{"id":-9223372036854775808,"refs":[1,"x"],"note":"bigint"}',
    );
  });

  it('leaves bigint-free entities as plain JSON', () => {
    expect(serializeEntity({ id: 'a', done: false })).toBe('{"id":"a","done":false}');
  });

  it('maps a cyclic entity to InvalidArgument', () => {
    const entity: Entity = { id: 'a' };
    entity.self = entity;

    const err = captureError(() => serializeEntity(entity));
    expect(err).toBeInstanceOf(TableError);
    expect(err).toMatchObject({ kind: 'InvalidArgument' });
  });
});

describe('cloneEntity', () => {
  it('copies nested values', () => {
    const original = { id: 'a', tags: ['t'] };
    const copy = cloneEntity(original);

    expect(copy).toEqual(original);
    expect(copy.tags).not.toBe(original.tags);
  });
});
