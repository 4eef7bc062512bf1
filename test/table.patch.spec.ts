import { describe, expect, it } from 'vitest';
import { patchEntity } from '../src/table/patch';

describe('patchEntity', () => {
  it('lays the response over a copy of the original', () => {
    const original = { id: 1, name: 'old', extra: 'keep' };
    const patched = patchEntity(original, { name: 'new' });

    expect(patched).toEqual({ id: 1, name: 'new', extra: 'keep' });
    expect(original).toEqual({ id: 1, name: 'old', extra: 'keep' });
  });

  it('adds server-only keys', () => {
    expect(patchEntity({ text: 't' }, { id: 'x1', __version: '1' })).toEqual({ text: 't', id: 'x1', __version: '1' });
  });

  it('does not share nested values with the original', () => {
    const original = { id: 1, meta: { a: 1 } };
    const patched = patchEntity(original, {});
    expect(patched.meta).toEqual({ a: 1 });
    expect(patched.meta).not.toBe(original.meta);
  });
});
