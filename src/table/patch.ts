import { cloneEntity } from '../entity';
import type { Entity } from '../types';

/**
 * Copy of `original` with every key from the service response laid over it.
 * Response values win; keys only the original has are kept.
 */
export function patchEntity(original: Entity, response: Entity): Entity {
  const patched = cloneEntity(original);
  for (const [key, value] of Object.entries(response)) {
    patched[key] = value;
  }
  return patched;
}
