import { TableError } from './errors';
import type { Entity } from './types';

/** Deep copy of an entity; values that cannot be cloned (functions, symbols) fail with InvalidArgument. */
export function cloneEntity(entity: Entity): Entity {
  try {
    return structuredClone(entity);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TableError('InvalidArgument', `Entity cannot be copied: ${reason}`, { cause: err });
  }
}

/**
 * JSON text for a request body. `bigint` values are written as plain number literals,
 * so int64 ids beyond 2^53 keep every digit.
 */
export function serializeEntity(entity: Entity): string {
  const marker = `bigint:${Math.random().toString(36).slice(2)}:`;
  let sawBigint = false;

  let text: string;
  try {
    text = JSON.stringify(entity, (_key: string, value: unknown) => {
      if (typeof value !== 'bigint') return value;
      sawBigint = true;
      return `${marker}${value.toString(10)}`;
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TableError('InvalidArgument', `Entity cannot be serialized: ${reason}`, { cause: err });
  }

  return sawBigint ? text.replace(new RegExp(`"${marker}(-?\\d+)"`, 'g'), '$1') : text;
}
