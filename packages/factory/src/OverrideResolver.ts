import { UnknownFieldError } from '@forgekit/errors';
import {
  classify,
  type DefinitionEntry,
  type DefinitionField,
  isFactoryEntry,
} from './definition';
import type { Attributes, Overrides } from './types';

/**
 * Separates the segments of a nested override key: `post__title`.
 */
export const OVERRIDE_SEPARATOR = '__';

/**
 * A definition field after overrides were applied. Sub-overrides are carried
 * to the nested factory rather than applied here.
 */
export interface MergedField {
  name: string;
  entry: DefinitionEntry;
  overrides?: Overrides;
  /**
   * A direct mapping given for a callable field. It replaces the callable's
   * result unless the callable produces a factory, which receives it as
   * `overrides` instead.
   */
  replacement?: Overrides;
}

export interface PartitionedOverrides {
  /** Keys without a separator */
  direct: Overrides;
  /** Dotted keys grouped by their first segment */
  nested: Map<string, Overrides>;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Splits overrides into direct keys and dotted keys, merging every dotted key
 * of a field into one sub-mapping. Keys set to `undefined` are dropped.
 *
 * @example
 * ```typescript
 * partitionOverrides({ content: 'Hi', post__title: 'A', post__author__name: 'B' });
 * // direct: { content: 'Hi' }
 * // nested: Map { 'post' => { title: 'A', author__name: 'B' } }
 * ```
 */
export function partitionOverrides(overrides: Overrides): PartitionedOverrides {
  const direct: Overrides = {};
  const nested = new Map<string, Overrides>();

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      continue;
    }

    const index = key.indexOf(OVERRIDE_SEPARATOR);
    const rest = index > 0 ? key.slice(index + OVERRIDE_SEPARATOR.length) : '';

    if (rest.length === 0) {
      direct[key] = value;
      continue;
    }

    const field = key.slice(0, index);
    const group = nested.get(field) ?? {};
    group[rest] = value;
    nested.set(field, group);
  }

  return { direct, nested };
}

function mergeDirect(
  name: string,
  base: DefinitionEntry,
  value: unknown,
  dotted: Overrides | undefined,
): MergedField {
  // A flat dict on a factory field configures that factory
  if (isPlainObject(value) && isFactoryEntry(base)) {
    return { name, entry: base, overrides: { ...value, ...dotted } };
  }

  if (isPlainObject(value) && base.kind === 'lazy') {
    return {
      name,
      entry: base,
      overrides: { ...value, ...dotted },
      replacement: value,
    };
  }

  const entry = classify(value);
  if (entry.kind === 'scalar') {
    return { name, entry };
  }

  return { name, entry, overrides: dotted };
}

/**
 * Applies caller overrides to an evaluated definition.
 *
 * Precedence per field: a direct value wins over everything, unless it is a
 * sub-mapping or a factory, in which case dotted overrides are merged into it.
 * Dotted overrides win over a flat sub-mapping on key collision.
 * `forced` values replace their field outright, even when the definition
 * does not declare it; overrides naming a forced field are accepted and
 * ignored.
 *
 * @throws UnknownFieldError when an override names a field the definition lacks
 */
export function resolveOverrides(
  factory: string,
  fields: DefinitionField[],
  overrides: Overrides = {},
  forced: Attributes = {},
): MergedField[] {
  const { direct, nested } = partitionOverrides(overrides);
  const known = new Set(fields.map((field) => field.name));

  const unknown = [
    ...new Set([...Object.keys(direct), ...nested.keys()]),
  ].filter((key) => !known.has(key) && !Object.hasOwn(forced, key));

  if (unknown.length > 0) {
    throw new UnknownFieldError(factory, unknown, [...known]);
  }

  const merged = fields.map(({ name, entry }): MergedField => {
    if (Object.hasOwn(forced, name)) {
      return { name, entry: { kind: 'scalar', value: forced[name] } };
    }

    const dotted = nested.get(name);

    if (Object.hasOwn(direct, name)) {
      return mergeDirect(name, entry, direct[name], dotted);
    }

    return dotted ? { name, entry, overrides: dotted } : { name, entry };
  });

  for (const [name, value] of Object.entries(forced)) {
    if (!known.has(name)) {
      merged.push({ name, entry: { kind: 'scalar', value } });
    }
  }

  return merged;
}
