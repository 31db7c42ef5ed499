import type { Factory } from './Factory';
import { FactoryReference, isFactory, isFactoryClass } from './reference';
import type { DefinitionSource, FactoryClass } from './types';

/**
 * A definition value, tagged by how the graph builder resolves it.
 */
export type DefinitionEntry =
  | { kind: 'scalar'; value: unknown }
  | { kind: 'lazy'; produce: () => unknown }
  | { kind: 'reference'; target: FactoryClass | string }
  | { kind: 'nested'; factory: Factory };

export interface DefinitionField {
  name: string;
  entry: DefinitionEntry;
}

function isCallable(value: unknown): value is () => unknown {
  return typeof value === 'function';
}

/**
 * Tags a single definition or override value.
 * Factory classes are checked before plain callables since both are functions.
 */
export function classify(value: unknown): DefinitionEntry {
  if (isFactory(value)) {
    return { kind: 'nested', factory: value };
  }

  if (value instanceof FactoryReference) {
    return { kind: 'reference', target: value.target };
  }

  if (isFactoryClass(value)) {
    return { kind: 'reference', target: value };
  }

  if (isCallable(value)) {
    return { kind: 'lazy', produce: value };
  }

  return { kind: 'scalar', value };
}

export function isFactoryEntry(
  entry: DefinitionEntry,
): entry is Extract<DefinitionEntry, { kind: 'reference' | 'nested' }> {
  return entry.kind === 'reference' || entry.kind === 'nested';
}

/**
 * Calls `definition()` once and tags every field, keeping declaration order.
 * Nested factory instances are passed through as they are.
 */
export function evaluateDefinition(source: DefinitionSource): DefinitionField[] {
  return Object.entries(source.definition()).map(([name, value]) => ({
    name,
    entry: classify(value),
  }));
}
