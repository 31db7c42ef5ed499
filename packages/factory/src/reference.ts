import type { Factory } from './Factory';
import type { FactoryClass } from './types';

/**
 * An explicit reference to a factory, by class or by registry identifier.
 * Strings in a definition are always literals; wrap them with `ref()` to
 * point at a factory instead.
 */
export class FactoryReference {
  constructor(readonly target: FactoryClass | string) {}
}

/**
 * References a factory from a definition without instantiating it.
 * String identifiers are looked up when the definition is resolved, so they
 * may name factories registered after the definition was written.
 *
 * @example
 * ```typescript
 * definition() {
 *   return {
 *     content: this.faker.lorem.paragraph(),
 *     post: ref('posts.PostFactory'),
 *   };
 * }
 * ```
 */
export function ref(target: FactoryClass | string): FactoryReference {
  return new FactoryReference(target);
}

/**
 * Type guard for factory instances.
 */
export function isFactory(value: unknown): value is Factory {
  return (
    value !== null &&
    typeof value === 'object' &&
    'isFactory' in value &&
    value.isFactory === true
  );
}

/**
 * Type guard for concrete factory classes.
 * The abstract base is rejected because it has no definition() to call.
 */
export function isFactoryClass(value: unknown): value is FactoryClass {
  return (
    typeof value === 'function' &&
    'isFactory' in value &&
    value.isFactory === true &&
    typeof value.prototype?.definition === 'function'
  );
}
