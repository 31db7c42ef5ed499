import type { TestAPI } from 'vitest';
import type { FactoryOptions } from './context';
import { type FactoryMap, loadFactories } from './FactoryMap';
import type { FactoryClass } from './types';

/**
 * Fixtures injected by {@link extendWithFactories}.
 */
export interface FactoryFixtures {
  factories: FactoryMap;
}

/**
 * Extends a Vitest test API with a `factories` fixture holding one instance
 * of each listed factory. Entries are factory classes or registry
 * identifiers; identifiers are resolved when a test first uses the fixture.
 *
 * `options` may be a function so the fixture can pick up per-test
 * collaborators such as a transaction-bound model layer.
 *
 * @example
 * ```typescript
 * const it = extendWithFactories(test, ['posts.PostFactory', CommentFactory], {
 *   models,
 * });
 *
 * it('lists comments', async ({ factories }) => {
 *   const post = await factories.get(Post).has('comments', 2).create();
 *   expect(post.comments).toHaveLength(2);
 * });
 * ```
 */
export function extendWithFactories(
  api: TestAPI,
  entries: ReadonlyArray<FactoryClass | string>,
  options: FactoryOptions | (() => FactoryOptions) = {},
) {
  return api.extend<FactoryFixtures>({
    // biome-ignore lint/correctness/noEmptyPattern: vitest fixtures require a destructured context
    factories: async ({}, use) => {
      const resolved = typeof options === 'function' ? options() : options;
      await use(loadFactories(entries, resolved));
    },
  });
}
