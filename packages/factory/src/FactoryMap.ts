import { FactoryNotFoundError, ModelNotFoundError } from '@forgekit/errors';
import { type FactoryOptions, resolveContext } from './context';
import type { Factory } from './Factory';
import type { FactoryClass, ModelClass } from './types';

function produces(
  factory: Factory,
  model: ModelClass,
  options: FactoryOptions,
): boolean {
  try {
    return (
      factory.resolveModel(resolveContext(factory.name, options).models) === model
    );
  } catch (error) {
    if (error instanceof ModelNotFoundError) {
      return false;
    }
    throw error;
  }
}

/**
 * Factory instances of a test, keyed by the model they produce.
 *
 * @example
 * ```typescript
 * const factories = loadFactories(['posts.PostFactory', CommentFactory], { models });
 *
 * const post = await factories.get(Post).create();
 * const comment = factories.get('posts.Comment').make();
 * ```
 */
export class FactoryMap {
  private readonly factories: Factory[] = [];

  constructor(private readonly options: FactoryOptions = {}) {}

  set(factory: Factory): this {
    this.factories.push(factory);
    return this;
  }

  /**
   * The factory producing a model, by constructor or label.
   *
   * @throws FactoryNotFoundError when no loaded factory produces the model
   */
  get<TModel extends object>(model: ModelClass<TModel>): Factory<TModel>;
  get(model: string): Factory;
  get<TModel extends object>(model: ModelClass<TModel> | string): Factory {
    const target: ModelClass =
      typeof model === 'string'
        ? resolveContext('FactoryMap', this.options).models.resolveModel(model)
        : model;

    const factory = this.factories.find((candidate) =>
      produces(candidate, target, this.options),
    );
    if (!factory) {
      throw new FactoryNotFoundError(`<factory for ${target.name}>`);
    }
    return factory;
  }

  get size(): number {
    return this.factories.length;
  }
}

/**
 * Instantiates factories from classes or registry identifiers.
 */
export function loadFactories(
  entries: ReadonlyArray<FactoryClass | string>,
  options: FactoryOptions = {},
): FactoryMap {
  const context = resolveContext('FactoryMap', options);
  const map = new FactoryMap(options);

  for (const entry of entries) {
    const FactoryType = context.registry.resolve(entry);
    map.set(new FactoryType(options));
  }

  return map;
}
