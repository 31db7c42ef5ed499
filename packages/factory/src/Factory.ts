import { type FactoryOptions, defaultRegistry, resolveContext } from './context';
import { getConfig } from './config';
import { createFaker, type FactoryFaker } from './faker';
import type { ModelLayer } from './ModelLayer';
import { PendingFactory } from './PendingFactory';
import type {
  Attributes,
  BatchOverrides,
  Definition,
  DefinitionSource,
  FactoryClass,
  ModelClass,
  ModelReference,
  Overrides,
} from './types';

/**
 * Base class for model factories used in tests.
 *
 * A factory targets one model and describes its fields in `definition()`.
 * Field values may be literals, callables, nested factory instances, factory
 * classes or `ref()` references. Overrides passed to `make`/`create` replace
 * fields directly or reach into nested factories with `field__subfield` keys.
 *
 * @template TModel - The model instance type produced by the factory
 *
 * @example
 * ```typescript
 * class PostFactory extends Factory<Post> {
 *   readonly model = Post;
 *
 *   definition() {
 *     return {
 *       title: this.faker.lorem.sentence(),
 *       content: this.faker.lorem.paragraphs(),
 *     };
 *   }
 * }
 *
 * class CommentFactory extends Factory<Comment> {
 *   readonly model = 'posts.Comment';
 *
 *   definition() {
 *     return {
 *       content: this.faker.lorem.paragraph(),
 *       post: new PostFactory(),
 *     };
 *   }
 * }
 *
 * const comment = await new CommentFactory().create({ post__title: 'Hello' });
 * const post = await new PostFactory().has('comments', 3).create();
 * ```
 */
export abstract class Factory<TModel extends object = object>
  implements DefinitionSource
{
  /** Type discriminator for factory classes */
  static readonly isFactory = true;

  /**
   * Looks up a factory class in the configured registry.
   *
   * @example
   * ```typescript
   * const PostFactory = Factory.getFactory('posts.PostFactory');
   * const CommentFactory = Factory.getFactory('posts', 'CommentFactory');
   * ```
   */
  static getFactory(identifier: string): FactoryClass;
  static getFactory(app: string, name: string): FactoryClass;
  static getFactory(appOrIdentifier: string, name?: string): FactoryClass {
    const registry = defaultRegistry();
    return name === undefined
      ? registry.get(appOrIdentifier)
      : registry.get(appOrIdentifier, name);
  }

  /** Type discriminator for factory instances */
  readonly isFactory = true;

  /** The model this factory produces */
  abstract readonly model: ModelReference<TModel>;

  /** The value provider owned by this factory */
  readonly faker: FactoryFaker;

  constructor(readonly options: FactoryOptions = {}) {
    this.faker = this.configureFaker();
  }

  /**
   * Builds this factory's faker. Override to change locale or seed.
   *
   * @example
   * ```typescript
   * configureFaker() {
   *   return createFaker({ locale: 'de', seed: 7 });
   * }
   * ```
   */
  configureFaker(): FactoryFaker {
    const { locale, seed } = getConfig();
    return createFaker({ locale, seed });
  }

  /**
   * Field mapping for a new instance. Called once per resolution.
   */
  abstract definition(): Definition;

  /**
   * Optional replacement for the model layer's build and save when creating.
   * Receives the fully resolved attributes, nested instances included.
   */
  createMethod?(attributes: Attributes): Promise<TModel>;

  get name(): string {
    return this.constructor.name;
  }

  /**
   * The model constructor, resolving labels through the model layer.
   *
   * @param models - Model layer to resolve labels with (defaults to this factory's)
   * @throws ModelNotFoundError for unknown labels
   */
  resolveModel(models?: ModelLayer): ModelClass<TModel> {
    const { model } = this;
    if (typeof model !== 'string') {
      return model;
    }

    const layer = models ?? resolveContext(this.name, this.options).models;
    // Labels carry no type information; the factory declares what they produce
    return layer.resolveModel(model) as ModelClass<TModel>;
  }

  /**
   * Requests related objects to generate after the instance itself.
   * Returns a new pending factory; this factory is not modified.
   */
  has(
    relation: string,
    count = 1,
    overrides?: BatchOverrides,
  ): PendingFactory<TModel> {
    return new PendingFactory(this).has(relation, count, overrides);
  }

  /**
   * Builds an instance without persisting it or anything it references.
   */
  make(overrides: Overrides = {}): TModel {
    return new PendingFactory(this).make(overrides);
  }

  /**
   * Builds and persists an instance and everything it references.
   */
  create(overrides: Overrides = {}): Promise<TModel> {
    return new PendingFactory(this).create(overrides);
  }

  /**
   * Makes several instances.
   *
   * @example
   * ```typescript
   * factory.makeBatch(3, [{ title: 'Hello' }, { title: 'World' }]);
   * ```
   */
  makeBatch(size: number, overrides?: BatchOverrides): TModel[] {
    return new PendingFactory(this).makeBatch(size, overrides);
  }

  /**
   * Creates several instances, one after another.
   */
  createBatch(size: number, overrides?: BatchOverrides): Promise<TModel[]> {
    return new PendingFactory(this).createBatch(size, overrides);
  }
}
