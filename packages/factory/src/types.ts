import type { FactoryOptions } from './context';
import type { Factory } from './Factory';
import type { FactoryFaker } from './faker';

/**
 * A model constructor. Models are built with no arguments and filled with
 * attributes by the model layer.
 */
export type ModelClass<TModel extends object = object> = new () => TModel;

/**
 * A model constructor, or a label such as `"posts.Post"` resolved by the model layer.
 */
export type ModelReference<TModel extends object = object> =
  | ModelClass<TModel>
  | string;

/**
 * Field values handed to the model layer when constructing an instance.
 */
export type Attributes = Record<string, unknown>;

/**
 * Caller overrides. Keys are field names or `field__subfield` paths.
 */
export type Overrides = Record<string, unknown>;

/**
 * The ordered field mapping returned by `Factory.definition()`.
 */
export type Definition = Record<string, unknown>;

/**
 * Anything able to produce a definition mapping.
 */
export interface DefinitionSource {
  definition(): Definition;
}

/**
 * Overrides for batches and related requests: the same overrides for every
 * item, a sequence cycled by index, or a function of the index.
 *
 * @example
 * ```typescript
 * factory.makeBatch(3, { published: true });
 * factory.makeBatch(3, [{ title: 'First' }, { title: 'Second' }]);
 * factory.makeBatch(3, (idx, faker) => ({ title: `Post ${idx + 1}` }));
 * ```
 */
export type BatchOverrides =
  | Overrides
  | Overrides[]
  | ((index: number, faker: FactoryFaker) => Overrides);

/**
 * Constructor of a concrete factory.
 */
export type FactoryClass<TModel extends object = object> = new (
  options?: FactoryOptions,
) => Factory<TModel>;
