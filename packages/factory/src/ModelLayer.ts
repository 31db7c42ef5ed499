import type { Attributes, ModelClass } from './types';

/**
 * Describes how a child of a reverse relation points back at its parent.
 */
export interface RelatedField {
  /** The child model */
  model: ModelClass;
  /** The child field receiving the parent reference */
  field: string;
  /** The value stored in `field` for a given parent */
  reference(parent: object): unknown;
}

/**
 * The persistence boundary consumed by the factories.
 * Implementations own construction, persistence and relation metadata;
 * the factories never validate attributes themselves.
 *
 * @example
 * ```typescript
 * const models: ModelLayer = new MemoryModelLayer()
 *   .define('posts.Post', Post, { comments: { model: Comment, field: 'post' } })
 *   .define('posts.Comment', Comment);
 * ```
 */
export interface ModelLayer {
  /**
   * Resolves a model label such as `"posts.Post"`.
   * Throws ModelNotFoundError for unknown labels.
   */
  resolveModel(identifier: string): ModelClass;

  /**
   * Constructs an unpersisted instance holding the given attributes.
   */
  build<TModel extends object>(
    model: ModelClass<TModel>,
    attributes: Attributes,
  ): TModel;

  /**
   * Persists an instance and assigns its identity.
   * Errors are propagated to the caller untouched.
   */
  save<TModel extends object>(
    model: ModelClass<TModel>,
    instance: TModel,
  ): Promise<TModel>;

  /**
   * Reverse relation metadata. Throws RelationNotFoundError for unknown names.
   */
  relatedField(model: ModelClass, relation: string): RelatedField;

  /**
   * Makes generated children reachable from their parent.
   */
  attachRelated(parent: object, relation: string, related: object[]): void;
}
