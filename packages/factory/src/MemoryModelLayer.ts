import { ModelNotFoundError, RelationNotFoundError } from '@forgekit/errors';
import type { ModelLayer, RelatedField } from './ModelLayer';
import type { Attributes, ModelClass } from './types';

/**
 * A reverse relation of an in-memory model: children of `model` reference
 * their parent through `field`.
 */
export interface MemoryRelation {
  model: ModelClass;
  field: string;
}

/**
 * A model layer keeping instances in process memory.
 * Saved instances receive incrementing numeric ids per model, and `saved`
 * records every persisted instance in persistence order.
 *
 * @example
 * ```typescript
 * const models = new MemoryModelLayer()
 *   .define('posts.Post', Post, { comments: { model: Comment, field: 'post' } })
 *   .define('posts.Comment', Comment);
 *
 * const post = await new PostFactory({ models }).has('comments', 2).create();
 * models.count(Comment); // 2
 * ```
 */
export class MemoryModelLayer implements ModelLayer {
  /** Every saved instance, in the order it was saved */
  readonly saved: object[] = [];

  private readonly labels = new Map<string, ModelClass>();
  private readonly relations = new Map<ModelClass, Record<string, MemoryRelation>>();
  private readonly tables = new Map<ModelClass, object[]>();

  constructor(private readonly primaryKey = 'id') {}

  /**
   * Declares a model, its label and its reverse relations.
   */
  define(
    label: string,
    model: ModelClass,
    relations: Record<string, MemoryRelation> = {},
  ): this {
    this.labels.set(label, model);
    this.relations.set(model, relations);
    return this;
  }

  resolveModel(identifier: string): ModelClass {
    const model = this.labels.get(identifier);
    if (!model) {
      throw new ModelNotFoundError(identifier);
    }
    return model;
  }

  build<TModel extends object>(
    model: ModelClass<TModel>,
    attributes: Attributes,
  ): TModel {
    return Object.assign(new model(), attributes);
  }

  async save<TModel extends object>(
    model: ModelClass<TModel>,
    instance: TModel,
  ): Promise<TModel> {
    const table = this.tables.get(model) ?? [];

    if (Reflect.get(instance, this.primaryKey) == null) {
      Reflect.set(instance, this.primaryKey, table.length + 1);
    }

    table.push(instance);
    this.tables.set(model, table);
    this.saved.push(instance);

    return instance;
  }

  relatedField(model: ModelClass, relation: string): RelatedField {
    const related = this.relations.get(model)?.[relation];
    if (!related) {
      throw new RelationNotFoundError(model.name, relation);
    }

    return {
      model: related.model,
      field: related.field,
      reference: (parent) => parent,
    };
  }

  attachRelated(parent: object, relation: string, related: object[]): void {
    const existing: unknown = Reflect.get(parent, relation);
    const current: unknown[] = Array.isArray(existing) ? existing : [];
    Reflect.set(parent, relation, [...current, ...related]);
  }

  /**
   * Saved instances of a model.
   */
  all<TModel extends object>(model: ModelClass<TModel>): TModel[] {
    return (this.tables.get(model) ?? []).filter(
      (instance): instance is TModel => instance instanceof model,
    );
  }

  count(model: ModelClass): number {
    return this.tables.get(model)?.length ?? 0;
  }

  /**
   * Forgets every saved instance, keeping model declarations.
   */
  reset(): void {
    this.tables.clear();
    this.saved.length = 0;
  }
}
