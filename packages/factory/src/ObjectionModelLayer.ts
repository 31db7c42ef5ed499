import { ModelNotFoundError, RelationNotFoundError } from '@forgekit/errors';
import type { Knex } from 'knex';
import { Model, type Relation } from 'objection';
import type { ModelLayer, RelatedField } from './ModelLayer';
import type { Attributes, ModelClass } from './types';

function isObjectionModel(model: ModelClass): model is typeof Model {
  return model.prototype instanceof Model;
}

function sameProps(left: string[], right: string[]): boolean {
  return (
    left.length === right.length && left.every((prop, idx) => prop === right[idx])
  );
}

/**
 * Model layer for Objection.js models.
 *
 * Instances are inserted with the given Knex instance or transaction, so
 * wrapping a test in a transaction also rolls back everything the factories
 * created. Reverse relations are read from `relationMappings`.
 *
 * @example
 * ```typescript
 * class Post extends Model {
 *   static tableName = 'posts';
 *   static relationMappings = () => ({
 *     comments: {
 *       relation: Model.HasManyRelation,
 *       modelClass: Comment,
 *       join: { from: 'posts.id', to: 'comments.post_id' },
 *     },
 *   });
 * }
 *
 * const models = new ObjectionModelLayer(trx, { 'posts.Post': Post });
 * const post = await new PostFactory({ models }).has('comments', 2).create();
 * ```
 */
export class ObjectionModelLayer implements ModelLayer {
  private readonly labels: Map<string, typeof Model>;

  /**
   * @param db - Knex instance or transaction used for inserts
   * @param models - Models addressable by label, e.g. `{ 'posts.Post': Post }`
   */
  constructor(
    private readonly db: Knex | Knex.Transaction,
    models: Record<string, typeof Model> = {},
  ) {
    this.labels = new Map(Object.entries(models));
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
    const instance = new model();
    if (!(instance instanceof Model)) {
      throw new TypeError(`${model.name} is not an Objection model`);
    }

    instance.$set(attributes);
    return instance;
  }

  /**
   * Inserts the instance's columns. Related models assigned to
   * BelongsToOne relations provide the foreign key columns first.
   */
  async save<TModel extends object>(
    model: ModelClass<TModel>,
    instance: TModel,
  ): Promise<TModel> {
    const ModelType = this.objectionModel(model);
    if (!(instance instanceof Model)) {
      throw new TypeError(`Expected an instance of ${model.name}`);
    }

    const relations = Object.values(ModelType.getRelations());
    for (const relation of relations) {
      this.assignForeignKey(instance, relation);
    }

    const relationNames = new Set(relations.map((relation) => relation.name));
    const row: Record<string, unknown> = {};
    for (const [column, value] of Object.entries(instance)) {
      if (!relationNames.has(column) && value !== undefined) {
        row[column] = value;
      }
    }

    const inserted = await ModelType.query(this.db).insert(
      ModelType.fromJson(row, { skipValidation: true }),
    );
    instance.$id(inserted.$id());

    return instance;
  }

  /**
   * Uses the child's BelongsToOne relation back to the parent when one
   * exists, so the child receives the parent instance; otherwise the raw
   * foreign key column receives the parent's key.
   */
  relatedField(model: ModelClass, relationName: string): RelatedField {
    const ModelType = this.objectionModel(model);
    const relation = ModelType.getRelations()[relationName];

    if (!relation || !(relation instanceof Model.HasManyRelation)) {
      throw new RelationNotFoundError(model.name, relationName);
    }

    const child = relation.relatedModelClass;
    const foreignProps = relation.relatedProp.props;
    const inverse = Object.values(child.getRelations()).find(
      (candidate) =>
        candidate instanceof Model.BelongsToOneRelation &&
        candidate.relatedModelClass === ModelType &&
        sameProps(candidate.ownerProp.props, foreignProps),
    );

    if (inverse) {
      return { model: child, field: inverse.name, reference: (parent) => parent };
    }

    const [foreignKey] = foreignProps;
    const [ownerKey] = relation.ownerProp.props;
    if (foreignKey === undefined || ownerKey === undefined) {
      throw new RelationNotFoundError(model.name, relationName);
    }

    return {
      model: child,
      field: foreignKey,
      reference: (parent) => Reflect.get(parent, ownerKey),
    };
  }

  attachRelated(parent: object, relation: string, related: object[]): void {
    if (!(parent instanceof Model)) {
      throw new TypeError('Related objects can only be attached to Objection models');
    }

    parent.$appendRelated(
      relation,
      related.filter((item): item is Model => item instanceof Model),
    );
  }

  private objectionModel(model: ModelClass): typeof Model {
    if (!isObjectionModel(model)) {
      throw new TypeError(`${model.name} is not an Objection model`);
    }
    return model;
  }

  private assignForeignKey(instance: Model, relation: Relation): void {
    if (!(relation instanceof Model.BelongsToOneRelation)) {
      return;
    }

    const related: unknown = Reflect.get(instance, relation.name);
    if (!(related instanceof Model)) {
      return;
    }

    relation.ownerProp.props.forEach((prop, idx) => {
      const relatedProp = relation.relatedProp.props[idx];
      if (relatedProp !== undefined) {
        instance.$set({ [prop]: Reflect.get(related, relatedProp) });
      }
    });
  }
}
