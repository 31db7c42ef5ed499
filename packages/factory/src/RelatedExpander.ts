import { InvalidBatchError } from '@forgekit/errors';
import type { FactoryContext } from './context';
import type { Factory } from './Factory';
import type { FactoryFaker } from './faker';
import type { GraphBuilder } from './GraphBuilder';
import type { RelatedField } from './ModelLayer';
import type { BatchOverrides, ModelClass, Overrides } from './types';

/**
 * A pending request for children of a reverse relation.
 */
export interface RelatedRequest {
  /** Reverse relation name on the parent model */
  relation: string;
  /** Number of children to generate */
  count: number;
  /** Factory building each child */
  factory: Factory;
  /** How children point back at the parent */
  field: RelatedField;
  /** Caller overrides for the children */
  overrides?: BatchOverrides;
}

/**
 * Validates a batch size or relation count.
 *
 * @throws InvalidBatchError for negative or fractional values
 */
export function assertCount(count: number, label = 'count'): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidBatchError(
      `${label} must be a non-negative integer, got ${count}`,
      { [label]: count },
    );
  }
}

/**
 * Picks the overrides of the `index`-th item of a batch.
 * Sequences are cycled; an empty sequence is rejected.
 */
export function overridesAt(
  overrides: BatchOverrides | undefined,
  index: number,
  faker: FactoryFaker,
): Overrides {
  if (overrides === undefined) {
    return {};
  }

  if (typeof overrides === 'function') {
    return overrides(index, faker);
  }

  if (Array.isArray(overrides)) {
    if (overrides.length === 0) {
      throw new InvalidBatchError('A sequence must contain at least one entry');
    }
    return overrides[index % overrides.length] ?? {};
  }

  return overrides;
}

/**
 * Generates children for reverse relations of an already resolved parent.
 * The foreign key of every child is forced to the parent, whatever the
 * caller's overrides say.
 */
export class RelatedExpander {
  constructor(
    private readonly context: FactoryContext,
    private readonly builder: GraphBuilder,
  ) {}

  /**
   * Resolves a relation and the factory of its children.
   *
   * @throws RelationNotFoundError when the model layer does not know the relation
   * @throws FactoryNotFoundError when no registered factory builds the child model
   */
  request(
    parentModel: ModelClass,
    relation: string,
    count: number,
    overrides?: BatchOverrides,
  ): RelatedRequest {
    assertCount(count);

    const field = this.context.models.relatedField(parentModel, relation);
    const factory = this.context.registry.forModel(field.model, this.context);

    return { relation, count, factory, field, overrides };
  }

  /**
   * Builds transient children for every request, in request order.
   */
  make(parent: object, requests: readonly RelatedRequest[]): object[] {
    const generated: object[] = [];

    for (const request of requests) {
      this.log(request);
      const children: object[] = [];

      for (let index = 0; index < request.count; index++) {
        children.push(this.builder.make(this.planChild(parent, request, index)));
      }

      this.context.models.attachRelated(parent, request.relation, children);
      generated.push(...children);
    }

    return generated;
  }

  /**
   * Builds and persists children for every request, one at a time.
   */
  async create(
    parent: object,
    requests: readonly RelatedRequest[],
  ): Promise<object[]> {
    const generated: object[] = [];

    for (const request of requests) {
      this.log(request);
      const children: object[] = [];

      for (let index = 0; index < request.count; index++) {
        children.push(
          await this.builder.create(this.planChild(parent, request, index)),
        );
      }

      this.context.models.attachRelated(parent, request.relation, children);
      generated.push(...children);
    }

    return generated;
  }

  private planChild(parent: object, request: RelatedRequest, index: number) {
    const { factory, field } = request;

    return this.builder.plan(
      factory,
      overridesAt(request.overrides, index, factory.faker),
      { [field.field]: field.reference(parent) },
    );
  }

  private log(request: RelatedRequest): void {
    this.context.logger.debug(
      {
        relation: request.relation,
        count: request.count,
        factory: request.factory.name,
      },
      'Expanding related objects',
    );
  }
}
