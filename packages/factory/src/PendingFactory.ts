import { resolveContext } from './context';
import type { Factory } from './Factory';
import { GraphBuilder } from './GraphBuilder';
import {
  assertCount,
  overridesAt,
  RelatedExpander,
  type RelatedRequest,
} from './RelatedExpander';
import type { BatchOverrides, Overrides } from './types';

/**
 * A factory together with the related objects requested through `has()`.
 * Every `has()` returns a new value; `make` and `create` are terminal and
 * leave the value untouched, so it can be reused.
 *
 * @example
 * ```typescript
 * const withComments = new PostFactory().has('comments', 3);
 *
 * const post = await withComments.create({ title: 'Hello' });
 * post.comments; // 3 comments whose post is `post`
 * ```
 */
export class PendingFactory<TModel extends object> {
  constructor(
    readonly factory: Factory<TModel>,
    readonly requests: readonly RelatedRequest[] = [],
  ) {}

  /**
   * Requests `count` children through a reverse relation of the model.
   *
   * @param relation - Reverse relation name, e.g. `"comments"`
   * @param count - Number of children (default 1)
   * @param overrides - Overrides for the children, a sequence, or a function of the index
   * @throws RelationNotFoundError for unknown relations
   * @throws FactoryNotFoundError when no factory builds the related model
   */
  has(
    relation: string,
    count = 1,
    overrides?: BatchOverrides,
  ): PendingFactory<TModel> {
    const context = this.context();
    const expander = new RelatedExpander(context, new GraphBuilder(context));
    const request = expander.request(
      this.factory.resolveModel(context.models),
      relation,
      count,
      overrides,
    );

    return new PendingFactory(this.factory, [...this.requests, request]);
  }

  /**
   * Builds the graph without persisting anything.
   */
  make(overrides: Overrides = {}): TModel {
    const context = this.context();
    const builder = new GraphBuilder(context);
    const instance = builder.make(builder.plan(this.factory, overrides));

    if (this.requests.length > 0) {
      new RelatedExpander(context, builder).make(instance, this.requests);
    }

    return instance;
  }

  /**
   * Builds and persists the graph, dependencies first, then the requested
   * related objects.
   */
  async create(overrides: Overrides = {}): Promise<TModel> {
    const context = this.context();
    const builder = new GraphBuilder(context);
    const instance = await builder.create(builder.plan(this.factory, overrides));

    if (this.requests.length > 0) {
      await new RelatedExpander(context, builder).create(instance, this.requests);
    }

    return instance;
  }

  /**
   * Makes `size` instances.
   *
   * @throws InvalidBatchError for invalid sizes or empty sequences
   */
  makeBatch(size: number, overrides?: BatchOverrides): TModel[] {
    assertCount(size, 'size');

    return Array.from({ length: size }, (_, index) =>
      this.make(overridesAt(overrides, index, this.factory.faker)),
    );
  }

  /**
   * Creates `size` instances sequentially.
   *
   * @throws InvalidBatchError for invalid sizes or empty sequences
   */
  async createBatch(size: number, overrides?: BatchOverrides): Promise<TModel[]> {
    assertCount(size, 'size');

    const instances: TModel[] = [];
    for (let index = 0; index < size; index++) {
      instances.push(
        await this.create(overridesAt(overrides, index, this.factory.faker)),
      );
    }
    return instances;
  }

  private context() {
    return resolveContext(this.factory.name, this.factory.options);
  }
}
