import type { FactoryContext } from './context';
import { classify, evaluateDefinition } from './definition';
import type { Factory } from './Factory';
import { isPlainObject, type MergedField, resolveOverrides } from './OverrideResolver';
import type { Attributes, FactoryClass, ModelClass, Overrides } from './types';

/**
 * A field of a planned node: a final value, or a nested node to build first.
 */
export type NodeField =
  | { name: string; kind: 'value'; value: unknown }
  | { name: string; kind: 'node'; node: GraphNode };

/**
 * A fully resolved factory invocation. Every callable has been evaluated and
 * every nested factory planned; only construction and persistence remain.
 */
export interface GraphNode<TModel extends object = object> {
  factory: Factory<TModel>;
  model: ModelClass<TModel>;
  fields: NodeField[];
}

function mergeLiteral(value: unknown, overrides: Overrides | undefined): unknown {
  if (!overrides) {
    return value;
  }
  return isPlainObject(value) ? { ...value, ...overrides } : overrides;
}

/**
 * Resolves factories into object graphs.
 *
 * Planning is the same for both modes: definitions are evaluated, overrides
 * merged and nested factories planned recursively. `make` then constructs the
 * graph bottom-up; `create` also persists each node after its dependencies.
 *
 * @example
 * ```typescript
 * const builder = new GraphBuilder(context);
 * const node = builder.plan(new CommentFactory(), { post__title: 'Hello' });
 * const comment = await builder.create(node);
 * ```
 */
export class GraphBuilder {
  constructor(private readonly context: FactoryContext) {}

  /**
   * Evaluates a factory's definition with overrides applied.
   *
   * @param factory - The factory to resolve
   * @param overrides - Caller overrides, flat or dotted
   * @param forced - Values that replace their field regardless of overrides
   * @throws UnknownFieldError for overrides naming undeclared fields
   * @throws FactoryNotFoundError for unregistered string references
   */
  plan<TModel extends object>(
    factory: Factory<TModel>,
    overrides: Overrides = {},
    forced?: Attributes,
  ): GraphNode<TModel> {
    this.context.logger.debug(
      { factory: factory.name, overrides: Object.keys(overrides) },
      'Resolving factory definition',
    );

    const model = factory.resolveModel(this.context.models);
    const fields = resolveOverrides(
      factory.name,
      evaluateDefinition(factory),
      overrides,
      forced,
    );

    return {
      factory,
      model,
      fields: fields.map((field) => this.planField(field)),
    };
  }

  /**
   * Constructs the graph without persisting anything.
   */
  make<TModel extends object>(node: GraphNode<TModel>): TModel {
    const attributes: Attributes = {};

    for (const field of node.fields) {
      attributes[field.name] =
        field.kind === 'node' ? this.make(field.node) : field.value;
    }

    return this.context.models.build(node.model, attributes);
  }

  /**
   * Constructs and persists the graph. Nested nodes are persisted one at a
   * time, in field order, before the node that references them.
   * Nodes persisted before a failure stay persisted.
   */
  async create<TModel extends object>(node: GraphNode<TModel>): Promise<TModel> {
    const attributes: Attributes = {};

    for (const field of node.fields) {
      attributes[field.name] =
        field.kind === 'node' ? await this.create(field.node) : field.value;
    }

    const { factory, model } = node;
    const instance = factory.createMethod
      ? await factory.createMethod(attributes)
      : await this.context.models.save(
          model,
          this.context.models.build(model, attributes),
        );

    this.context.logger.debug(
      { factory: factory.name, model: model.name },
      'Persisted instance',
    );

    return instance;
  }

  private planField({ name, entry, overrides, replacement }: MergedField): NodeField {
    switch (entry.kind) {
      case 'scalar':
        return replacement
          ? { name, kind: 'value', value: replacement }
          : { name, kind: 'value', value: mergeLiteral(entry.value, overrides) };
      case 'lazy':
        return this.planField({
          name,
          entry: classify(entry.produce()),
          overrides,
          replacement,
        });
      case 'nested':
        return { name, kind: 'node', node: this.plan(entry.factory, overrides) };
      case 'reference':
        return {
          name,
          kind: 'node',
          node: this.plan(this.instantiate(entry.target), overrides),
        };
    }
  }

  private instantiate(target: FactoryClass | string): Factory {
    const FactoryType = this.context.registry.resolve(target);
    return new FactoryType({
      models: this.context.models,
      registry: this.context.registry,
      logger: this.context.logger,
    });
  }
}
