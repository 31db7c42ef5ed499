import { ModelLayerNotConfiguredError } from '@forgekit/errors';
import { type Logger, getLogger } from './logger';
import type { ModelLayer } from './ModelLayer';
import { type FactoryRegistry, registry } from './FactoryRegistry';

/**
 * Collaborators a factory resolves against.
 */
export interface FactoryOptions {
  /** Persistence boundary used to build and save instances */
  models?: ModelLayer;
  /** Registry used for string references and reverse relations */
  registry?: FactoryRegistry;
  /** Logger receiving resolution and persistence events */
  logger?: Logger;
}

export interface FactoryContext {
  models: ModelLayer;
  registry: FactoryRegistry;
  logger: Logger;
}

let defaults: FactoryOptions = {};

/**
 * Sets the collaborators used by factories constructed without explicit options.
 *
 * @example
 * ```typescript
 * // vitest setup file
 * configureFactories({ models: new ObjectionModelLayer(knex, { 'posts.Post': Post }) });
 * ```
 */
export function configureFactories(options: FactoryOptions): void {
  defaults = { ...defaults, ...options };
}

export function resetFactoryConfiguration(): void {
  defaults = {};
}

/**
 * Fills in missing options from the configured defaults.
 *
 * @param factory - Name used in the error when no model layer is available
 */
export function resolveContext(
  factory: string,
  options: FactoryOptions = {},
): FactoryContext {
  const models = options.models ?? defaults.models;

  if (!models) {
    throw new ModelLayerNotConfiguredError(factory);
  }

  return {
    models,
    registry: options.registry ?? defaults.registry ?? registry,
    logger: options.logger ?? defaults.logger ?? getLogger(),
  };
}

/**
 * The registry a factory class should consult when no instance is at hand.
 */
export function defaultRegistry(): FactoryRegistry {
  return defaults.registry ?? registry;
}
