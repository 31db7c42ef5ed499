import {
  FactoryNotFoundError,
  InvalidIdentifierError,
  ModelNotFoundError,
  RegistrySealedError,
} from '@forgekit/errors';
import type { FactoryOptions } from './context';
import type { Factory } from './Factory';
import { isFactoryClass } from './reference';
import type { FactoryClass, ModelClass } from './types';

const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$-]*\.[A-Za-z_$][\w$]*$/;

/**
 * Maps `"<app>.<FactoryName>"` identifiers to factory classes.
 *
 * Registration happens once at startup; lookups are lazy so definitions may
 * reference factories that are registered later. Sealing the registry makes
 * the table read-only for the rest of the run.
 *
 * @example
 * ```typescript
 * import * as postFactories from './posts/factories';
 *
 * registry.registerAll('posts', postFactories);
 * registry.seal();
 *
 * const PostFactory = registry.get('posts.PostFactory');
 * ```
 */
export class FactoryRegistry {
  private readonly factories = new Map<string, FactoryClass>();
  private sealed = false;

  /**
   * Registers a factory class under an identifier.
   *
   * @throws InvalidIdentifierError when the identifier is not `<app>.<Name>`
   * @throws RegistrySealedError after seal()
   */
  register(identifier: string, factory: FactoryClass): this {
    this.assertIdentifier(identifier);

    if (this.sealed) {
      throw new RegistrySealedError(identifier);
    }

    this.factories.set(identifier, factory);
    return this;
  }

  /**
   * Registers every concrete factory class exported by a module as
   * `<app>.<ExportName>`. Other exports are ignored.
   */
  registerAll(app: string, module: object): this {
    for (const [name, value] of Object.entries(module)) {
      if (isFactoryClass(value)) {
        this.register(`${app}.${name}`, value);
      }
    }
    return this;
  }

  /**
   * Looks up a factory class by `"<app>.<FactoryName>"` or by app and name.
   *
   * @throws FactoryNotFoundError when nothing is registered under the identifier
   */
  get(identifier: string): FactoryClass;
  get(app: string, name: string): FactoryClass;
  get(appOrIdentifier: string, name?: string): FactoryClass {
    const identifier =
      name === undefined ? appOrIdentifier : `${appOrIdentifier}.${name}`;
    this.assertIdentifier(identifier);

    const factory = this.factories.get(identifier);
    if (!factory) {
      throw new FactoryNotFoundError(identifier);
    }
    return factory;
  }

  has(identifier: string): boolean {
    return this.factories.has(identifier);
  }

  /**
   * Passes classes through and looks strings up.
   */
  resolve(target: FactoryClass | string): FactoryClass {
    return typeof target === 'string' ? this.get(target) : target;
  }

  /**
   * Instantiates the first registered factory producing `model`.
   * Factories whose model label the model layer does not know are skipped.
   *
   * @throws FactoryNotFoundError when no registered factory targets the model
   */
  forModel(model: ModelClass, options: FactoryOptions = {}): Factory {
    for (const FactoryType of this.factories.values()) {
      const factory = new FactoryType(options);
      if (this.produces(factory, model)) {
        return factory;
      }
    }

    throw new FactoryNotFoundError(`<factory for ${model.name}>`);
  }

  identifiers(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Makes the registry read-only.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Removes every registration and unseals the registry.
   */
  clear(): void {
    this.factories.clear();
    this.sealed = false;
  }

  private produces(factory: Factory, model: ModelClass): boolean {
    try {
      return factory.resolveModel() === model;
    } catch (error) {
      // Labels the current model layer does not know cannot match
      if (error instanceof ModelNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  private assertIdentifier(identifier: string): void {
    if (!IDENTIFIER_PATTERN.test(identifier)) {
      throw new InvalidIdentifierError(identifier);
    }
  }
}

/**
 * The process-wide registry used when no other registry is configured.
 */
export const registry = new FactoryRegistry();
