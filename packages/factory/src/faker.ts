import { Faker, allLocales, base, en } from '@faker-js/faker';
import type { FakerLocale } from './config';

/**
 * Named counters shared by every FactoryFaker, so sequences stay unique
 * across factories within a test run.
 */
const sequences = new Map<string, number>();

/**
 * Type definition for timestamp fields.
 */
export type Timestamps = {
  /** The creation date */
  createdAt: Date;
  /** The last update date */
  updatedAt: Date;
};

/**
 * Faker with the helpers factories reach for most often.
 * Every factory instance owns one, so seeding or reconfiguring it never
 * leaks into another factory.
 *
 * @example
 * ```typescript
 * class UserFactory extends Factory<User> {
 *   readonly model = User;
 *
 *   definition() {
 *     return {
 *       email: `user${this.faker.sequence('email')}@example.com`,
 *       name: this.faker.person.fullName(),
 *       ...this.faker.timestamps(),
 *     };
 *   }
 * }
 * ```
 */
export class FactoryFaker extends Faker {
  /**
   * Next number of a named sequence, starting at 1.
   */
  sequence(name = 'default'): number {
    const next = (sequences.get(name) ?? 0) + 1;
    sequences.set(name, next);
    return next;
  }

  /**
   * Resets a named sequence so the next value is `value + 1`.
   */
  resetSequence(name = 'default', value = 0): void {
    sequences.set(name, value);
  }

  resetAllSequences(): void {
    sequences.clear();
  }

  /**
   * A createdAt in the past and an updatedAt between it and now,
   * both truncated to whole seconds.
   */
  timestamps(): Timestamps {
    const createdAt = this.date.past();
    const updatedAt = this.date.between({ from: createdAt, to: new Date() });

    createdAt.setMilliseconds(0);
    updatedAt.setMilliseconds(0);

    return { createdAt, updatedAt };
  }

  /**
   * A reverse domain name identifier such as `"com.acme.widget3"`.
   */
  identifier(suffix?: string): string {
    return [
      this.internet.domainSuffix(),
      this.internet.domainWord(),
      suffix ?? this.internet.domainWord() + this.sequence('identifier'),
    ].join('.');
  }

  /**
   * A random price as a number.
   */
  price(): number {
    return +this.commerce.price();
  }
}

export interface CreateFakerOptions {
  locale?: FakerLocale;
  seed?: number;
}

/**
 * Creates a FactoryFaker for a locale, falling back to English and the base
 * locale for missing definitions.
 *
 * @example
 * ```typescript
 * const faker = createFaker({ locale: 'de', seed: 42 });
 * faker.person.firstName();
 * ```
 */
export function createFaker(options: CreateFakerOptions = {}): FactoryFaker {
  const { locale = 'en', seed } = options;
  const faker = new FactoryFaker({ locale: [allLocales[locale], en, base] });

  if (seed !== undefined) {
    faker.seed(seed);
  }

  return faker;
}
