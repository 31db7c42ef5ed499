/**
 * Objection.js model layer.
 *
 * @example
 * ```typescript
 * import { configureFactories } from '@forgekit/factory';
 * import { ObjectionModelLayer } from '@forgekit/factory/objection';
 *
 * configureFactories({
 *   models: new ObjectionModelLayer(knex, { 'posts.Post': Post, 'posts.Comment': Comment }),
 * });
 * ```
 */
export { ObjectionModelLayer } from './ObjectionModelLayer';
