export { Factory } from './Factory';
export { PendingFactory } from './PendingFactory';
export { FactoryRegistry, registry } from './FactoryRegistry';
export { FactoryMap, loadFactories } from './FactoryMap';
export { FactoryReference, ref, isFactory, isFactoryClass } from './reference';
export {
  configureFactories,
  resetFactoryConfiguration,
  type FactoryContext,
  type FactoryOptions,
} from './context';
export { GraphBuilder, type GraphNode, type NodeField } from './GraphBuilder';
export {
  RelatedExpander,
  type RelatedRequest,
} from './RelatedExpander';
export {
  OVERRIDE_SEPARATOR,
  partitionOverrides,
  resolveOverrides,
  type MergedField,
} from './OverrideResolver';
export {
  classify,
  evaluateDefinition,
  type DefinitionEntry,
  type DefinitionField,
} from './definition';
export { MemoryModelLayer, type MemoryRelation } from './MemoryModelLayer';
export type { ModelLayer, RelatedField } from './ModelLayer';
export { createFaker, FactoryFaker, type Timestamps } from './faker';
export {
  getConfig,
  parseConfig,
  resetConfig,
  type FactoryConfig,
  type FakerLocale,
  type LogLevel,
} from './config';
export { createLogger, getLogger, type Logger } from './logger';
export type {
  Attributes,
  BatchOverrides,
  Definition,
  FactoryClass,
  ModelClass,
  ModelReference,
  Overrides,
} from './types';
export * from '@forgekit/errors';
