/**
 * Registry of the built-in module types
 */

import { PoseModule, POSE_MODULE } from '../character/pose-module.js';
import { Extractor, EXTRACTOR } from '../functions/extractor.js';
import { LeafReviser, LEAF_REVISER } from '../functions/leaf-reviser.js';
import { ListCache, LIST_CACHE } from '../memory/list-cache.js';
import { ValueCache, VALUE_CACHE } from '../memory/value-cache.js';
import { ModuleRegistry, type ReconstructOptions } from './module-registry.js';
import type { ReasoningModule } from './reasoning-module.js';

export function createDefaultModuleRegistry(): ModuleRegistry {
  return new ModuleRegistry()
    .register(EXTRACTOR, (fields) => new Extractor(fields))
    .register(POSE_MODULE, (fields) => new PoseModule(fields))
    .register(LEAF_REVISER, (fields) => new LeafReviser(fields))
    .register(VALUE_CACHE, (fields) => new ValueCache(fields))
    .register(LIST_CACHE, (fields) => new ListCache(fields));
}

let defaultRegistry: ModuleRegistry | null = null;

export function getDefaultModuleRegistry(): ModuleRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultModuleRegistry();
  }
  return defaultRegistry;
}

/**
 * Rebuild a module from its serialized form
 */
export function reconstruct(
  serialized: unknown,
  options: ReconstructOptions & { modules?: ModuleRegistry } = {}
): ReasoningModule {
  const { modules = getDefaultModuleRegistry(), ...rest } = options;
  return modules.reconstruct(serialized, rest);
}
