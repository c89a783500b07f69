export { ReasoningModule } from './reasoning-module.js';
export {
  defineModule,
  fieldNames,
  capabilityField,
  moduleField,
  nodeField,
  parseFields,
} from './fields.js';
export type { ModuleDefinition, FieldParse } from './fields.js';
export { encodeField, REF_KEYS } from './serialization.js';
export type { RefKey } from './serialization.js';
export { ModuleRegistry } from './module-registry.js';
export type { ReconstructOptions } from './module-registry.js';
export { createDefaultModuleRegistry, getDefaultModuleRegistry, reconstruct } from './builtins.js';
export type {
  NodeInputs,
  ForwardContext,
  BackwardContext,
  OperationSpec,
  InvokeOptions,
  SerializedModule,
  CapabilityResolver,
} from './types.js';
