/**
 * Module Registry
 * Maps module type names to factories and rebuilds modules from their
 * serialized form. Reconstruction is driven by each type's declared field
 * schema; a reconstructed module has no invocation history.
 */

import { z } from 'zod';
import {
  ErrataError,
  ReconstructionFailureError,
  createChildLogger,
  isJsonObject,
} from '@errata/shared';
import { getDefaultGraph, type GraphRegistry } from '../graph/graph-registry.js';
import { fieldNames, optionalFieldNames, parseFields, type ModuleDefinition } from './fields.js';
import { refKeyOf } from './serialization.js';
import type { ReasoningModule } from './reasoning-module.js';
import type { CapabilityResolver } from './types.js';

export interface ReconstructOptions {
  capabilities?: CapabilityResolver;
  /** Graph that receives the leaves of { $node } references */
  graph?: GraphRegistry;
}

interface RegisteredModule {
  fieldNames: string[];
  optionalFieldNames: string[];
  build: (values: Record<string, unknown>) => ReasoningModule;
}

const serializedModuleSchema = z.object({
  type: z.string().min(1),
  fields: z.record(z.unknown()),
});

const nodeRefSchema = z.object({
  datatype: z.string(),
  value: z.unknown(),
});

export class ModuleRegistry {
  private modules = new Map<string, RegisteredModule>();
  private logger = createChildLogger({ component: 'ModuleRegistry' });

  register<S extends z.AnyZodObject>(
    definition: ModuleDefinition<S>,
    factory: (fields: z.output<S>) => ReasoningModule
  ): this {
    const names = fieldNames(definition);
    this.modules.set(definition.type, {
      fieldNames: names,
      optionalFieldNames: optionalFieldNames(definition),
      build: (values) => {
        const parsed = parseFields(definition.schema, values);
        if (!parsed.success) {
          throw new ReconstructionFailureError(`Fields of ${definition.type} do not match its declaration`, {
            moduleType: definition.type,
            issues: parsed.error.issues,
          });
        }
        return factory(parsed.fields);
      },
    });
    return this;
  }

  has(type: string): boolean {
    return this.modules.has(type);
  }

  types(): string[] {
    return [...this.modules.keys()];
  }

  reconstruct(serialized: unknown, options: ReconstructOptions = {}): ReasoningModule {
    const parsed = serializedModuleSchema.safeParse(serialized);
    if (!parsed.success) {
      throw new ReconstructionFailureError('Serialized module must be { type, fields }', {
        issues: parsed.error.issues,
      });
    }

    const { type, fields } = parsed.data;
    const registered = this.modules.get(type);
    if (!registered) {
      throw new ReconstructionFailureError(`Unknown module type: ${type}`, {
        moduleType: type,
        knownTypes: this.types(),
      });
    }

    const provided = Object.keys(fields);
    const missing = registered.fieldNames.filter(
      (name) => !provided.includes(name) && !registered.optionalFieldNames.includes(name)
    );
    const unexpected = provided.filter((name) => !registered.fieldNames.includes(name));
    if (missing.length > 0 || unexpected.length > 0) {
      throw new ReconstructionFailureError(`Serialized fields of ${type} do not match its declaration`, {
        moduleType: type,
        missing,
        unexpected,
      });
    }

    try {
      const values: Record<string, unknown> = {};
      for (const name of registered.fieldNames.filter((field) => provided.includes(field))) {
        values[name] = this.decode(fields[name], `${type}.${name}`, options);
      }

      const module = registered.build(values);
      this.logger.debug({ moduleType: type }, 'Module reconstructed');
      return module;
    } catch (error) {
      if (error instanceof ReconstructionFailureError) throw error;
      throw new ReconstructionFailureError(
        `Could not reconstruct ${type}: ${error instanceof Error ? error.message : String(error)}`,
        {
          moduleType: type,
          errorCode: error instanceof ErrataError ? error.code : undefined,
        }
      );
    }
  }

  private decode(value: unknown, path: string, options: ReconstructOptions): unknown {
    if (Array.isArray(value)) {
      return value.map((item, index) => this.decode(item, `${path}[${index}]`, options));
    }

    if (!isJsonObject(value)) {
      return value;
    }

    switch (refKeyOf(value)) {
      case '$capability':
        return this.resolveCapability(value.$capability, path, options);
      case '$module':
        return this.reconstruct(value.$module, options);
      case '$node':
        return this.resolveNode(value.$node, path, options);
      case '$json':
        return this.decodeEntries(value.$json, path, options);
      default:
        return this.decodeEntries(value, path, options);
    }
  }

  private decodeEntries(value: unknown, path: string, options: ReconstructOptions): Record<string, unknown> {
    if (!isJsonObject(value)) {
      throw new ReconstructionFailureError(`Field ${path} must hold an object`, { path });
    }
    const decoded: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      decoded[key] = this.decode(item, `${path}.${key}`, options);
    }
    return decoded;
  }

  private resolveCapability(name: unknown, path: string, options: ReconstructOptions): unknown {
    if (typeof name !== 'string') {
      throw new ReconstructionFailureError(`Capability reference at ${path} must be a name`, { path });
    }
    const capability = options.capabilities?.get(name);
    if (!capability) {
      throw new ReconstructionFailureError(`No capability named '${name}' for ${path}`, {
        path,
        capability: name,
      });
    }
    return capability;
  }

  private resolveNode(ref: unknown, path: string, options: ReconstructOptions): unknown {
    const parsed = nodeRefSchema.safeParse(ref);
    if (!parsed.success) {
      throw new ReconstructionFailureError(`Node reference at ${path} must be { datatype, value }`, {
        path,
        issues: parsed.error.issues,
      });
    }
    const graph = options.graph ?? getDefaultGraph();
    return graph.leaf(parsed.data.datatype, this.decode(parsed.data.value, `${path}.value`, options));
  }
}
