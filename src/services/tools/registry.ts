// Capability Registry - holds every tool the model may invoke
// Populated once at startup; lookups by name fail loudly

import { DuplicateCapabilityError, UnknownCapabilityError } from '../../utils/errors.js';
import type { Capability, CapabilityDescriptor, CapabilityParameter, JsonValue } from './types.js';

interface ParameterSchema {
  type: CapabilityParameter['type'];
  description: string;
  enum?: string[];
  default?: JsonValue;
}

export interface OpenAIFunctionDef {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ParameterSchema>;
    required: string[];
  };
}

export class CapabilityRegistry {
  // Map iteration follows insertion order, which keeps describeAll() stable
  private capabilities: Map<string, Capability> = new Map();

  register(capability: Capability): void {
    if (this.capabilities.has(capability.name)) {
      throw new DuplicateCapabilityError(capability.name);
    }
    this.capabilities.set(capability.name, capability);
  }

  resolve(name: string): Capability {
    const capability = this.capabilities.get(name);
    if (!capability) {
      throw new UnknownCapabilityError(name);
    }
    return capability;
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  get size(): number {
    return this.capabilities.size;
  }

  describeAll(): CapabilityDescriptor[] {
    return Array.from(this.capabilities.values()).map(capability => ({
      name: capability.name,
      description: capability.description,
      parameters: capability.parameters.map(p => ({ ...p })),
    }));
  }

  toOpenAIFunctions(): OpenAIFunctionDef[] {
    return this.describeAll().map(toOpenAIFunction);
  }
}

export function toOpenAIFunction(descriptor: CapabilityDescriptor): OpenAIFunctionDef {
  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: {
      type: 'object',
      properties: parametersToSchema(descriptor.parameters),
      required: descriptor.parameters.filter(p => p.required).map(p => p.name),
    },
  };
}

function parametersToSchema(params: CapabilityParameter[]): Record<string, ParameterSchema> {
  const schema: Record<string, ParameterSchema> = {};

  for (const param of params) {
    const paramSchema: ParameterSchema = {
      type: param.type,
      description: param.description,
    };

    if (param.enum) {
      paramSchema.enum = param.enum;
    }

    if (param.default !== undefined) {
      paramSchema.default = param.default;
    }

    schema[param.name] = paramSchema;
  }

  return schema;
}
