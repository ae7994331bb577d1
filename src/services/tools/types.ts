// Capability types
// A capability is a named, schema-described action the model may request

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ToolArguments = Record<string, JsonValue>;

export interface CapabilityParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[];
  default?: JsonValue;
}

export interface CapabilityDescriptor {
  name: string;
  description: string;
  parameters: CapabilityParameter[];
}

/**
 * An executable capability. `execute` resolves with the success payload
 * and throws (normally a ToolInvocationError) on failure.
 */
export interface Capability extends CapabilityDescriptor {
  execute: (args: ToolArguments, signal?: AbortSignal) => Promise<string>;
}

// Produced by the model gateway, never by the user
export interface ToolInvocationRequest {
  name: string;
  arguments: ToolArguments;
  // Set by a gateway adapter when the model's argument payload could not be decoded
  argumentError?: string;
}

export type ToolInvocationResult =
  | { status: 'success'; tool: string; output: string }
  | { status: 'failure'; tool: string; kind: string; error: string };
