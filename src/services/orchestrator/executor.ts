// Tool Executor
// Runs model-requested tool calls against the capability registry.
// Every request yields exactly one result, in request order; failures never escape.

import type { CapabilityRegistry } from '../tools/registry.js';
import type {
  Capability,
  CapabilityParameter,
  JsonValue,
  ToolInvocationRequest,
  ToolInvocationResult,
} from '../tools/types.js';
import { errorMessage, ToolInvocationError, UnknownCapabilityError } from '../../utils/errors.js';
import { createLogger, type Logger } from '../../logger.js';

export interface ToolExecutorOptions {
  // Upper bound per call; 0 leaves timeouts to the capability itself
  timeoutMs?: number;
  dispatch?: 'parallel' | 'sequential';
  logger?: Logger;
}

export class ToolExecutor {
  private timeoutMs: number;
  private dispatch: 'parallel' | 'sequential';
  private log: Logger;

  constructor(private registry: CapabilityRegistry, options: ToolExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.dispatch = options.dispatch ?? 'parallel';
    this.log = options.logger ?? createLogger({ module: 'executor' });
  }

  async execute(requests: readonly ToolInvocationRequest[], signal?: AbortSignal): Promise<ToolInvocationResult[]> {
    if (this.dispatch === 'parallel') {
      return Promise.all(requests.map(request => this.executeOne(request, signal)));
    }

    const results: ToolInvocationResult[] = [];
    for (const request of requests) {
      results.push(await this.executeOne(request, signal));
    }
    return results;
  }

  async executeOne(request: ToolInvocationRequest, signal?: AbortSignal): Promise<ToolInvocationResult> {
    const startTime = Date.now();

    try {
      const capability = this.registry.resolve(request.name);
      validateArguments(capability, request);

      const output = await this.invoke(capability, request, signal);

      this.log.debug({ tool: request.name, durationMs: Date.now() - startTime }, 'Tool call succeeded');
      return { status: 'success', tool: request.name, output };
    } catch (error) {
      const failure = toFailure(request.name, error);
      this.log.warn(
        { tool: request.name, kind: failure.kind, durationMs: Date.now() - startTime },
        `Tool call failed: ${failure.error}`
      );
      return failure;
    }
  }

  private async invoke(capability: Capability, request: ToolInvocationRequest, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      const pending: Promise<string>[] = [capability.execute(request.arguments, controller.signal)];
      if (this.timeoutMs > 0) {
        pending.push(
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
              controller.abort();
              reject(ToolInvocationError.timeout(capability.name, this.timeoutMs));
            }, this.timeoutMs);
          })
        );
      }
      return await Promise.race(pending);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

function toFailure(tool: string, error: unknown): Extract<ToolInvocationResult, { status: 'failure' }> {
  if (error instanceof ToolInvocationError) {
    return { status: 'failure', tool, kind: error.kind, error: error.message };
  }
  if (error instanceof UnknownCapabilityError) {
    return { status: 'failure', tool, kind: error.kind, error: error.message };
  }
  return { status: 'failure', tool, kind: 'ToolInvocationFailure', error: errorMessage(error) };
}

function matchesType(value: JsonValue, type: CapabilityParameter['type']): boolean {
  switch (type) {
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    default:
      return typeof value === type;
  }
}

/**
 * Checks the request against the capability's declared parameters.
 * Extra arguments are tolerated; missing required ones and wrong types are not.
 */
export function validateArguments(capability: Capability, request: ToolInvocationRequest): void {
  if (request.argumentError) {
    throw ToolInvocationError.invalidArguments(
      capability.name,
      `Could not decode arguments for "${capability.name}": ${request.argumentError}`
    );
  }

  for (const param of capability.parameters) {
    const value = request.arguments[param.name];

    if (value === undefined || value === null) {
      if (param.required) {
        throw ToolInvocationError.invalidArguments(
          capability.name,
          `Missing required argument "${param.name}" for "${capability.name}"`
        );
      }
      continue;
    }

    if (!matchesType(value, param.type)) {
      throw ToolInvocationError.invalidArguments(
        capability.name,
        `Argument "${param.name}" for "${capability.name}" must be of type ${param.type}`
      );
    }

    if (param.enum && (typeof value !== 'string' || !param.enum.includes(value))) {
      throw ToolInvocationError.invalidArguments(
        capability.name,
        `Argument "${param.name}" for "${capability.name}" must be one of: ${param.enum.join(', ')}`
      );
    }
  }
}

export function renderToolResult(result: ToolInvocationResult): string {
  if (result.status === 'success') {
    return `**${result.tool} Result:**\n${result.output}`;
  }
  return `**${result.tool} Error (${result.kind}):** ${result.error}`;
}

export function renderToolResults(results: readonly ToolInvocationResult[]): string {
  return results.map(renderToolResult).join('\n\n');
}
