import { describe, it, expect, vi } from 'vitest';
import { CapabilityRegistry } from '../../tools/registry.js';
import type { Capability } from '../../tools/types.js';
import { ToolExecutor, renderToolResult, renderToolResults, validateArguments } from '../executor.js';
import { ToolInvocationError } from '../../../utils/errors.js';

function capability(name: string, execute: Capability['execute'], parameters: Capability['parameters'] = []): Capability {
  return { name, description: name, parameters, execute };
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('ToolExecutor', () => {
  it('should return one result per request in request order', async () => {
    const registry = new CapabilityRegistry();
    registry.register(capability('slow', async () => { await delay(20); return 'slow done'; }));
    registry.register(capability('fast', async () => 'fast done'));
    const executor = new ToolExecutor(registry);

    const results = await executor.execute([
      { name: 'slow', arguments: {} },
      { name: 'fast', arguments: {} },
    ]);

    expect(results).toEqual([
      { status: 'success', tool: 'slow', output: 'slow done' },
      { status: 'success', tool: 'fast', output: 'fast done' },
    ]);
  });

  it('should isolate a failing tool from its siblings', async () => {
    const registry = new CapabilityRegistry();
    registry.register(capability('broken', async () => { throw new Error('boom'); }));
    registry.register(capability('ok', async () => 'fine'));
    const executor = new ToolExecutor(registry);

    const results = await executor.execute([
      { name: 'broken', arguments: {} },
      { name: 'ok', arguments: {} },
    ]);

    expect(results).toEqual([
      { status: 'failure', tool: 'broken', kind: 'ToolInvocationFailure', error: 'boom' },
      { status: 'success', tool: 'ok', output: 'fine' },
    ]);
  });

  it('should report an unregistered tool as UnknownCapability', async () => {
    const executor = new ToolExecutor(new CapabilityRegistry());

    const results = await executor.execute([{ name: 'get_nonexistent', arguments: {} }]);

    expect(results).toEqual([
      {
        status: 'failure',
        tool: 'get_nonexistent',
        kind: 'UnknownCapability',
        error: 'Unknown capability "get_nonexistent"',
      },
    ]);
  });

  it('should keep the kind carried by a ToolInvocationError', async () => {
    const registry = new CapabilityRegistry();
    registry.register(
      capability('send_drift_report_to_slack', async () => {
        throw ToolInvocationError.notConfigured('send_drift_report_to_slack', 'no webhook');
      })
    );
    const executor = new ToolExecutor(registry);

    const [result] = await executor.execute([{ name: 'send_drift_report_to_slack', arguments: {} }]);

    expect(result).toEqual({
      status: 'failure',
      tool: 'send_drift_report_to_slack',
      kind: 'NotConfigured',
      error: 'no webhook',
    });
  });

  it('should time out a hanging tool and abort its signal', async () => {
    let seenSignal: AbortSignal | undefined;
    const registry = new CapabilityRegistry();
    registry.register(
      capability('hang', (_args, signal) => {
        seenSignal = signal;
        return new Promise<string>(() => undefined);
      })
    );
    const executor = new ToolExecutor(registry, { timeoutMs: 10 });

    const [result] = await executor.execute([{ name: 'hang', arguments: {} }]);

    expect(result).toEqual({
      status: 'failure',
      tool: 'hang',
      kind: 'Timeout',
      error: 'Tool "hang" timed out after 10ms',
    });
    expect(seenSignal?.aborted).toBe(true);
  });

  it('should reject missing required arguments without invoking the tool', async () => {
    const execute = vi.fn(async () => 'sent');
    const registry = new CapabilityRegistry();
    registry.register(
      capability('send', execute, [{ name: 'message', type: 'string', description: 'text', required: true }])
    );
    const executor = new ToolExecutor(registry);

    const [result] = await executor.execute([{ name: 'send', arguments: {} }]);

    expect(result).toEqual({
      status: 'failure',
      tool: 'send',
      kind: 'InvalidArguments',
      error: 'Missing required argument "message" for "send"',
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('should report undecodable arguments', async () => {
    const registry = new CapabilityRegistry();
    registry.register(capability('send', async () => 'sent'));
    const executor = new ToolExecutor(registry);

    const [result] = await executor.execute([{ name: 'send', arguments: {}, argumentError: 'Unexpected end of JSON input' }]);

    expect(result).toEqual({
      status: 'failure',
      tool: 'send',
      kind: 'InvalidArguments',
      error: 'Could not decode arguments for "send": Unexpected end of JSON input',
    });
  });

  it('should run tools one at a time in sequential mode', async () => {
    const order: string[] = [];
    const registry = new CapabilityRegistry();
    registry.register(capability('first', async () => { order.push('first:start'); await delay(10); order.push('first:end'); return '1'; }));
    registry.register(capability('second', async () => { order.push('second:start'); return '2'; }));
    const executor = new ToolExecutor(registry, { dispatch: 'sequential' });

    await executor.execute([
      { name: 'first', arguments: {} },
      { name: 'second', arguments: {} },
    ]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should run the same tool twice when requested twice', async () => {
    const execute = vi.fn(async () => 'ok');
    const registry = new CapabilityRegistry();
    registry.register(capability('get_drift_statistics', execute));
    const executor = new ToolExecutor(registry);

    const results = await executor.execute([
      { name: 'get_drift_statistics', arguments: {} },
      { name: 'get_drift_statistics', arguments: {} },
    ]);

    expect(results).toHaveLength(2);
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('should return an empty list for no requests', async () => {
    const executor = new ToolExecutor(new CapabilityRegistry());
    expect(await executor.execute([])).toEqual([]);
  });
});

describe('validateArguments', () => {
  const tool = capability('alert', async () => 'ok', [
    { name: 'level', type: 'string', description: 'level', required: true, enum: ['low', 'high'] },
    { name: 'count', type: 'number', description: 'count', required: false },
  ]);

  it('should accept valid arguments and ignore extras', () => {
    expect(() => validateArguments(tool, { name: 'alert', arguments: { level: 'low', extra: true } })).not.toThrow();
  });

  it('should reject a wrong type', () => {
    expect(() => validateArguments(tool, { name: 'alert', arguments: { level: 'low', count: '3' } })).toThrow(
      'Argument "count" for "alert" must be of type number'
    );
  });

  it('should reject a value outside the enum', () => {
    expect(() => validateArguments(tool, { name: 'alert', arguments: { level: 'urgent' } })).toThrow(
      'Argument "level" for "alert" must be one of: low, high'
    );
  });
});

describe('renderToolResults', () => {
  it('should render successes and failures as labelled blocks', () => {
    expect(renderToolResult({ status: 'success', tool: 'get_drift_statistics', output: 'active=2' })).toBe(
      '**get_drift_statistics Result:**\nactive=2'
    );
    expect(
      renderToolResults([
        { status: 'success', tool: 'a', output: 'one' },
        { status: 'failure', tool: 'b', kind: 'Timeout', error: 'too slow' },
      ])
    ).toBe('**a Result:**\none\n\n**b Error (Timeout):** too slow');
  });
});
