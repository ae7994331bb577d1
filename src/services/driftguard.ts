// DriftGuard API client
// Read-only status calls plus the manual analysis trigger, each bounded by a timeout

import { z } from 'zod';
import { env } from '../env.js';
import { createLogger } from '../logger.js';

const log = createLogger({ module: 'driftguard' });

// The service encodes empty lists and unset fields as null; treat them as absent
function orDefault<T extends z.ZodTypeAny>(schema: T, fallback: z.input<T>) {
  return z.preprocess(value => value ?? fallback, schema);
}

const HealthSchema = z.object({
  status: orDefault(z.string(), 'unknown'),
  message: orDefault(z.string(), 'No message'),
  time: orDefault(z.string(), 'Unknown'),
});

const StatisticsSchema = z.object({
  statistics: orDefault(
    z.object({
      total_records: orDefault(z.number(), 0),
      active_drift: orDefault(z.number(), 0),
      resolved_drift: orDefault(z.number(), 0),
      no_drift: orDefault(z.number(), 0),
      active_percentage: orDefault(z.number(), 0),
      resolved_percentage: orDefault(z.number(), 0),
      recent_active_drift: orDefault(z.number(), 0),
      recent_resolutions: orDefault(z.number(), 0),
    }),
    {}
  ),
});

const DriftChangeSchema = z.object({
  field: orDefault(z.string(), 'Unknown'),
  from: z.unknown().optional(),
  to: z.unknown().optional(),
  severity: orDefault(z.string(), 'unknown'),
});

const DriftRecordSchema = z.object({
  resource_id: orDefault(z.string(), 'Unknown'),
  kind: orDefault(z.string(), 'Unknown'),
  namespace: orDefault(z.string(), 'Unknown'),
  name: orDefault(z.string(), 'Unknown'),
  first_detected: orDefault(z.string(), 'Unknown'),
  drift_details: orDefault(z.array(DriftChangeSchema), []),
});

const DriftRecordListSchema = z.object({
  drift_records: orDefault(z.array(DriftRecordSchema), []),
  count: z.number().nullish(),
});

const AnalysisSchema = z.object({
  status: orDefault(z.string(), 'unknown'),
  message: orDefault(z.string(), 'No message'),
});

export type DriftHealth = z.infer<typeof HealthSchema>;
export type DriftStatistics = z.infer<typeof StatisticsSchema>['statistics'];
export type DriftChange = z.infer<typeof DriftChangeSchema>;
export type DriftRecord = z.infer<typeof DriftRecordSchema>;
export type DriftRecordList = { records: DriftRecord[]; count: number };
export type AnalysisTrigger = z.infer<typeof AnalysisSchema>;

export class DriftGuardError extends Error {
  constructor(public readonly endpoint: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DriftGuardError';
  }
}

export interface DriftGuardClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export class DriftGuardClient {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: DriftGuardClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? env.DRIFTGUARD_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? env.DRIFTGUARD_TIMEOUT_MS;
  }

  get url(): string {
    return this.baseUrl;
  }

  async getHealth(signal?: AbortSignal): Promise<DriftHealth> {
    return HealthSchema.parse(await this.request('GET', '/health', signal));
  }

  async getStatistics(signal?: AbortSignal): Promise<DriftStatistics> {
    const payload = StatisticsSchema.parse(await this.request('GET', '/api/v1/statistics', signal));
    return payload.statistics;
  }

  async getDriftRecords(signal?: AbortSignal): Promise<DriftRecordList> {
    return this.getRecordList('/api/v1/drift-records', signal);
  }

  async getActiveDrift(signal?: AbortSignal): Promise<DriftRecordList> {
    return this.getRecordList('/api/v1/drift-records/active', signal);
  }

  async getResolvedDrift(signal?: AbortSignal): Promise<DriftRecordList> {
    return this.getRecordList('/api/v1/drift-records/resolved', signal);
  }

  async triggerAnalysis(signal?: AbortSignal): Promise<AnalysisTrigger> {
    return AnalysisSchema.parse(await this.request('POST', '/api/v1/analyze', signal));
  }

  private async getRecordList(endpoint: string, signal?: AbortSignal): Promise<DriftRecordList> {
    const payload = DriftRecordListSchema.parse(await this.request('GET', endpoint, signal));
    return {
      records: payload.drift_records,
      count: payload.count ?? payload.drift_records.length,
    };
  }

  private async request(method: 'GET' | 'POST', endpoint: string, signal?: AbortSignal): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, {
        method,
        headers: { Accept: 'application/json' },
        signal: combined,
      });
    } catch (error) {
      if (timeout.aborted) {
        log.warn({ endpoint, timeoutMs: this.timeoutMs }, 'DriftGuard request timed out');
        throw new DriftGuardError(endpoint, `DriftGuard request to ${endpoint} timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      log.warn({ endpoint, err: error }, 'DriftGuard request failed');
      throw new DriftGuardError(endpoint, `DriftGuard service unavailable at ${this.baseUrl}`, { cause: error });
    }

    if (!response.ok) {
      throw new DriftGuardError(endpoint, `DriftGuard error (${response.status}) on ${endpoint}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new DriftGuardError(endpoint, `DriftGuard returned invalid JSON on ${endpoint}`, { cause: error });
    }
  }
}

// ---------------------------------------------------------------------------
// Text renderers shared by the tools and the status route
// ---------------------------------------------------------------------------

export const MAX_LISTED_RECORDS = 5;
export const MAX_LISTED_CHANGES = 3;

export function alertLevel(activePercentage: number): 'HIGH' | 'MEDIUM' | 'LOW' {
  if (activePercentage > 50) return 'HIGH';
  if (activePercentage > 20) return 'MEDIUM';
  return 'LOW';
}

export function formatStatistics(stats: DriftStatistics): string {
  return [
    '📊 **DriftGuard Statistics Summary**',
    '',
    '🔍 **Overview:**',
    `- Total Records: ${stats.total_records}`,
    `- Active Drift: ${stats.active_drift} (${stats.active_percentage.toFixed(1)}%)`,
    `- Resolved Drift: ${stats.resolved_drift} (${stats.resolved_percentage.toFixed(1)}%)`,
    `- No Drift: ${stats.no_drift}`,
    '',
    '⚠️ **Current Status:**',
    `- Recent Active Drift: ${stats.recent_active_drift}`,
    `- Recent Resolutions: ${stats.recent_resolutions}`,
    '',
    `🚨 **Alert Level:** ${alertLevel(stats.active_percentage)}`,
  ].join('\n');
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) return 'Unknown';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function formatActiveDrift(list: DriftRecordList): string {
  if (list.count === 0) {
    return '✅ **No Active Configuration Drift Detected**\n\nAll monitored resources are in sync with their desired state in Git.';
  }

  const lines: string[] = [`🚨 **Active Configuration Drift Detected** (${list.count} resources)`, ''];

  list.records.slice(0, MAX_LISTED_RECORDS).forEach((record, idx) => {
    lines.push(`**${idx + 1}. ${record.kind}: ${record.name}** (Namespace: ${record.namespace})`);
    lines.push(`   - Resource ID: ${record.resource_id}`);
    lines.push(`   - First Detected: ${record.first_detected}`);

    if (record.drift_details.length > 0) {
      lines.push('   - Changes Detected:');
      for (const change of record.drift_details.slice(0, MAX_LISTED_CHANGES)) {
        lines.push(
          `     • ${change.field}: ${formatValue(change.from)} → ${formatValue(change.to)} (Severity: ${change.severity})`
        );
      }
    }
    lines.push('');
  });

  if (list.count > MAX_LISTED_RECORDS) {
    lines.push(`... and ${list.count - MAX_LISTED_RECORDS} more records. Use the DriftGuard API directly for complete details.`);
  }

  return lines.join('\n').trimEnd();
}

export function formatHealth(health: DriftHealth): string {
  const body = `Status: ${health.status}\nMessage: ${health.message}\nLast Check: ${health.time}`;
  if (health.status === 'healthy') {
    return `✅ **DriftGuard Service is HEALTHY**\n\n${body}`;
  }
  return `⚠️ **DriftGuard Service Status: ${health.status}**\n\n${body}`;
}

export function formatAnalysisTrigger(result: AnalysisTrigger): string {
  return [
    '🔄 **Drift Analysis Triggered**',
    '',
    `Status: ${result.status}`,
    `Message: ${result.message}`,
    '',
    'The analysis is now running in the background. Check drift statistics in a few moments for updated results.',
  ].join('\n');
}
