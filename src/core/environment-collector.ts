/**
 * Environment Snapshot Collector
 *
 * Gathers a point-in-time context map from independent probes. A failing
 * probe contributes a placeholder for its own key; the rest still run.
 * The snapshot is memoized until reset(), which the pipeline calls at the
 * start of every invocation.
 */

import * as os from 'node:os';
import { getHeapStatistics } from 'node:v8';
import type { Logger } from 'pino';
import { ENRICHMENT } from '../config/defaults.js';
import { ReporterError, toReporterError } from '../api/errors.js';
import type { EnvironmentSnapshot } from '../types/report.js';
import { notifyDegraded, type DegradationHandler } from '../utils/fail-safe.js';

/**
 * One zero-argument fact gatherer.
 */
export interface EnvironmentProbe {
  name: string;
  collect: () => unknown;
}

export interface AppFacts {
  version: string;
  hostVersion?: string;
  integrations: string[];
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Probes describing the Node.js runtime, the host and the application.
 */
export function createDefaultProbes(app: AppFacts): EnvironmentProbe[] {
  return [
    { name: 'node_version', collect: () => process.versions.node },
    { name: 'platform', collect: () => process.platform },
    { name: 'arch', collect: () => process.arch },
    { name: 'os_release', collect: () => os.release() },
    {
      name: 'heap_limit_mb',
      collect: () => Math.round(getHeapStatistics().heap_size_limit / BYTES_PER_MB),
    },
    { name: 'total_memory_mb', collect: () => Math.round(os.totalmem() / BYTES_PER_MB) },
    { name: 'cpu_count', collect: () => os.cpus().length },
    { name: 'app_version', collect: () => app.version },
    { name: 'host_version', collect: () => app.hostVersion ?? 'unknown' },
    { name: 'integrations', collect: () => [...app.integrations] },
    { name: 'pid', collect: () => process.pid },
    { name: 'uptime_seconds', collect: () => Math.round(process.uptime()) },
  ];
}

export interface EnvironmentCollectorOptions {
  probes: EnvironmentProbe[];
  logger?: Logger;
  onDegraded?: DegradationHandler;
}

export class EnvironmentCollector {
  private readonly probes: EnvironmentProbe[];
  private readonly logger?: Logger;
  private readonly onDegraded?: DegradationHandler;

  private snapshot: EnvironmentSnapshot | null = null;

  constructor(options: EnvironmentCollectorOptions) {
    this.probes = options.probes;
    this.logger = options.logger;
    this.onDegraded = options.onDegraded;
  }

  /**
   * Run every probe once and memoize the result.
   */
  public async collect(): Promise<EnvironmentSnapshot> {
    if (this.snapshot) {
      return this.snapshot;
    }

    const snapshot: EnvironmentSnapshot = {};

    for (const probe of this.probes) {
      try {
        snapshot[probe.name] = await probe.collect();
      } catch (error) {
        const cause = toReporterError(error, 'ProbeError');
        const probeError = new ReporterError('ProbeError', `Probe "${probe.name}" failed: ${cause.message}`, {
          probe: probe.name,
        });

        snapshot[probe.name] = `${ENRICHMENT.PROBE_PLACEHOLDER}: ${cause.message}`;
        this.logger?.warn({ probe: probe.name, err: cause.message }, 'Environment probe failed');
        notifyDegraded(this.onDegraded, probeError, `probe.${probe.name}`, this.logger);
      }
    }

    this.snapshot = snapshot;
    return snapshot;
  }

  public reset(): void {
    this.snapshot = null;
  }
}
