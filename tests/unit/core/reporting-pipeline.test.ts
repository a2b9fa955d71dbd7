import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createRequiredFieldsValidator } from '../../../src/api/validators.js';
import { DuplicateFilter } from '../../../src/core/duplicate-filter.js';
import { EnvironmentCollector } from '../../../src/core/environment-collector.js';
import { LogTailReader } from '../../../src/core/log-tail-reader.js';
import { RateLimiter } from '../../../src/core/rate-limiter.js';
import {
  ReportingPipeline,
  createReferenceId,
  relativeFilePath,
  type ReportingPipelineDependencies,
  type ReportingPipelineOptions,
} from '../../../src/core/reporting-pipeline.js';
import { MemoryDedupStore, MemoryRateCounterStore } from '../../../src/storage/memory-store.js';
import type { DedupStore, RateCounterStore } from '../../../src/storage/types.js';
import type { ErrorReportInput } from '../../../src/types/report.js';
import type { DegradationHandler } from '../../../src/utils/fail-safe.js';
import {
  FailingDedupStore,
  FailingRateCounterStore,
  START_MS,
  START_SECONDS,
  createClock,
  createSink,
} from '../../helpers/reporter-fakes.js';

interface SetupOptions {
  accept?: boolean;
  maxPerWindow?: number;
  dedupStore?: DedupStore;
  rateStore?: RateCounterStore;
  deps?: Partial<ReportingPipelineDependencies>;
  options?: Partial<ReportingPipelineOptions>;
}

const setup = (setupOptions: SetupOptions = {}) => {
  const clock = createClock();
  const onDegraded = vi.fn<DegradationHandler>();
  const dedupStore = setupOptions.dedupStore ?? new MemoryDedupStore();
  const rateStore = setupOptions.rateStore ?? new MemoryRateCounterStore({ now: clock.now });
  const { sink, send, sent } = createSink(setupOptions.accept ?? true);
  const region = vi.fn(() => 'eu-west');

  const duplicateFilter = new DuplicateFilter({ store: dedupStore, now: clock.now, onDegraded });
  const rateLimiter = new RateLimiter({
    store: rateStore,
    tenantId: 'site-a',
    maxPerWindow: setupOptions.maxPerWindow ?? 5,
    windowSeconds: 600,
    now: clock.now,
    onDegraded,
  });
  const environment = new EnvironmentCollector({ probes: [{ name: 'region', collect: region }], onDegraded });

  const pipeline = new ReportingPipeline(
    {
      validator: createRequiredFieldsValidator(),
      duplicateFilter,
      rateLimiter,
      environment,
      sink,
      ...setupOptions.deps,
    },
    {
      site: { id: 'site-a', url: 'https://site-a.example.com', projectRoot: '/srv/app' },
      now: clock.now,
      onDegraded,
      ...setupOptions.options,
    }
  );

  const counter = (): Promise<number> => rateStore.get(rateLimiter.getKey());

  return { clock, pipeline, duplicateFilter, rateLimiter, dedupStore, rateStore, send, sent, region, onDegraded, counter };
};

const incident = (overrides: ErrorReportInput = {}): ErrorReportInput => ({
  message: 'Fatal: null pointer',
  code: 500,
  file: '/srv/app/src/checkout.ts',
  line: 10,
  ...overrides,
});

describe('relativeFilePath', () => {
  it('strips the project root', () => {
    expect(relativeFilePath('/srv/app/src/a.ts', '/srv/app')).toBe('src/a.ts');
    expect(relativeFilePath('/srv/app/src/a.ts', '/srv/app/')).toBe('src/a.ts');
  });

  it('leaves paths outside the root unchanged', () => {
    expect(relativeFilePath('/srv/application/a.ts', '/srv/app')).toBe('/srv/application/a.ts');
    expect(relativeFilePath('/opt/lib/a.ts', '/srv/app')).toBe('/opt/lib/a.ts');
    expect(relativeFilePath('/srv/app/a.ts')).toBe('/srv/app/a.ts');
  });
});

describe('createReferenceId', () => {
  it('hashes site, location and time into 8 characters', () => {
    const expected = createHash('md5').update('site-a|a.ts|3|1000').digest('hex').slice(0, 8);

    expect(createReferenceId('site-a', 'a.ts', 3, 1000)).toBe(expected);
  });
});

describe('ReportingPipeline', () => {
  describe('delivery', () => {
    it('delivers a new report and records it', async () => {
      const { pipeline, send, sent, dedupStore, duplicateFilter, counter } = setup();

      const outcome = await pipeline.run(incident());

      expect(outcome.state).toBe('delivered');
      expect(outcome.ok).toBe(true);
      expect(outcome.trail).toEqual([
        'received',
        'validated',
        'dedup_checked',
        'rate_checked',
        'enriched',
        'delivered',
      ]);
      expect(send).toHaveBeenCalledTimes(1);

      const signature = duplicateFilter.signature({
        message: 'Fatal: null pointer',
        code: 500,
        file: '/srv/app/src/checkout.ts',
        line: 10,
      });
      expect(outcome.signature).toBe(signature);
      expect(await dedupStore.get(signature)).toBe(START_SECONDS);
      expect(await counter()).toBe(1);

      expect(sent[0]).toEqual({
        errorMessage: 'Fatal: null pointer',
        errorCode: 500,
        errorFile: '/srv/app/src/checkout.ts',
        relativeFilePath: 'src/checkout.ts',
        errorLine: 10,
        severity: 'high',
        referenceId: createReferenceId('site-a', '/srv/app/src/checkout.ts', 10, START_MS),
        signature,
        timestamp: '2023-11-14T22:13:20.000Z',
        siteId: 'site-a',
        siteUrl: 'https://site-a.example.com',
        stackTrace: undefined,
        environment: { region: 'eu-west' },
        logTail: '',
        extra: {},
      });
      expect(outcome.referenceId).toBe(sent[0].referenceId);
      expect(outcome.severity).toBe('high');
    });

    it('fails without recording when the sink declines', async () => {
      const { pipeline, dedupStore, counter } = setup({ accept: false });

      const outcome = await pipeline.run(incident());

      expect(outcome.state).toBe('failed');
      expect(outcome.ok).toBe(false);
      expect(outcome.error?.code).toBe('DeliveryError');
      expect(outcome.error?.message).toBe('Delivery sink rejected the report');
      expect(await dedupStore.getAll()).toEqual({});
      expect(await counter()).toBe(0);
    });

    it('fails when the sink throws', async () => {
      const { pipeline, dedupStore } = setup({
        deps: {
          sink: {
            send: async () => {
              throw new Error('smtp down');
            },
          },
        },
      });

      const outcome = await pipeline.run(incident());

      expect(outcome.state).toBe('failed');
      expect(outcome.trail.at(-2)).toBe('enriched');
      expect(outcome.error?.code).toBe('DeliveryError');
      expect(outcome.error?.message).toBe('smtp down');
      expect(await dedupStore.getAll()).toEqual({});
    });
  });

  describe('validation', () => {
    it('rejects incomplete reports before touching any store', async () => {
      const dedupStore = new MemoryDedupStore();
      const getAll = vi.spyOn(dedupStore, 'getAll');
      const { pipeline, send, region, counter } = setup({ dedupStore });

      const outcome = await pipeline.run({ message: 'boom', code: 500, file: 'a.ts' });

      expect(outcome).toMatchObject({
        state: 'rejected',
        ok: false,
        reason: 'validation',
        issues: ["Required field 'line' is missing"],
        trail: ['received', 'rejected'],
      });
      expect(outcome.error?.code).toBe('ValidationError');
      expect(getAll).not.toHaveBeenCalled();
      expect(region).not.toHaveBeenCalled();
      expect(send).not.toHaveBeenCalled();
      expect(await counter()).toBe(0);
    });

    it('rejects a message made only of markup', async () => {
      const { pipeline, send, counter } = setup();

      const outcome = await pipeline.run(incident({ message: '<b></b>' }));

      expect(outcome.state).toBe('rejected');
      expect(outcome.reason).toBe('validation');
      expect(outcome.issues).toEqual(["Required field 'message' is missing"]);
      expect(send).not.toHaveBeenCalled();
      expect(await counter()).toBe(0);
    });

    it('rejects when a custom validator throws', async () => {
      const { pipeline, send } = setup({
        deps: {
          validator: () => {
            throw new Error('bad rules');
          },
        },
      });

      const outcome = await pipeline.run(incident());

      expect(outcome.reason).toBe('validation');
      expect(outcome.issues).toEqual(['Validator failed: bad rules']);
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe('duplicate suppression', () => {
    it('skips a repeat without consuming rate budget', async () => {
      const { pipeline, rateLimiter, send, counter } = setup();

      await pipeline.run(incident());
      const canSend = vi.spyOn(rateLimiter, 'canSend');
      const increment = vi.spyOn(rateLimiter, 'increment');
      const outcome = await pipeline.run(incident());

      expect(canSend).not.toHaveBeenCalled();
      expect(increment).not.toHaveBeenCalled();

      expect(outcome.state).toBe('skipped');
      expect(outcome.ok).toBe(true);
      expect(outcome.trail).toEqual(['received', 'validated', 'dedup_checked', 'skipped']);
      expect(send).toHaveBeenCalledTimes(1);
      expect(await counter()).toBe(1);
    });

    it('lets critical reports through again', async () => {
      const { pipeline, send } = setup();

      await pipeline.run(incident({ isCritical: true }));
      const outcome = await pipeline.run(incident({ isCritical: true }));

      expect(outcome.state).toBe('delivered');
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('uses the injected bypass predicate', async () => {
      const { pipeline, send } = setup({
        options: { bypassDuplicate: (report) => report.line === 10 },
      });

      await pipeline.run(incident());
      await pipeline.run(incident());
      await pipeline.run(incident({ line: 11 }));
      const outcome = await pipeline.run(incident({ line: 11 }));

      expect(outcome.state).toBe('skipped');
      expect(send).toHaveBeenCalledTimes(3);
    });

    it('reports again once the tracking window has passed', async () => {
      const { pipeline, clock, send } = setup();

      await pipeline.run(incident());
      clock.advanceSeconds(604_800);
      const outcome = await pipeline.run(incident());

      expect(outcome.state).toBe('delivered');
      expect(send).toHaveBeenCalledTimes(2);
    });
  });

  describe('rate limiting', () => {
    it('rejects distinct reports over the window limit', async () => {
      const { pipeline, send, region } = setup({ maxPerWindow: 1 });

      await pipeline.run(incident({ line: 1 }));
      const outcome = await pipeline.run(incident({ line: 2 }));

      expect(outcome.state).toBe('rejected');
      expect(outcome.reason).toBe('rate_limited');
      expect(outcome.trail).toEqual(['received', 'validated', 'dedup_checked', 'rejected']);
      expect(outcome.error?.toObject()).toEqual({
        code: 'RateLimited',
        message: 'Rate limit exceeded',
        details: { remaining: 0, windowExpires: START_SECONDS + 600 },
      });
      expect(send).toHaveBeenCalledTimes(1);
      expect(region).toHaveBeenCalledTimes(1);
    });

    it('resets the window for a critical report', async () => {
      const { pipeline, send, counter } = setup({ maxPerWindow: 1 });

      await pipeline.run(incident({ line: 1 }));
      const outcome = await pipeline.run(incident({ line: 2, isCritical: true }));

      expect(outcome.state).toBe('delivered');
      expect(send).toHaveBeenCalledTimes(2);
      expect(await counter()).toBe(1);
    });

    it('uses the injected reset predicate', async () => {
      const { pipeline } = setup({
        maxPerWindow: 1,
        options: { forceRateReset: () => false },
      });

      await pipeline.run(incident({ line: 1 }));
      const outcome = await pipeline.run(incident({ line: 2, isCritical: true }));

      expect(outcome.reason).toBe('rate_limited');
    });
  });

  describe('enrichment', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'faultline-pipeline-'));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('attaches the log tail when configured', async () => {
      const logPath = join(dir, 'debug.log');
      writeFileSync(logPath, 'a\nb\nc\n', 'utf8');
      const { pipeline, sent } = setup({
        deps: { logTailReader: new LogTailReader() },
        options: { logTail: { enabled: true, path: logPath, lines: 2 } },
      });

      await pipeline.run(incident());

      expect(sent[0].logTail).toBe('b\nc');
    });

    it('skips the log tail when disabled', async () => {
      const logPath = join(dir, 'disabled.log');
      writeFileSync(logPath, 'a\nb\n', 'utf8');
      const { pipeline, sent } = setup({
        deps: { logTailReader: new LogTailReader() },
        options: { logTail: { enabled: false, path: logPath } },
      });

      await pipeline.run(incident());

      expect(sent[0].logTail).toBe('');
    });

    it('sanitizes the message and classifies severity', async () => {
      const { pipeline, sent } = setup();

      const outcome = await pipeline.run(
        incident({ message: '<b>Notice:</b>   undefined index', code: 'E_NOTICE', extra: { userId: 7 } })
      );

      expect(sent[0].errorMessage).toBe('Notice: undefined index');
      expect(sent[0].severity).toBe('low');
      expect(sent[0].extra).toEqual({ userId: 7 });
      expect(outcome.severity).toBe('low');
    });

    it('applies the payload transform', async () => {
      const { pipeline, sent } = setup({
        options: { transformPayload: (payload) => ({ ...payload, errorMessage: '[redacted]' }) },
      });

      await pipeline.run(incident());

      expect(sent[0].errorMessage).toBe('[redacted]');
    });

    it('keeps the original payload when the transform throws', async () => {
      const { pipeline, sent, onDegraded } = setup({
        options: {
          transformPayload: () => {
            throw new Error('template missing');
          },
        },
      });

      const outcome = await pipeline.run(incident());

      expect(outcome.state).toBe('delivered');
      expect(sent[0].errorMessage).toBe('Fatal: null pointer');
      expect(onDegraded).toHaveBeenCalledTimes(1);
      expect(onDegraded.mock.calls[0][1]).toBe('payload.transform');
    });

    it('collects the environment once per run', async () => {
      const { pipeline, region } = setup();

      await pipeline.run(incident({ line: 1 }));
      await pipeline.run(incident({ line: 2 }));

      expect(region).toHaveBeenCalledTimes(2);
    });
  });

  describe('degraded collaborators', () => {
    it('delivers when both stores are down', async () => {
      const { pipeline, send, onDegraded } = setup({
        dedupStore: new FailingDedupStore(),
        rateStore: new FailingRateCounterStore(),
      });

      const outcome = await pipeline.run(incident());

      expect(outcome.state).toBe('delivered');
      expect(send).toHaveBeenCalledTimes(1);
      expect(onDegraded.mock.calls.map(([, operation]) => operation)).toEqual([
        'dedup.isDuplicate',
        'rate.canSend',
        'dedup.markReported',
        'rate.increment',
      ]);
    });

    it('substitutes placeholders for failing probes', async () => {
      const { pipeline, sent } = setup({
        deps: {
          environment: new EnvironmentCollector({
            probes: [
              {
                name: 'db_version',
                collect: () => {
                  throw new Error('no access');
                },
              },
            ],
          }),
        },
      });

      await pipeline.run(incident());

      expect(sent[0].environment).toEqual({ db_version: 'unavailable: no access' });
    });
  });
});
