import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runHealthchecks, dispatchExports } from '../../src/exporters/dispatch.js';
import type { Exporter, ExportResult, MeterReport } from '../../src/interfaces/exporter.js';
import { reading } from '../helpers/meter-test-utils.js';

vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'warn').mockImplementation(() => {});
const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

beforeEach(() => {
  consoleSpy.mockClear();
});

const REPORTS: MeterReport[] = [
  {
    meter: { id: '11201', type: 'water', name: 'Kitchen cold' },
    family: 'water_temperature',
    reading: reading(),
  },
];

function mockExporter(
  name: string,
  exportResult: ExportResult | Error = { success: true },
  healthcheckResult?: ExportResult | Error,
): Exporter {
  const exporter: Exporter = {
    name,
    export: vi.fn<(reports: MeterReport[]) => Promise<ExportResult>>().mockImplementation(async () => {
      if (exportResult instanceof Error) throw exportResult;
      return exportResult;
    }),
  };
  if (healthcheckResult !== undefined) {
    exporter.healthcheck = vi.fn<() => Promise<ExportResult>>().mockImplementation(async () => {
      if (healthcheckResult instanceof Error) throw healthcheckResult;
      return healthcheckResult;
    });
  }
  return exporter;
}

// ─── runHealthchecks ────────────────────────────────────────────────────────

describe('runHealthchecks()', () => {
  it('skips exporters without healthcheck', async () => {
    const e1 = mockExporter('webhook');
    const e2 = mockExporter('mqtt', { success: true }, { success: true });
    await runHealthchecks([e1, e2]);
    expect(e2.healthcheck).toHaveBeenCalledOnce();
  });

  it('does not throw on healthcheck failure or exception', async () => {
    const e1 = mockExporter('mqtt', { success: true }, { success: false, error: 'timeout' });
    const e2 = mockExporter('webhook', { success: true }, new Error('connection refused'));
    await expect(runHealthchecks([e1, e2])).resolves.toBeUndefined();
    expect(e1.healthcheck).toHaveBeenCalledOnce();
    expect(e2.healthcheck).toHaveBeenCalledOnce();
  });

  it('runs healthchecks in parallel', async () => {
    let concurrent = 0;
    let maxConcurrent = 0;

    const makeSlowHealthcheck = (name: string): Exporter => ({
      name,
      export: vi.fn(async () => ({ success: true })),
      healthcheck: vi.fn(async () => {
        concurrent++;
        maxConcurrent = Math.max(maxConcurrent, concurrent);
        await new Promise((r) => setTimeout(r, 50));
        concurrent--;
        return { success: true };
      }),
    });

    await runHealthchecks([makeSlowHealthcheck('a'), makeSlowHealthcheck('b')]);
    expect(maxConcurrent).toBe(2);
  });
});

// ─── dispatchExports ────────────────────────────────────────────────────────

describe('dispatchExports()', () => {
  it('returns true when all exports succeed', async () => {
    const e1 = mockExporter('mqtt');
    const e2 = mockExporter('webhook');
    const result = await dispatchExports([e1, e2], REPORTS);
    expect(result).toBe(true);
    expect(e1.export).toHaveBeenCalledWith(REPORTS);
    expect(e2.export).toHaveBeenCalledWith(REPORTS);
  });

  it('returns true when at least one export succeeds (partial failure)', async () => {
    const e1 = mockExporter('mqtt', { success: false, error: 'timeout' });
    const e2 = mockExporter('webhook');
    expect(await dispatchExports([e1, e2], REPORTS)).toBe(true);
    expect(consoleSpy).toHaveBeenCalledOnce();
  });

  it('returns false when all exports fail or throw', async () => {
    const e1 = mockExporter('mqtt', new Error('crash'));
    const e2 = mockExporter('webhook', { success: false, error: 'HTTP 500' });
    expect(await dispatchExports([e1, e2], REPORTS)).toBe(false);
    // one line per exporter plus the summary
    expect(consoleSpy).toHaveBeenCalledTimes(3);
  });

  it('does nothing without reports or exporters', async () => {
    const e1 = mockExporter('mqtt');
    expect(await dispatchExports([e1], [])).toBe(true);
    expect(await dispatchExports([], REPORTS)).toBe(true);
    expect(e1.export).not.toHaveBeenCalled();
  });

  it('runs exports in parallel', async () => {
    let concurrent = 0;
    let maxConcurrent = 0;

    const makeSlowExporter = (name: string): Exporter => ({
      name,
      export: vi.fn(async () => {
        concurrent++;
        maxConcurrent = Math.max(maxConcurrent, concurrent);
        await new Promise((r) => setTimeout(r, 50));
        concurrent--;
        return { success: true };
      }),
    });

    await dispatchExports([makeSlowExporter('a'), makeSlowExporter('b')], REPORTS);
    expect(maxConcurrent).toBe(2);
  });
});
