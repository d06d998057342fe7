import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';
import type { Exporter, MeterReport } from '../interfaces/exporter.js';

const log = createLogger('Sync');

/**
 * Run healthchecks on all exporters that support them.
 * Results are logged as warnings (non-fatal).
 */
export async function runHealthchecks(exporters: Exporter[]): Promise<void> {
  const withHealthcheck = exporters.filter(
    (e): e is Exporter & { healthcheck: NonNullable<Exporter['healthcheck']> } =>
      typeof e.healthcheck === 'function',
  );

  if (withHealthcheck.length === 0) return;

  log.info('Running exporter healthchecks...');
  const results = await Promise.allSettled(withHealthcheck.map((e) => e.healthcheck()));

  results.forEach((result, i) => {
    const name = withHealthcheck[i].name;
    if (result.status === 'fulfilled' && result.value.success) {
      log.info(`  ${name}: OK`);
    } else if (result.status === 'fulfilled') {
      log.warn(`  ${name}: ${result.value.error}`);
    } else {
      log.warn(`  ${name}: ${errMsg(result.reason)}`);
    }
  });
}

/**
 * Send a batch of meter reports to every exporter in parallel.
 * Returns true if at least one exporter succeeded, false if all failed.
 */
export async function dispatchExports(
  exporters: Exporter[],
  reports: MeterReport[],
): Promise<boolean> {
  if (exporters.length === 0 || reports.length === 0) return true;

  log.info(
    `Exporting ${reports.length} reading(s) to: ${exporters.map((e) => e.name).join(', ')}...`,
  );

  const results = await Promise.allSettled(exporters.map((e) => e.export(reports)));

  let allFailed = true;
  results.forEach((result, i) => {
    const name = exporters[i].name;
    if (result.status === 'fulfilled' && result.value.success) {
      allFailed = false;
    } else if (result.status === 'fulfilled') {
      log.error(`${name}: ${result.value.error}`);
    } else {
      log.error(`${name}: ${errMsg(result.reason)}`);
    }
  });

  if (allFailed) {
    log.error('All exports failed.');
    return false;
  }

  log.info('Done.');
  return true;
}
