#!/usr/bin/env node

// Load .env FIRST, before any other module initializes
import './env.js';

import { createAdvertisementSource } from './ble/index.js';
import { loadConfig } from './config/load.js';
import { logCounterChanges } from './counter-log.js';
import { createExporters, runHealthchecks } from './exporters/index.js';
import { createLogger, parseLogLevel, setLogLevel, LogLevel } from './logger.js';
import { ScanOrchestrator } from './orchestrator.js';
import { ReadingPublisher } from './publisher.js';
import { errMsg } from './utils/error.js';

const log = createLogger('Sync');

// ─── Abort / signal handling ─────────────────────────────────────────────────

const ac = new AbortController();
const { signal } = ac;
let forceExitOnNext = false;

function onSignal(): void {
  if (forceExitOnNext) {
    log.info('Force exit.');
    process.exit(1);
  }
  forceExitOnNext = true;
  log.info('\nShutting down gracefully... (press again to force exit)');
  ac.abort();
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

function waitForAbort(): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

// ─── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadConfig();
  const level = parseLogLevel(config.runtime.log_level);
  if (level !== null) setLogLevel(level);
  else if (config.runtime.debug) setLogLevel(LogLevel.DEBUG);

  const { dry_run: dryRun, publish_interval: publishInterval } = config.runtime;
  log.info(`\nElehant Meter Sync${dryRun ? ' (dry run)' : ''}`);
  for (const meter of config.meters) {
    log.info(`  ${meter.name}: ${meter.type} meter ${meter.id}`);
  }

  const source = await createAdvertisementSource({
    driver: config.ble.driver,
    adapter: config.ble.adapter,
  });
  const orchestrator = new ScanOrchestrator({
    source,
    meters: config.meters,
    backoff: {
      initialMs: config.scan.restart_initial_ms,
      maxMs: config.scan.restart_max_ms,
    },
    stopTimeoutMs: config.scan.stop_timeout_ms,
  });

  orchestrator.store.subscribe(logCounterChanges(orchestrator.configuredMeters, log));

  let publisher: ReadingPublisher | undefined;
  if (dryRun) {
    log.info('Dry run: readings are logged but not exported.');
  } else if (config.exporters.length === 0) {
    log.warn('No exporters configured; readings are only logged.');
  } else {
    const exporters = createExporters(config.exporters);
    await runHealthchecks(exporters);
    publisher = new ReadingPublisher({
      store: orchestrator.store,
      meters: orchestrator.configuredMeters,
      exporters,
      intervalMs: publishInterval * 1000,
    });
  }

  if (signal.aborted) return;
  await orchestrator.start();
  publisher?.start();

  await waitForAbort();

  await orchestrator.stop();
  if (publisher) await publisher.stop();
  log.info('Stopped.');
}

main().catch((err: unknown) => {
  log.error(errMsg(err));
  process.exit(1);
});
