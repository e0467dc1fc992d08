#!/usr/bin/env node
import { loadConfig } from './config.js';
import { DispatchDriver } from './dispatch/driver.js';
import { DispatchSession } from './dispatch/session.js';
import { EmailOctopusClient } from './emailoctopus/client.js';
import { EXIT_CODE_FAILURE, exitCodeFor } from './exitCode.js';
import { ClubDataEventSource } from './events/clubData.js';
import { DeliveryLedger, LedgerCorruptionError } from './ledger/deliveryLedger.js';
import { logError, logFatal, logInfo, logWarn } from './logger.js';

async function main(): Promise<number> {
  const config = loadConfig();

  const emailOctopus = new EmailOctopusClient({
    apiBase: config.emailOctopus.apiBase,
    apiKey: config.emailOctopus.apiKey,
    listId: config.emailOctopus.listId,
    automationId: config.emailOctopus.automationId,
    requestTimeoutMs: config.emailOctopus.requestTimeoutMs,
    pageSize: config.emailOctopus.pageSize,
    subjectField: config.emailOctopus.subjectField,
    textField: config.emailOctopus.textField,
  });

  const session = new DispatchSession({
    events: new ClubDataEventSource(config.clubDataPath),
    ledger: new DeliveryLedger(config.ledgerPath),
    recipients: emailOctopus,
    driver: new DispatchDriver({
      transport: emailOctopus,
      maxAttempts: config.driver.maxAttempts,
      backoffUnitMs: config.driver.backoffUnitMs,
      maxBackoffMs: config.driver.maxBackoffMs,
    }),
    config: config.dispatch,
  });

  const controller = new AbortController();
  const cancel = (signal: string): void => {
    if (controller.signal.aborted) {
      return;
    }
    logWarn(`Received ${signal}; finishing in-flight deliveries and stopping`);
    controller.abort(new Error(`run cancelled by ${signal}`));
  };
  process.on('SIGINT', () => {
    cancel('SIGINT');
  });
  process.on('SIGTERM', () => {
    cancel('SIGTERM');
  });

  logInfo('Starting 50-point alert run');
  logInfo(`Club data: ${config.clubDataPath}`);
  logInfo(`Ledger: ${config.ledgerPath}`);
  logInfo(`Reference time zone: ${config.dispatch.timeZone}`);
  logInfo(`Freshness window: ${config.dispatch.freshnessWindowDays} day(s)`);
  logInfo(`Dry run: ${config.dispatch.dryRun}`);

  const report = await session.run(controller.signal);
  logInfo(`Run finished: ${report.status} (${report.reason}) via ${report.phases.join(' -> ')}`);
  return exitCodeFor(report);
}

void main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    if (error instanceof LedgerCorruptionError) {
      logFatal(error.message);
    } else {
      logError('Fatal error', error);
    }
    process.exit(EXIT_CODE_FAILURE);
  });
