#!/usr/bin/env node
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { parseScript, runScript } from './cli/script-runner';
import { loadIssuerConfig } from './config/issuer-config';
import { RegistryHost } from './host';
import { BalanceLedger } from './ledger/balance-ledger';
import { StructuredLogger } from './logging/structured-logger';
import { FileSnapshotStore } from './storage';

dotenv.config();

function main(): void {
  const scriptPath = process.argv[2];
  if (!scriptPath) {
    console.error('Usage: item-issuer <script.json>');
    console.error('\nRuns a registry operation script. Set ITEM_ISSUER_DATA_DIR to keep state between runs.');
    process.exit(2);
  }

  const config = loadIssuerConfig();
  const log = new StructuredLogger({ minLevel: config.logLevel });

  log.info('Main', 'Starting item issuer', {
    dataDir: config.dataDir ?? '(in memory)',
    maxItems: config.maxItems,
    issuerFee: config.issuerFee,
    defaultLocation: config.defaultLocation,
  });

  const script = parseScript(JSON.parse(fs.readFileSync(scriptPath, 'utf8')));

  const ledger = new BalanceLedger();
  const host = RegistryHost.open({
    transfer: ledger,
    logger: log,
    snapshotStore: config.dataDir ? new FileSnapshotStore(config.dataDir, log) : undefined,
    parameters: {
      maxItems: config.maxItems,
      issuerFee: config.issuerFee,
      defaultLocation: config.defaultLocation,
    },
    startHeight: config.startHeight,
  });

  const summary = runScript(host, ledger, script, log);
  const chain = host.journal.verifyChain();

  log.info('Main', 'Script finished', {
    applied: summary.applied,
    rejected: summary.rejected,
    queries: summary.queries,
    height: summary.finalHeight,
    items: host.registry.getItemCount(),
    journalHead: host.journal.getHead().sequence,
    journalValid: chain.valid,
  });
}

try {
  main();
} catch (error) {
  console.error('FATAL ERROR:', error instanceof Error ? error.message : error);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
