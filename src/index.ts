/**
 * paper-sync entry point
 *
 * Logs go to stderr with a [Component] prefix; stdout carries only cycle
 * summaries and command output.
 *
 * Exit codes: 0 on normal completion, 1 on a configuration or fatal error,
 * 2 on bad command-line usage.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. PAPER_SYNC_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.PAPER_SYNC_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

import { createPipeline, createRecordWriter, openFailureLog, openLedger } from './app.js';
import { CliUsageError, HELP, parseArgs, type CliCommand } from './cli/args.js';
import { formatStatus } from './cli/status.js';
import { loadConfig, loadLedgerConfig } from './config/settings.js';
import { ConfigurationError, toErrorMessage } from './errors.js';
import { summarizeCycle } from './models/outcome.js';
import { migrateLegacyList } from './services/ledger/index.js';

async function runPipeline(once: boolean): Promise<void> {
  const config = loadConfig();
  const { orchestrator, ledger } = createPipeline(config, {
    onCycle: (report) => console.log(`${report.finishedAt} ${summarizeCycle(report)}`),
  });

  const controller = new AbortController();
  const handleShutdown = (signal: string): void => {
    if (controller.signal.aborted) {
      console.error(`[Shutdown] Received ${signal} again, exiting now`);
      process.exit(1);
    }
    console.error(`[Shutdown] Received ${signal}, finishing the current document...`);
    controller.abort();
  };
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('SIGINT', () => handleShutdown('SIGINT'));

  try {
    await orchestrator.start();
    if (once) {
      await orchestrator.runOnce(controller.signal);
    } else {
      await orchestrator.runContinuous(controller.signal);
    }
  } finally {
    await ledger.close();
  }
}

async function runCheckSchema(): Promise<void> {
  const writer = createRecordWriter(loadConfig());
  const report = await writer.verifySchema();
  console.log(`Notion database "${report.title}" (${report.databaseId}) has every mapped property:`);
  for (const name of report.properties) {
    console.log(`  - ${name}`);
  }
}

async function runStatus(): Promise<void> {
  const config = loadLedgerConfig();
  const ledger = openLedger(config);
  const failures = openFailureLog(config);
  try {
    await ledger.load();
    await failures.load();
    console.log(formatStatus(ledger.location, ledger.entries(), failures.location, failures.list()));
  } finally {
    await ledger.close();
  }
}

async function runMigrate(filePath: string): Promise<void> {
  const ledger = openLedger(loadLedgerConfig());
  try {
    await ledger.load();
    const result = await migrateLegacyList(ledger, filePath);
    console.log(
      `Imported ${result.imported} id(s) from ${filePath} (${result.alreadyPresent} already present), ` +
        `ledger now holds ${ledger.size}`
    );
  } finally {
    await ledger.close();
  }
}

async function dispatch(command: CliCommand): Promise<void> {
  switch (command.kind) {
    case 'help':
      console.log(HELP);
      return;
    case 'check-schema':
      return runCheckSchema();
    case 'status':
      return runStatus();
    case 'migrate-legacy':
      return runMigrate(command.path);
    case 'run':
      return runPipeline(command.once);
  }
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.log(HELP);
      process.exit(2);
    }
    throw error;
  }

  await dispatch(command);
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`[FATAL] ${error.message}`);
    } else {
      console.error('Fatal error:', error instanceof Error ? (error.stack ?? error.message) : toErrorMessage(error));
    }
    process.exit(1);
  });
