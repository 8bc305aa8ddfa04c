/**
 * Composition root: builds the pipeline from configuration
 *
 * @module app
 */

import { resolveLedgerPath, type AppConfig, type LedgerConfig } from './config/settings.js';
import { DocumentLister, GoogleDriveSource, createDriveAuth } from './services/drive/index.js';
import { ContentExtractor, PdfjsTextReader } from './services/extraction/index.js';
import { CircuitBreaker, GenAiModel, SummarizerClient } from './services/gemini/index.js';
import { createFailureLog, createLedger, type FailureLog, type Ledger } from './services/ledger/index.js';
import { NotionHttpApi, RecordWriter } from './services/notion/index.js';
import { PipelineOrchestrator, type OrchestratorOptions } from './services/pipeline/index.js';
import { SlidingWindowRateLimiter } from './utils/rate-limiter.js';

export interface Pipeline {
  orchestrator: PipelineOrchestrator;
  ledger: Ledger;
  failures: FailureLog;
  writer: RecordWriter;
}

export function openLedger(config: LedgerConfig): Ledger {
  return createLedger(config.backend, resolveLedgerPath(config));
}

export function openFailureLog(config: LedgerConfig): FailureLog {
  return createFailureLog(resolveLedgerPath(config));
}

export function createRecordWriter(config: AppConfig): RecordWriter {
  const api = new NotionHttpApi({
    apiKey: config.notion.apiKey,
    requestTimeoutMs: config.notion.requestTimeoutMs,
  });
  const limiter = new SlidingWindowRateLimiter({
    maxRequests: config.notion.requestsPerSecond,
    windowMs: 1000,
    name: 'NotionRateLimiter',
  });
  return new RecordWriter(api, limiter, {
    databaseId: config.notion.databaseId,
    retry: config.notion.retry,
  });
}

export function createPipeline(config: AppConfig, hooks: Pick<OrchestratorOptions, 'onCycle'> = {}): Pipeline {
  const ledger = openLedger(config.ledger);
  const failures = openFailureLog(config.ledger);

  const source = GoogleDriveSource.fromAuth(createDriveAuth(config.drive), {
    requestTimeoutMs: config.drive.requestTimeoutMs,
  });

  const summarizer = new SummarizerClient(
    new GenAiModel({
      apiKey: config.gemini.apiKey,
      model: config.gemini.model,
      temperature: config.gemini.temperature,
      maxOutputTokens: config.gemini.maxOutputTokens,
    }),
    new SlidingWindowRateLimiter({
      maxRequests: config.gemini.requestsPerMinute,
      windowMs: 60_000,
      name: 'GeminiRateLimiter',
    }),
    new CircuitBreaker(config.gemini.circuitBreaker),
    { requestTimeoutMs: config.gemini.requestTimeoutMs, retry: config.gemini.retry }
  );

  const writer = createRecordWriter(config);

  const orchestrator = new PipelineOrchestrator(
    {
      ledger,
      lister: new DocumentLister(source),
      extractor: new ContentExtractor(source, new PdfjsTextReader(), config.extraction),
      summarizer,
      writer,
      failures,
    },
    {
      folderId: config.drive.folderId,
      intervalMs: config.pipeline.intervalSeconds * 1000,
      documentDelayMs: config.pipeline.documentDelayMs,
      onCycle: hooks.onCycle,
    }
  );

  return { orchestrator, ledger, failures, writer };
}
