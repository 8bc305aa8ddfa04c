/**
 * Pipeline Orchestrator
 *
 * One cycle: Listing → Filtering → Processing(doc_1..doc_n) → Idle.
 * Documents are processed one at a time; each ends in exactly one outcome and
 * a failure never leaves its own document. Per document:
 *   Extracting → Summarizing → Writing → Marking → Done
 * with early exits to Skipped (no usable text) and Failed (ContentError,
 * retries exhausted, unexpected error). ConfigurationError halts the run.
 * Skipped and Failed outcomes go to the failure log; Done clears the entry.
 *
 * A summary is kept in memory until its document is marked, so a document
 * that fails while writing is not summarized again on the next cycle.
 *
 * Cancellation is cooperative. The signal is checked at the top of a cycle,
 * before each document and during sleeps; a document already in flight runs
 * until its mark (or its failure) completes.
 *
 * @module services/pipeline/orchestrator
 */

import { v4 as uuidv4 } from 'uuid';

import {
  ConfigurationError,
  ContentError,
  TransientError,
  isRetryable,
  toErrorMessage,
} from '../../errors.js';
import type { DocumentRef } from '../../models/document.js';
import {
  summarizeCycle,
  type CycleReport,
  type DocumentOutcome,
} from '../../models/outcome.js';
import type { SummaryRecord } from '../../models/summary.js';
import { withRetry, type BackoffConfig } from '../../utils/backoff.js';
import { sleep as abortableSleep } from '../../utils/sleep.js';
import type { DocumentLister } from '../drive/lister.js';
import type { ContentExtractor } from '../extraction/extractor.js';
import { formatSummarizerHealth, type SummarizerClient } from '../gemini/summarizer.js';
import type { FailureLog } from '../ledger/failure-log.js';
import type { Ledger } from '../ledger/ledger.js';
import type { RecordWriter } from '../notion/writer.js';

export interface PipelineComponents {
  ledger: Ledger;
  lister: Pick<DocumentLister, 'list'>;
  extractor: Pick<ContentExtractor, 'extract'>;
  summarizer: Pick<SummarizerClient, 'summarize' | 'health'>;
  writer: Pick<RecordWriter, 'upsert'>;
  failures: Pick<FailureLog, 'isLoaded' | 'load' | 'record' | 'clear'>;
}

export interface OrchestratorOptions {
  folderId: string;
  /** Pause between cycles in continuous mode */
  intervalMs: number;
  /** Pause between documents within a cycle */
  documentDelayMs?: number;
  /** Backoff for listing and downloads */
  retry?: Partial<BackoffConfig>;
  /** Replaceable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  clock?: () => Date;
  /** Summaries held for documents that have not been marked yet */
  summaryCacheSize?: number;
  /** Called with every finished cycle */
  onCycle?: (report: CycleReport) => void;
}

const DEFAULT_SUMMARY_CACHE_SIZE = 50;

export class PipelineOrchestrator {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly clock: () => Date;
  private readonly summaries = new Map<string, SummaryRecord>();

  constructor(
    private readonly components: PipelineComponents,
    private readonly options: OrchestratorOptions
  ) {
    this.sleep = options.sleep ?? abortableSleep;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Load the ledger and the failure log. Ledger corruption surfaces here as
   * LedgerCorruptionError.
   */
  async start(): Promise<void> {
    if (!this.components.ledger.isLoaded) {
      await this.components.ledger.load();
    }
    if (!this.components.failures.isLoaded) {
      await this.components.failures.load();
    }
  }

  /**
   * Run one cycle.
   *
   * @throws TransientError when listing still fails after retries
   * @throws ConfigurationError from any stage
   */
  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    await this.start();

    const report: CycleReport = {
      cycleId: uuidv4(),
      startedAt: this.clock().toISOString(),
      finishedAt: '',
      listed: 0,
      filtered: 0,
      processed: 0,
      skipped: 0,
      failed: 0,
      cancelled: false,
      outcomes: [],
    };

    if (signal?.aborted) {
      report.cancelled = true;
      return this.finish(report);
    }

    // Listing
    const documents = await withRetry(
      () => this.components.lister.list(this.options.folderId),
      isRetryable,
      { ...this.options.retry, label: 'Pipeline', signal, sleep: this.sleep }
    );
    report.listed = documents.length;

    // Filtering
    const pending = documents.filter((doc) => !this.components.ledger.contains(doc.id));
    report.filtered = documents.length - pending.length;
    console.error(
      `[Pipeline] Cycle ${report.cycleId}: ${documents.length} listed, ${report.filtered} already processed, ${pending.length} pending`
    );

    // Processing
    for (const [index, document] of pending.entries()) {
      if (signal?.aborted) {
        report.cancelled = true;
        console.error(`[Pipeline] Cancellation observed, ${pending.length - index} document(s) left for later`);
        break;
      }
      if (index > 0 && this.options.documentDelayMs) {
        await this.sleep(this.options.documentDelayMs, signal);
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }
      }

      const outcome = await this.processDocument(document);
      report.outcomes.push(outcome);
      if (outcome.status === 'done') report.processed++;
      else if (outcome.status === 'skipped') report.skipped++;
      else report.failed++;
    }

    return this.finish(report);
  }

  /**
   * Take one document through the pipeline and note the outcome in the
   * failure log. Never throws except for ConfigurationError.
   */
  async processDocument(document: DocumentRef): Promise<DocumentOutcome> {
    const outcome = await this.attempt(document);
    try {
      if (outcome.status === 'done') {
        await this.components.failures.clear(document.id);
      } else {
        await this.components.failures.record(outcome);
      }
    } catch (error) {
      console.error(`[Pipeline] Could not update the failure log for ${document.id}: ${toErrorMessage(error)}`);
    }
    return outcome;
  }

  private async attempt(document: DocumentRef): Promise<DocumentOutcome> {
    const label = `${document.name} (${document.id})`;
    try {
      const content = await withRetry(() => this.components.extractor.extract(document), isRetryable, {
        ...this.options.retry,
        label: 'Pipeline',
        sleep: this.sleep,
      });
      if (content.extractionFailed) {
        const detail = content.failureReason ?? 'no text could be extracted';
        console.error(`[Pipeline] Skipped ${label}: ${detail}`);
        return { status: 'skipped', document, reason: 'extraction_failed', detail };
      }

      let summary = this.summaries.get(document.id);
      if (summary) {
        console.error(`[Pipeline] Reusing the summary of ${label} from an earlier attempt`);
      } else {
        summary = await this.components.summarizer.summarize(document.id, content.text);
        this.rememberSummary(document.id, summary);
      }
      const { recordId, created } = await this.components.writer.upsert(summary);
      await this.components.ledger.mark(document.id);
      this.summaries.delete(document.id);

      console.error(`[Pipeline] Done ${label} → ${recordId}${created ? '' : ' (updated existing record)'}`);
      return { status: 'done', document, recordId, created };
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;

      const detail = toErrorMessage(error);
      if (error instanceof ContentError) {
        console.error(`[Pipeline] Failed ${label}, needs manual review: ${detail}`);
        return { status: 'failed', document, reason: 'content_error', detail };
      }
      if (error instanceof TransientError) {
        console.error(`[Pipeline] Failed ${label} after retries: ${detail}`);
        return { status: 'failed', document, reason: 'transient_exhausted', detail };
      }
      console.error(`[Pipeline] Failed ${label} with unexpected error: ${detail}`);
      return { status: 'failed', document, reason: 'unexpected', detail };
    }
  }

  private rememberSummary(documentId: string, summary: SummaryRecord): void {
    const limit = this.options.summaryCacheSize ?? DEFAULT_SUMMARY_CACHE_SIZE;
    if (limit <= 0) return;
    // Map keeps insertion order, so the first key is the oldest
    while (this.summaries.size >= limit) {
      const oldest = this.summaries.keys().next();
      if (oldest.done) break;
      this.summaries.delete(oldest.value);
    }
    this.summaries.set(documentId, summary);
  }

  /**
   * Single-pass mode
   */
  async runOnce(signal?: AbortSignal): Promise<CycleReport> {
    return this.runCycle(signal);
  }

  /**
   * Continuous mode: cycle, sleep, repeat until `signal` aborts, then flush
   * the ledger. A cycle whose listing fails is logged and the loop carries on.
   *
   * @returns the reports of every completed cycle
   */
  async runContinuous(signal: AbortSignal): Promise<CycleReport[]> {
    const reports: CycleReport[] = [];
    console.error(`[Pipeline] Continuous mode, checking every ${Math.round(this.options.intervalMs / 1000)}s`);

    while (!signal.aborted) {
      try {
        reports.push(await this.runCycle(signal));
      } catch (error) {
        if (!(error instanceof TransientError)) throw error;
        console.error(`[Pipeline] Cycle aborted, listing failed: ${error.message}`);
      }

      if (signal.aborted) break;
      await this.sleep(this.options.intervalMs, signal);
    }

    console.error('[Pipeline] Shutdown requested, stopping');
    await this.components.ledger.flush();
    return reports;
  }

  private finish(report: CycleReport): CycleReport {
    report.finishedAt = this.clock().toISOString();
    console.error(`[Pipeline] Cycle ${report.cycleId} finished: ${summarizeCycle(report)}`);
    console.error(`[Pipeline] Summarizer: ${formatSummarizerHealth(this.components.summarizer.health())}`);
    this.options.onCycle?.(report);
    return report;
  }
}
