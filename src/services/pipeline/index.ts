/**
 * Pipeline Service
 * Cycle orchestration over lister, extractor, summarizer, writer and ledger
 */

export {
  PipelineOrchestrator,
  type OrchestratorOptions,
  type PipelineComponents,
} from './orchestrator.js';
