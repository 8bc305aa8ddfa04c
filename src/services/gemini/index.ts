/**
 * Gemini Service
 * Summarization client, model boundary and circuit breaker
 */

// Summarizer
export {
  SummarizerClient,
  MalformedResponseError,
  SummaryResponseSchema,
  classifyModelError,
  parseSummaryResponse,
  formatSummarizerHealth,
  stripCodeFences,
  type SummarizerHealth,
  type SummarizerOptions,
} from './summarizer.js';

// Model boundary
export { GenAiModel, type GenerativeModel, type GenerateRequest, type GenAiModelOptions } from './model.js';

// Prompt
export { buildAnalysisPrompt, SECTION_GUIDANCE } from './prompt.js';

// Circuit Breaker
export {
  CircuitBreaker,
  CircuitBreakerOpenError,
  isServerError,
  type BreakerSnapshot,
  type CircuitBreakerConfig,
  type CircuitState,
} from './circuit-breaker.js';
