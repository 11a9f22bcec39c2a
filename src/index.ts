/**
 * session-capture
 *
 * Adaptive login automation, network capture and session persistence:
 * - Input actuation through fallback technique chains
 * - One-time code entry with paste/type/operator fallbacks
 * - An analyze-act login loop driven by a pluggable page analyzer
 * - fetch/XHR capture, endpoint dedup and optional classification
 * - A reusable cookie jar for replay clients and generated MCP tools
 */

export * from './types/index.js';
export type * from './types/har.js';

export {
  InputActuator,
  NativeStrategy,
  SimulatedInputStrategy,
  DomInjectionStrategy,
  defaultStrategies,
  type ActuatorStrategy,
  type ActuatorTarget,
  type ActuatorOptions,
  type ActuationResult,
} from './core/input-actuator.js';

export { OtpHandler, GENERIC_OTP_TARGET, type OtpHandlerOptions, type OtpResult } from './core/otp-handler.js';

export {
  HeuristicPageAnalyzer,
  ModelPageAnalyzer,
  parsePageAnalysis,
  pageAnalysisSchema,
  PAGE_ANALYSIS_PROMPT,
  type HeuristicAnalyzerOptions,
  type PageAnalyzer,
  type VisionModel,
} from './core/page-analyzer.js';

export {
  LoginOrchestrator,
  shouldSubmit,
  labelSelectors,
  SUBMIT_LABELS,
  DEFAULT_MAX_STEPS,
  type LoginState,
  type LoginResult,
  type CycleReport,
  type FillReport,
  type LoginOrchestratorOptions,
  type LoginOrchestratorDeps,
} from './core/login-orchestrator.js';

export {
  NetworkCapture,
  DEFAULT_CAPTURE_DENYLIST,
  encodeBody,
  type NetworkCaptureOptions,
} from './core/network-capture.js';

export { normalizeEndpoint, endpointKey, dedupeEvents } from './core/event-dedup.js';

export {
  enrichEvents,
  HeuristicEventClassifier,
  ModelEventClassifier,
  isTelemetryUrl,
  type EventClassifier,
  type TextModel,
  type EnrichOptions,
} from './core/event-enricher.js';

export {
  SessionStore,
  normalizeSameSite,
  cookieDomainMatches,
  CSRF_COOKIE_NAME,
  type StorageStateInput,
} from './core/session-store.js';

export { BrowserManager, type BrowserConfig } from './core/browser-manager.js';

export {
  Recorder,
  establishSession,
  processEvents,
  type BrowserHost,
  type RecordResult,
  type SessionOutcome,
  type RecorderDeps,
} from './core/recorder.js';

export {
  ToolRegistry,
  UnknownToolError,
  type ToolHost,
  type ToolHandler,
  type ReloadResult,
} from './core/tool-registry.js';

export { createToolRegistry, createToolServer, handleToolCall, startToolServer } from './mcp/server.js';

export { ConsoleOperatorPrompt, type ConsolePromptOptions, type OperatorPrompt, type SecretField } from './utils/operator-prompt.js';
export { readEventLog, writeEventLog, enrichedLogPath, uniqueLogPath } from './utils/event-log.js';
export { convertToHar, serializeHar } from './utils/har-converter.js';
export { parseRecorderConfig, parseSessionConfig, parseToolServerConfig, parseLogConfig } from './utils/env-parser.js';
export { ConfigValidationError, type RecorderConfig, type ToolServerConfig } from './utils/config-schemas.js';
export { logger, configureLogger } from './utils/logger.js';
export { TIMEOUTS, getTimeout } from './utils/timeouts.js';
