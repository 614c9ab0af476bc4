export { LLMClient } from './llm-client.js';
export type { ApiKeySource, LLMClientOptions } from './llm-client.js';
export { ManualRunLoop, NodeRunLoop } from './run-loop.js';
export type { RunLoop, RunLoopTask } from './run-loop.js';
export { createProviderDispatcher } from './setup-undici.js';
export { buildPayload, escapeJson, extractErrorMessage, extractResponseText, findJsonString, findJsonStrings } from './llm-providers/anthropic-wire.js';
export { SseStreamParser } from './llm-providers/sse-parser.js';
export { classifyLlmError, operatorHintFor, LLM_ERROR_KIND_MEANINGS } from './llm-providers/llm-error-mapping.js';
export type { LlmErrorKind } from './llm-providers/llm-error-mapping.js';
export { ConversationStore, DEFAULT_CONTEXT_BUDGET, defaultEnrichRequest } from './conversation-store.js';
export type { EnrichRequest, RequestContext } from './conversation-store.js';
export { CommandExecutor, describeFault } from './command-executor.js';
export type { CommandExecutorOptions, OutputLineHandler } from './command-executor.js';
export {
  COMPLETION_MARKER,
  extractCommand,
  extractExplanation,
  hasCompletionMarker,
  parseAgentReply,
  scanFencedBlocks,
  stripCompletionMarker,
} from './response-parser.js';
export type { AgentReply, FencedBlock } from './response-parser.js';
export { UndoLedger } from './undo-ledger.js';
export { CopilotSession, DEFAULT_WORKFLOW_LIMITS, FINISH_REASONS, isUndoPhrase } from './copilot-session.js';
export type {
  CopilotSessionEvents,
  CopilotSessionOptions,
  CopilotTransport,
  NoticeKind,
  StartResult,
  SubmitResult,
} from './copilot-session.js';
export { HostError } from './host/types.js';
export type {
  GroupDisposition,
  HistoryListener,
  HostControl,
  HostControls,
  HostEntities,
  HostHistory,
  HostTransactions,
  SessionHost,
} from './host/types.js';
export { MemorySessionHost, createDemoSession } from './host/memory-host.js';
export type { MemorySessionOptions, PluginHandle, SessionScriptApi, TrackHandle, TrackSeed } from './host/memory-host.js';
export { ConfigurationSchema, defaultConfiguration, parseConfiguration } from './config.js';
export { configDir, discoverLayers, mergeLayers, resolveApiKey, resolveConfiguration } from './config-resolver.js';
export type { LayerOrigin, ResolvedConfigLayer, ResolveOptions } from './config-resolver.js';
export {
  ConcurrencyError,
  ConfigError,
  CopilotError,
  ERROR_CATEGORY_MEANINGS,
  ExecutionError,
  ParseError,
  ProtocolError,
  TransportError,
  WorkflowAbort,
  isCancellation,
  isCopilotError,
} from './errors.js';
export type { ErrorCategory, TransportErrorKind, WorkflowAbortReason } from './errors.js';
export { makeTTYLogSink } from './log-sink-tty.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export { setWarningSink } from './utils.js';
export type * from './types.js';
