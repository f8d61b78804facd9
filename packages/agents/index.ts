// signal-desk: multi-agent equity research pipeline
// Analysts, debate, decision, fact verification and risk review over market-data sources

export {
  Orchestrator, BatchAnalyzer, analyze, analyzeMany,
  PHASE_NAMES, runAnalystFanOut, runDebate, runDecision, runRiskReview, settlePhase,
  checkKeyFacts, verifyKeyFacts, reviseNarrative, refineDecision, applyVerification,
} from './orchestrator/index.js';
export type {
  OrchestratorConfig, AnalyzeOne, BatchOptions, BatchProgress, FanOutResult, PhaseName, PhaseOutcome,
  VerificationResult,
} from './orchestrator/index.js';

export { AGENT_REGISTRY, getAgent, analystDescriptors } from './agents/registry.js';
export { runAgent, runStructuredAgent, localizeInstructions } from './agents/agent-runner.js';

export * from './types/index.js';

export { decodeDecision, decodeReview, fallbackDecision, fallbackReview } from './schemas/structured-output.js';
export { AnalysisResultSchema } from './schemas/results.js';

export { DEFAULT_MODEL, loadSettings, parseSettings, loadRuntimeEnvironment, createSnapshotStore } from './config/index.js';
export type { PipelineSettings, PipelineSettingsInput, RuntimeEnvironment, SnapshotBackend } from './config/index.js';

export { FileSnapshotStore, InMemorySnapshotStore } from './memory/snapshot-store.js';
export type { SnapshotStore } from './memory/snapshot-store.js';

// Bridges: model provider, market-data MCP server, notifications
export { AnthropicProvider } from './bridge/anthropic-provider.js';
export type { MessageRequest, MessageSender } from './bridge/anthropic-provider.js';
export { McpBridge, createToolCaller, parseServerCommand } from './bridge/mcp-client.js';
export type { McpBridgeConfig, ToolCaller } from './bridge/mcp-client.js';
export { McpDataFetcher, NullDataFetcher, DEFAULT_SOURCE_TOOLS } from './bridge/mcp-data-fetcher.js';
export { TelegramNotifier } from './bridge/telegram-notifier.js';

export { diffResults } from './utils/snapshot-diff.js';
export { buildVerifiedDataSummary } from './utils/fact-summary.js';
export { formatAnalysisMessage, formatPortfolioMessage } from './utils/notification-format.js';
export { ConfigError, MalformedOutputError, TimeoutError } from './utils/errors.js';
