// Pipeline entry points

import type { AnalysisResult, PortfolioResult } from '../types/results.js';
import { BatchAnalyzer, type BatchOptions } from './batch-analyzer.js';
import { Orchestrator, type OrchestratorConfig } from './coordinator.js';

export { Orchestrator, type OrchestratorConfig } from './coordinator.js';
export { BatchAnalyzer, type AnalyzeOne, type BatchOptions, type BatchProgress } from './batch-analyzer.js';
export {
  PHASE_NAMES, fanOutError, runAnalystFanOut, runDebate, runDecision, runRiskReview, settlePhase,
  type FanOutResult, type PhaseName, type PhaseOutcome,
} from './phases.js';
export {
  applyVerification, checkKeyFacts, refineDecision, reviseNarrative, verifyKeyFacts,
  type VerificationResult,
} from './verification.js';

/** Analyze one entity. Rejects only on invalid configuration. */
export async function analyze(entityId: string, config: OrchestratorConfig): Promise<AnalysisResult> {
  return new Orchestrator(config).analyze(entityId);
}

/** Analyze many entities with at most `concurrencyLimit` runs in flight. */
export async function analyzeMany(
  entityIds: readonly string[],
  config: OrchestratorConfig,
  concurrencyLimit?: number,
  onProgress?: BatchOptions['onProgress'],
): Promise<PortfolioResult> {
  const orchestrator = new Orchestrator(config);
  const batch = new BatchAnalyzer((entityId) => orchestrator.analyze(entityId), orchestrator.settings.model);
  return batch.analyze(entityIds, {
    concurrency: concurrencyLimit ?? orchestrator.settings.maxConcurrent,
    onProgress,
  });
}
