// Orchestrator: runs the fixed phase sequence for one entity and always
// returns a best-effort AnalysisResult. Phase failures land in phaseErrors.

import { randomUUID } from 'node:crypto';
import { analystDescriptors } from '../agents/registry.js';
import { parseSettings, type PipelineSettings, type PipelineSettingsInput } from '../config/settings.js';
import type { AgentContext, AgentDeps, AnalystKind } from '../types/agents.js';
import { SOURCE_NAMES, type DataFetcher, type SourceData } from '../types/data.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import { DOMAIN_EVENT_TYPES, SimpleEventBus } from '../types/events.js';
import type { GenerationProvider } from '../types/provider.js';
import type { AnalysisResult, DebateOutcome, RiskReview, TradingDecision } from '../types/results.js';
import { ConfigError } from '../utils/errors.js';
import { buildVerifiedDataSummary } from '../utils/fact-summary.js';
import { createLogger } from '../utils/logger.js';
import { asRecord, currentPrice, isEmptyPayload, readString } from '../utils/payload.js';
import {
  fanOutError, runAnalystFanOut, runDebate, runDecision, runRiskReview, settlePhase,
  type PhaseName, type PhaseOutcome,
} from './phases.js';
import { checkKeyFacts, reviseNarrative } from './verification.js';

const log = createLogger('Orchestrator');

export interface OrchestratorConfig {
  provider: GenerationProvider;
  fetcher: DataFetcher;
  /** Validated on construction; omitted fields take their defaults */
  settings?: PipelineSettingsInput;
  /** Restrict the analyst fan-out; defaults to all five analysts */
  analysts?: readonly AnalystKind[];
  onEvent?: (event: { type: DomainEventType; payload: unknown }) => void;
}

/** Mutable per-run record of failed phases */
class PhaseLedger {
  private readonly errors: Record<string, string> = {};

  fail(phase: PhaseName, error: string): void {
    this.errors[phase] = error;
  }

  snapshot(): Record<string, string> {
    return { ...this.errors };
  }
}

export class Orchestrator {
  readonly settings: PipelineSettings;
  private readonly provider: GenerationProvider;
  private readonly fetcher: DataFetcher;
  private readonly analysts: readonly AnalystKind[] | undefined;
  private readonly eventBus: EventBus;

  constructor(config: OrchestratorConfig) {
    this.settings = parseSettings(config.settings ?? {});
    this.provider = config.provider;
    this.fetcher = config.fetcher;
    this.analysts = config.analysts;
    this.eventBus = new SimpleEventBus();

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
      }
    }
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.eventBus.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'orchestration',
      payload,
    });
  }

  /** Settle one phase, record a failure in the ledger and announce it. */
  private async phase<T>(
    entityId: string,
    name: PhaseName,
    ledger: PhaseLedger,
    task: () => Promise<T>,
  ): Promise<PhaseOutcome<T>> {
    this.emit('PhaseStarted', { entityId, phase: name });
    const startedAt = Date.now();
    const outcome = await settlePhase(task);
    const durationMs = Date.now() - startedAt;
    if (outcome.ok) {
      this.emit('PhaseCompleted', { entityId, phase: name, durationMs });
    } else {
      ledger.fail(name, outcome.error);
      log.warn(`Phase ${name} failed`, { entityId, error: outcome.error });
      this.emit('PhaseFailed', { entityId, phase: name, error: outcome.error, durationMs });
    }
    return outcome;
  }

  private skip(entityId: string, name: PhaseName, reason: string): void {
    this.emit('PhaseSkipped', { entityId, phase: name, reason });
  }

  async analyze(entityId: string): Promise<AnalysisResult> {
    if (entityId.trim() === '') throw new ConfigError('entityId must be a non-empty string');

    const ledger = new PhaseLedger();
    const deps: AgentDeps = {
      provider: this.provider,
      language: this.settings.language,
      timeoutMs: this.settings.taskTimeoutMs,
    };
    this.emit('AnalysisRequested', { entityId, model: this.settings.model });

    // 0. Data
    const fetched = await this.phase(entityId, 'data', ledger, () =>
      this.fetcher.fetch(entityId, { timeoutMs: this.settings.dataTimeoutMs }),
    );
    const data: SourceData = fetched.ok ? fetched.value : {};
    const ctx: AgentContext = { entityId, data };

    // 1. Analyst fan-out
    const fanOut = await this.phase(entityId, 'analysts', ledger, () =>
      runAnalystFanOut(analystDescriptors(this.analysts), ctx, deps),
    );
    const analystReports = fanOut.ok ? fanOut.value.reports : [];
    if (fanOut.ok) {
      const partial = fanOutError(fanOut.value);
      if (partial) {
        ledger.fail('analysts', partial);
        log.warn('Analyst fan-out partially failed', { entityId, failures: fanOut.value.failures });
      }
    }

    // 2. Debate
    const debated = await this.phase(entityId, 'debate', ledger, () =>
      runDebate({ ...ctx, analystReports }, this.settings.debateRounds, deps),
    );
    const debate: DebateOutcome | null = debated.ok ? debated.value : null;

    // 3. Decision
    const dataSummary = buildVerifiedDataSummary(data, entityId);
    const decided = await this.phase(entityId, 'decision', ledger, () =>
      runDecision({ ...ctx, analystReports, debate, currentPrice: currentPrice(data), dataSummary }, deps),
    );
    const rawDecision: TradingDecision | null = decided.ok ? decided.value : null;

    // 4-5. Verification, then refine only when the checker left notes
    let decision = rawDecision;
    if (rawDecision) {
      const verified = await this.phase(entityId, 'verification', ledger, () =>
        checkKeyFacts(rawDecision, dataSummary, deps),
      );
      if (verified.ok) {
        decision = verified.value.decision;
        const { feedback } = verified.value;
        if (feedback.length > 0) {
          const base = decision;
          const refined = await this.phase(entityId, 'refine', ledger, () =>
            reviseNarrative(base, feedback, dataSummary, deps),
          );
          if (refined.ok) decision = refined.value;
        } else {
          this.skip(entityId, 'refine', 'no fact-checker notes');
        }
      } else {
        this.skip(entityId, 'refine', 'verification failed');
      }
    } else {
      this.skip(entityId, 'verification', 'no decision');
      this.skip(entityId, 'refine', 'no decision');
    }

    // 6. Review, gated on the raw decision; reviews the latest revision
    let riskReview: RiskReview | null = null;
    if (rawDecision) {
      const proposed = decision ?? rawDecision;
      const reviewed = await this.phase(entityId, 'review', ledger, () =>
        runRiskReview({ ...ctx, analystReports, decision: proposed }, deps),
      );
      riskReview = reviewed.ok ? reviewed.value : null;
    } else {
      this.skip(entityId, 'review', 'no decision');
    }

    // 7. Assembly
    const result: AnalysisResult = {
      entityId,
      companyName: readString(asRecord(data.statements), 'company_name'),
      analystReports,
      debate,
      decision,
      riskReview,
      sourcesUsed: SOURCE_NAMES.filter((name) => !isEmptyPayload(data[name])),
      phaseErrors: ledger.snapshot(),
      rawData: { ...data },
      model: this.settings.model,
      timestamp: new Date().toISOString(),
    };

    this.emit('AnalysisCompleted', {
      entityId,
      action: decision?.action ?? null,
      failedPhases: Object.keys(result.phaseErrors),
    });
    return result;
  }
}
