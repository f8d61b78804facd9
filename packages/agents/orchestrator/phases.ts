// Phase runners. Each phase settles to an explicit outcome value; the
// coordinator combines outcomes and derives the phase-error map from them.

import { runAgent, runStructuredAgent } from '../agents/agent-runner.js';
import { bearResearcher, bullResearcher } from '../agents/researchers.js';
import { riskManager } from '../agents/risk-manager.js';
import { trader } from '../agents/trader.js';
import type { AgentContext, AgentDeps, AgentDescriptor, AgentKind } from '../types/agents.js';
import type { AgentReport, DebateOutcome, RiskReview, TradingDecision } from '../types/results.js';
import { decodeDecision, decodeReview } from '../schemas/structured-output.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

export const PHASE_NAMES = ['data', 'analysts', 'debate', 'decision', 'verification', 'refine', 'review'] as const;
export type PhaseName = (typeof PHASE_NAMES)[number];

export type PhaseOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

export async function settlePhase<T>(task: () => Promise<T>): Promise<PhaseOutcome<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

export interface FanOutResult {
  reports: AgentReport[];
  failures: Array<{ kind: AgentKind; error: string }>;
  total: number;
}

/**
 * Run every descriptor concurrently against the same context and wait for
 * all of them. Never rejects; failures are returned alongside the reports.
 */
export async function runAnalystFanOut(
  descriptors: readonly AgentDescriptor[],
  ctx: AgentContext,
  deps: AgentDeps,
): Promise<FanOutResult> {
  const settled = await Promise.allSettled(descriptors.map((d) => runAgent(d, ctx, deps)));
  const reports: AgentReport[] = [];
  const failures: FanOutResult['failures'] = [];
  settled.forEach((outcome, i) => {
    if (outcome.status === 'fulfilled') {
      reports.push(outcome.value);
    } else {
      const reason: unknown = outcome.reason;
      failures.push({ kind: descriptors[i].kind, error: errorMessage(reason) });
    }
  });
  return { reports, failures, total: descriptors.length };
}

export function fanOutError(result: FanOutResult): string | null {
  return result.failures.length > 0 ? `${result.failures.length}/${result.total} agents failed` : null;
}

/**
 * Strictly sequential: bull, then bear answering the bull. Each extra round
 * has the bull answer the latest bear case and the bear answer again.
 */
export async function runDebate(ctx: AgentContext, rounds: number, deps: AgentDeps): Promise<DebateOutcome> {
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new ConfigError(`debate rounds must be a positive integer, got ${rounds}`);
  }
  let bullCase = await runAgent(bullResearcher, ctx, deps);
  let bearCase = await runAgent(bearResearcher, { ...ctx, bullCase }, deps);
  for (let round = 1; round < rounds; round++) {
    bullCase = await runAgent(bullResearcher, { ...ctx, bearCase }, deps);
    bearCase = await runAgent(bearResearcher, { ...ctx, bullCase }, deps);
  }
  return { bullCase, bearCase, rounds };
}

/** Malformed trader output degrades to HOLD; provider errors reject. */
export async function runDecision(ctx: AgentContext, deps: AgentDeps): Promise<TradingDecision> {
  return decodeDecision(await runStructuredAgent(trader, ctx, deps));
}

/** Malformed review output degrades to a rejection; provider errors reject. */
export async function runRiskReview(ctx: AgentContext, deps: AgentDeps): Promise<RiskReview> {
  return decodeReview(await runStructuredAgent(riskManager, ctx, deps));
}
