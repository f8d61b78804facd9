// Materiality-filtered change set between two runs for the same entity

import type { AnalysisResult, RiskReview, TradingDecision } from '../types/results.js';
import { currentPrice, formatNumber } from './payload.js';

/** Minimum confidence move, in absolute terms, worth reporting */
export const CONFIDENCE_THRESHOLD = 0.15;
/** Minimum price move, in percent, worth reporting */
export const PRICE_THRESHOLD_PCT = 5.0;

// Keeps 0.70 -> 0.55 (a float delta of 0.1499...) at the threshold.
const EPSILON = 1e-9;

function pct(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function signedPct(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(1)}%`;
}

function decisionChanges(prior: TradingDecision, current: TradingDecision): string[] {
  const changes: string[] = [];
  if (prior.action !== current.action) {
    changes.push(`⚡ ${prior.action} → ${current.action}`);
  }
  const delta = current.confidence - prior.confidence;
  if (Math.abs(delta) >= CONFIDENCE_THRESHOLD - EPSILON) {
    const arrow = delta > 0 ? '↑' : '↓';
    changes.push(`Conf ${arrow} ${pct(prior.confidence)} → ${pct(current.confidence)}`);
  }
  return changes;
}

function priceChange(prior: AnalysisResult, current: AnalysisResult): string[] {
  const oldPrice = currentPrice(prior.rawData);
  const newPrice = currentPrice(current.rawData);
  if (oldPrice === null || newPrice === null) return [];
  const movePct = ((newPrice - oldPrice) / oldPrice) * 100;
  if (Math.abs(movePct) < PRICE_THRESHOLD_PCT) return [];
  const icon = movePct > 0 ? '📈' : '📉';
  return [`${icon} ${formatNumber(oldPrice, 2)} → ${formatNumber(newPrice, 2)} (${signedPct(movePct)})`];
}

function reviewChanges(prior: RiskReview | null, current: RiskReview | null): { approval: string[]; concerns: string[] } {
  if (!prior || !current) return { approval: [], concerns: [] };
  const approval =
    prior.approved !== current.approved
      ? [current.approved ? 'Risk: Approved ✅' : 'Risk: Rejected ❌']
      : [];

  const before = new Set(prior.concerns);
  const after = new Set(current.concerns);
  const added = [...after].filter((c) => !before.has(c)).sort();
  const removed = [...before].filter((c) => !after.has(c)).sort();
  return {
    approval,
    concerns: [...added.map((c) => `🚩 +Risk: ${c}`), ...removed.map((c) => `✅ -Risk: ${c}`)],
  };
}

/**
 * Human-readable changes from `prior` to `current`. Pure; fields that are
 * missing or malformed in either run skip their check.
 */
export function diffResults(prior: AnalysisResult, current: AnalysisResult): string[] {
  const oldDecision = prior.decision;
  const newDecision = current.decision;

  if (!oldDecision && newDecision) {
    return [`New signal: ${newDecision.action} (${pct(newDecision.confidence)})`];
  }
  if (oldDecision && !newDecision) {
    return ['Signal lost (analysis failed)'];
  }
  if (!oldDecision || !newDecision) return [];

  const review = reviewChanges(prior.riskReview, current.riskReview);
  return [
    ...decisionChanges(oldDecision, newDecision),
    ...review.approval,
    ...priceChange(prior, current),
    ...review.concerns,
  ];
}
