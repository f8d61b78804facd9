// Message layout for Telegram notifications (HTML parse mode)

import type { AnalysisResult, PortfolioResult, RiskReview, TradingDecision } from '../types/results.js';
import { groupBySignal } from '../types/results.js';
import { currentPrice, formatNumber } from './payload.js';

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━';
const DISCLAIMER = '⚠️ Not investment advice. For research and education only.';
const ACTION_ICONS: Record<TradingDecision['action'], string> = { BUY: '📈', SELL: '📉', HOLD: '⏸️' };

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** ISO timestamp rendered as "YYYY-MM-DD HH:MM" (UTC) */
export function shortTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

function relativeMove(from: number, to: number): string {
  const pct = ((to - from) / from) * 100;
  return `${pct >= 0 ? '+' : ''}${pct.toFixed(1)}%`;
}

function priceTargetLines(decision: TradingDecision, price: number | null): string[] {
  const lines: string[] = [];
  if (price !== null) lines.push(`💰 Price: ${formatNumber(price, 2)}`);
  if (decision.targetPrice !== null) {
    const upside = price !== null ? ` (${relativeMove(price, decision.targetPrice)})` : '';
    lines.push(`🎯 Target: ${formatNumber(decision.targetPrice, 2)}${upside}`);
  }
  if (decision.stopLoss !== null) {
    const downside = price !== null ? ` (${relativeMove(price, decision.stopLoss)})` : '';
    lines.push(`🛑 Stop: ${formatNumber(decision.stopLoss, 2)}${downside}`);
  }
  return lines;
}

function thesisLines(decision: TradingDecision): string[] {
  const lines: string[] = [];
  if (decision.thesis) lines.push('', '📋 Thesis', escapeHtml(decision.thesis));
  if (decision.keyFacts.length > 0) {
    lines.push('', '📊 Key Facts');
    for (const kf of decision.keyFacts.slice(0, 5)) {
      lines.push(`• ${escapeHtml(kf.fact)}${kf.source ? ` (${escapeHtml(kf.source)})` : ''}`);
    }
  }
  if (decision.watchConditions.length > 0) {
    lines.push('', '👀 Invalidation Triggers');
    for (const condition of decision.watchConditions.slice(0, 4)) lines.push(`• ${escapeHtml(condition)}`);
  }
  return lines;
}

function riskConcernLines(review: RiskReview | null): string[] {
  if (!review || review.approved || review.concerns.length === 0) return [];
  return ['', '🚨 Risk Concerns', ...review.concerns.slice(0, 3).map((c) => `• ${escapeHtml(c)}`)];
}

function bulletSection(title: string, items: string[]): string[] {
  return items.length > 0 ? ['', title, ...items.map((item) => `• ${escapeHtml(item)}`)] : [];
}

function entityLabel(result: AnalysisResult): string {
  return result.companyName ? `${result.entityId} ${result.companyName}` : result.entityId;
}

export function formatAnalysisMessage(result: AnalysisResult, changes: readonly string[] = []): string {
  const ts = shortTimestamp(result.timestamp);
  const decision = result.decision;
  if (!decision) {
    return `🔔 ${escapeHtml(result.entityId)}: analysis failed (no decision)\n⏰ ${ts}`;
  }

  const review = result.riskReview;
  const riskStatus = review?.approved ? '✅ Risk: APPROVED' : '⚠️ Risk: Rejected';
  const size = decision.positionSize ? `  |  Size: ${decision.positionSize}` : '';

  const lines = [
    RULE,
    `🏦 Research: ${escapeHtml(entityLabel(result))}`,
    RULE,
    '',
    `${ACTION_ICONS[decision.action]} <b>${decision.action}</b>  |  Confidence: ${Math.round(decision.confidence * 100)}%  |  ${riskStatus}${size}`,
    ...priceTargetLines(decision, currentPrice(result.rawData)),
    ...thesisLines(decision),
    ...riskConcernLines(review),
    ...bulletSection('⚠️ Pipeline Issues', Object.entries(result.phaseErrors).map(([phase, error]) => `${phase}: ${error}`)),
    ...bulletSection('🔄 What Changed', [...changes]),
    '',
    RULE,
    `📡 ${result.sourcesUsed.length > 0 ? result.sourcesUsed.join(', ') : 'no sources'}`,
    `⏰ ${ts} | ${result.model}`,
    DISCLAIMER,
  ];
  return lines.join('\n');
}

function resultLine(result: AnalysisResult, changes: readonly string[]): string {
  const decision = result.decision;
  if (!decision) return `❓ ${escapeHtml(entityLabel(result))}: analysis failed`;
  const parts = [
    `${ACTION_ICONS[decision.action]} ${escapeHtml(entityLabel(result))}`,
    `${Math.round(decision.confidence * 100)}%`,
    result.riskReview?.approved ? '✅' : '⚠️',
  ];
  if (decision.targetPrice !== null) parts.push(`Target ${formatNumber(decision.targetPrice, 2)}`);
  if (changes.length > 0) parts.push(`🔔 ${escapeHtml(changes.slice(0, 2).join(' | '))}`);
  return parts.join('  ');
}

export function formatPortfolioMessage(
  portfolio: PortfolioResult,
  changes: Readonly<Record<string, readonly string[]>> = {},
): string {
  const groups = groupBySignal(portfolio);
  const lines = [
    RULE,
    '📊 Portfolio Analysis',
    `⏰ ${shortTimestamp(portfolio.timestamp)} | ${portfolio.results.length}/${portfolio.entityIds.length} analyzed`,
    RULE,
  ];
  const sections: Array<[string, AnalysisResult[]]> = [
    ['🟢 BUY', groups.buy],
    ['🟡 HOLD', groups.hold],
    ['🔴 SELL', groups.sell],
  ];
  for (const [label, group] of sections) {
    if (group.length === 0) continue;
    lines.push('', `${label} (${group.length})`);
    for (const result of group) lines.push(resultLine(result, changes[result.entityId] ?? []));
  }
  const undecided = portfolio.results.filter((r) => !r.decision);
  if (undecided.length > 0) {
    lines.push('', `❓ NO DECISION (${undecided.length})`);
    for (const result of undecided) lines.push(resultLine(result, []));
  }
  if (portfolio.failedIds.length > 0) {
    lines.push('', `❌ Failed: ${escapeHtml(portfolio.failedIds.join(', '))}`);
  }
  lines.push('', RULE, DISCLAIMER);
  return lines.join('\n');
}
