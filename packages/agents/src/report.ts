// Terminal layout for analysis and portfolio results

import type { AnalysisResult, PortfolioResult, TradingDecision } from '../types/results.js';
import { groupBySignal } from '../types/results.js';
import { truncate } from '../agents/agent-runner.js';
import { currentPrice, formatNumber } from '../utils/payload.js';

export type PaintColor = 'bold' | 'dim' | 'cyan' | 'green' | 'yellow' | 'red';
export type Paint = (color: PaintColor, text: string) => string;

export const plain: Paint = (_color, text) => text;

const ACTION_COLORS: Record<TradingDecision['action'], PaintColor> = { BUY: 'green', SELL: 'red', HOLD: 'yellow' };

function heading(paint: Paint, title: string): string {
  return `\n${paint('cyan', `--- ${title} ---`)}`;
}

function priceLine(label: string, value: number, price: number | null, suffix: string): string {
  if (price === null) return `${label}${formatNumber(value, 2)}`;
  const pct = ((value - price) / price) * 100;
  return `${label}${formatNumber(value, 2)}  (${pct >= 0 ? '+' : ''}${pct.toFixed(1)}% ${suffix})`;
}

function decisionLines(decision: TradingDecision, price: number | null, paint: Paint): string[] {
  const lines = [
    `${paint(ACTION_COLORS[decision.action], decision.action)}` +
      `  |  Confidence: ${Math.round(decision.confidence * 100)}%` +
      `  |  Position: ${decision.positionSize ?? 'N/A'}`,
  ];
  if (price !== null) lines.push(`💰 Current:    ${formatNumber(price, 2)}`);
  if (decision.targetPrice !== null) lines.push(priceLine('🎯 Target:     ', decision.targetPrice, price, 'upside'));
  if (decision.stopLoss !== null) lines.push(priceLine('🛑 Stop Loss:  ', decision.stopLoss, price, 'downside'));
  if (decision.thesis) lines.push('', paint('bold', '📋 Investment Thesis'), decision.thesis);
  if (decision.keyFacts.length > 0) {
    lines.push('', paint('bold', '📊 Key Facts'));
    for (const kf of decision.keyFacts) {
      lines.push(`• ${kf.fact}${kf.source ? `  ${paint('dim', `(${kf.source})`)}` : ''}`);
    }
  }
  if (decision.watchConditions.length > 0) {
    lines.push('', paint('bold', '👀 Watch Conditions'));
    for (const condition of decision.watchConditions) lines.push(`• ${condition}`);
  }
  return lines;
}

export function renderAnalysisReport(
  result: AnalysisResult,
  changes: readonly string[] = [],
  paint: Paint = plain,
): string {
  const lines = [
    paint('bold', `Sources: ${result.sourcesUsed.length}`) +
      ` (${result.sourcesUsed.length > 0 ? result.sourcesUsed.join(', ') : 'none'})`,
  ];
  if (result.companyName) lines.push(paint('bold', `Company: ${result.companyName}`));

  if (result.analystReports.length > 0) {
    lines.push(heading(paint, 'Analyst Reports'));
    result.analystReports.forEach((report, i) => {
      lines.push(paint('green', `[${i + 1}/${result.analystReports.length}] ${report.displayName}`));
      lines.push(truncate(report.content, 800), '');
    });
  }

  if (result.debate) {
    lines.push(heading(paint, 'Bull vs Bear Debate'));
    lines.push(paint('green', 'Bull Case'), truncate(result.debate.bullCase.content, 600), '');
    lines.push(paint('red', 'Bear Case'), truncate(result.debate.bearCase.content, 600));
  }

  if (result.decision) {
    lines.push(heading(paint, 'Trading Decision'));
    lines.push(...decisionLines(result.decision, currentPrice(result.rawData), paint));
  } else {
    lines.push(heading(paint, 'Trading Decision'), paint('red', 'No decision (see pipeline issues)'));
  }

  const review = result.riskReview;
  if (review) {
    lines.push(heading(paint, 'Risk Review'));
    lines.push(`Status: ${review.approved ? paint('green', '✅ Approved') : paint('red', '❌ Rejected')}`);
    if (review.maxPositionPct !== null) lines.push(`Max Position: ${review.maxPositionPct}%`);
    if (review.reasoning) lines.push('', review.reasoning);
    if (review.concerns.length > 0) {
      lines.push('', paint('bold', 'Concerns:'), ...review.concerns.map((c) => `• ${c}`));
    }
  }

  const phaseErrors = Object.entries(result.phaseErrors);
  if (phaseErrors.length > 0) {
    lines.push(heading(paint, 'Pipeline Issues'));
    for (const [phase, error] of phaseErrors) lines.push(paint('yellow', `${phase}: ${error}`));
  }

  if (changes.length > 0) {
    lines.push(heading(paint, 'Changes vs last run'));
    for (const change of changes) lines.push(`  ${paint('yellow', change)}`);
  }

  lines.push('', paint('dim', 'This is not financial advice. For educational and research purposes only.'));
  return lines.join('\n');
}

function portfolioRow(result: AnalysisResult, changes: readonly string[]): string {
  const name = result.companyName ? `${result.entityId} ${result.companyName}` : result.entityId;
  const decision = result.decision;
  if (!decision) return `  ${name}  (no decision)`;
  const approval = result.riskReview?.approved ? 'approved' : 'not approved';
  const change = changes.length > 0 ? `  [${changes[0]}]` : '';
  return `  ${name}  ${Math.round(decision.confidence * 100)}%  ${approval}${change}`;
}

export function renderPortfolioReport(
  portfolio: PortfolioResult,
  changes: Readonly<Record<string, readonly string[]>> = {},
  paint: Paint = plain,
): string {
  const groups = groupBySignal(portfolio);
  const lines = [
    paint('bold', `Portfolio: ${portfolio.results.length}/${portfolio.entityIds.length} analyzed`) +
      `  ${paint('dim', `(${portfolio.model})`)}`,
  ];
  const sections: Array<[TradingDecision['action'], AnalysisResult[]]> = [
    ['BUY', groups.buy],
    ['HOLD', groups.hold],
    ['SELL', groups.sell],
  ];
  for (const [action, group] of sections) {
    if (group.length === 0) continue;
    lines.push('', paint(ACTION_COLORS[action], `${action} (${group.length})`));
    for (const result of group) lines.push(portfolioRow(result, changes[result.entityId] ?? []));
  }
  const undecided = portfolio.results.filter((r) => !r.decision);
  if (undecided.length > 0) {
    lines.push('', paint('dim', `NO DECISION (${undecided.length})`));
    for (const result of undecided) lines.push(portfolioRow(result, []));
  }
  if (portfolio.failedIds.length > 0) {
    lines.push('', paint('red', `Failed: ${portfolio.failedIds.join(', ')}`));
  }
  return lines.join('\n');
}
