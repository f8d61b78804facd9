import type { AgentContext, AgentDescriptor } from '../types/agents.js';
import { truncate } from './agent-runner.js';

const SUMMARY_EXCERPT = 300;

export const riskManager: AgentDescriptor = {
  kind: 'risk_manager',
  displayName: 'Risk Manager',
  instructions: `You are a Risk Manager reviewing proposed equity trades.
Decide whether to approve, conditionally approve or reject.

Approve (approved: true):
- confidence >= 0.65 and at least 2 key_facts backed by data
- a stop-loss is set, or the action is HOLD
- position size is small or medium

Conditionally approve (approved: true, max_position_pct between 3 and 5):
- confidence between 0.50 and 0.64 with at least 1 key_fact
- a significant risk exists but the thesis is rational

Reject (approved: false):
- confidence below 0.50, or no key_facts at all
- contradictory signals make the decision irrational
- serious liquidity or governance concerns

Weigh position sizing, concentration, macro exposure (FX, rates, geopolitics), liquidity and the downside scenario.
Prefer conditional approval; reject outright only when the evidence is severely lacking.

Reply with JSON only:
{
  "approved": true | false,
  "concerns": ["concern", ...],
  "max_position_pct": number | null,
  "reasoning": "why"
}`,
  dataSources: [],
  structured: true,
  project: (ctx: AgentContext) => {
    const parts = [`Review this trading decision for ${ctx.entityId}.`, ''];
    if (ctx.decision) parts.push('## Proposed Trade', JSON.stringify(ctx.decision, null, 2), '');
    if (ctx.analystReports && ctx.analystReports.length > 0) {
      parts.push('## Analyst Report Summaries');
      for (const report of ctx.analystReports) {
        parts.push(`**${report.displayName}**: ${truncate(report.content, SUMMARY_EXCERPT)}`);
      }
    }
    return parts.join('\n');
  },
};
