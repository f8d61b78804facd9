import type { AgentContext, AgentDescriptor } from '../types/agents.js';
import { formatNumber } from '../utils/payload.js';
import { truncate } from './agent-runner.js';

const REPORT_EXCERPT = 600;

export const trader: AgentDescriptor = {
  kind: 'trader',
  displayName: 'Trader',
  instructions: `You are a professional trader making evidence-based investment decisions.

CRITICAL RULE: key_facts may ONLY cite facts that appear in the provided "Verified Data Summary".
Do not cite macro figures (GDP, CPI and the like) that are not in the summary.

Using the analyst reports, the bull/bear debate and the Verified Data Summary, reply with JSON only:
{
  "action": "BUY" | "SELL" | "HOLD",
  "confidence": number between 0 and 1,
  "reasoning": "why this action, in 2-4 sentences",
  "thesis": "the stock-specific reason this matters now",
  "watch_conditions": ["concrete trigger with a threshold", ...],
  "key_facts": [{"fact": "specific figure or event", "source": "source label exactly as shown"}, ...],
  "target_price": number | null,
  "stop_loss": number | null,
  "position_size": "small" | "medium" | "large" | null
}

Guidelines:
- confidence above 0.7 only when several sources converge. Prefer HOLD when uncertain.
- watch_conditions: 3-5 items, each with a number from the summary ("P/E exceeds 18x", not "valuation gets stretched").
- key_facts: 3-6 items using labels such as FILING <date>, DISCLOSURE <date>, RATES <series>, PRICE <date>.
- target_price: derived from P/E x EPS or the 52-week range; null when the data is insufficient.
- stop_loss: a specific price level.`,
  dataSources: [],
  structured: true,
  project: (ctx: AgentContext) => {
    const parts = [`Make a trading decision for ${ctx.entityId}.`, ''];
    // The summary leads so the citation rule is read before the opinions.
    if (ctx.dataSummary) parts.push(ctx.dataSummary, '');
    if (ctx.currentPrice) parts.push(`**Current Price: ${formatNumber(ctx.currentPrice, 2)}**`, '');
    if (ctx.analystReports && ctx.analystReports.length > 0) {
      parts.push('## Analyst Reports');
      for (const report of ctx.analystReports) {
        parts.push(`### ${report.displayName}`, truncate(report.content, REPORT_EXCERPT), '');
      }
    }
    if (ctx.debate) {
      parts.push('## Bull Case', truncate(ctx.debate.bullCase.content, REPORT_EXCERPT), '');
      parts.push('## Bear Case', truncate(ctx.debate.bearCase.content, REPORT_EXCERPT), '');
    }
    return parts.join('\n');
  },
};
