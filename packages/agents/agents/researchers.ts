// Bull and bear researchers for the sequential debate

import type { AgentContext, AgentDescriptor } from '../types/agents.js';
import type { AgentReport } from '../types/results.js';

function reportDigest(reports: readonly AgentReport[] | undefined): string {
  if (!reports || reports.length === 0) return 'No analyst reports are available.';
  return reports.map((r) => `### ${r.displayName}\n${r.content}`).join('\n\n');
}

export const bullResearcher: AgentDescriptor = {
  kind: 'bull_researcher',
  displayName: 'Bullish Researcher',
  instructions: `You are a Bullish Researcher.
Build the strongest evidence-based case for owning this stock using the analyst reports.
When a bearish case is supplied, rebut its points one by one.
Cite only figures from the reports. Keep it under 400 words.`,
  dataSources: [],
  structured: false,
  project: (ctx: AgentContext) => {
    const parts = [`Make the bull case for ${ctx.entityId}.`, '', '## Analyst Reports', reportDigest(ctx.analystReports)];
    if (ctx.bearCase) parts.push('', '## Bear Case to Rebut', ctx.bearCase.content);
    return parts.join('\n');
  },
};

export const bearResearcher: AgentDescriptor = {
  kind: 'bear_researcher',
  displayName: 'Bearish Researcher',
  instructions: `You are a Bearish Researcher.
Challenge the bullish case point by point and surface the risks it ignores: valuation, earnings quality, macro exposure, event risk.
Cite only figures from the reports. Keep it under 400 words.`,
  dataSources: [],
  structured: false,
  project: (ctx: AgentContext) => {
    const parts = [`Make the bear case for ${ctx.entityId}.`, '', '## Analyst Reports', reportDigest(ctx.analystReports)];
    if (ctx.bullCase) parts.push('', '## Bull Case to Challenge', ctx.bullCase.content);
    return parts.join('\n');
  },
};
