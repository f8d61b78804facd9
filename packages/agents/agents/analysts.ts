// The five analyst descriptors used in the fan-out phase

import type { AgentContext, AgentDescriptor, AnalystKind } from '../types/agents.js';
import { asRecord, readString } from '../utils/payload.js';
import { dataBlock } from './agent-runner.js';

const REPORT_RULES = `Rules:
- Cite only figures that appear in the data provided. Never fill gaps from memory.
- When a source says "Data unavailable", say so instead of guessing.
- Finish with a one-line stance: Bullish, Neutral or Bearish, and why.`;

export const fundamentalAnalyst: AgentDescriptor = {
  kind: 'fundamental_analyst',
  displayName: 'Fundamental Analyst',
  instructions: `You are a Fundamental Analyst covering listed equities.
Assess profitability, balance-sheet strength, cash generation and valuation from the filed financial statements.
Interpret leverage in light of the company's sector.

${REPORT_RULES}`,
  dataSources: ['statements'],
  structured: false,
  project: (ctx: AgentContext) => {
    const sector = readString(asRecord(ctx.data.stock_price), 'sector') ?? 'Unknown';
    return [
      `Analyze the financial statements for ${ctx.entityId}.`,
      `Sector: ${sector}`,
      '',
      '## Financial Statements',
      dataBlock(ctx.data.statements),
    ].join('\n');
  },
};

export const macroAnalyst: AgentDescriptor = {
  kind: 'macro_analyst',
  displayName: 'Macro Economist',
  instructions: `You are a Macro Economist.
Explain how exchange rates, policy rates and the macro statistics provided bear on this company over the next 3-6 months.

${REPORT_RULES}`,
  dataSources: ['fx', 'rates', 'macro'],
  structured: false,
  project: (ctx: AgentContext) => [
    `Assess the macro backdrop for ${ctx.entityId}.`,
    '',
    '## Exchange Rates',
    dataBlock(ctx.data.fx),
    '',
    '## Policy Rates',
    dataBlock(ctx.data.rates),
    '',
    '## Macro Statistics',
    dataBlock(ctx.data.macro),
  ].join('\n'),
};

export const eventAnalyst: AgentDescriptor = {
  kind: 'event_analyst',
  displayName: 'Event Analyst',
  instructions: `You are an Event Analyst.
Classify recent corporate disclosures (earnings, guidance revisions, buybacks, dividends, M&A, governance) and judge their likely price impact.
Disclosure titles carry no financial figures; do not invent any.

${REPORT_RULES}`,
  dataSources: ['disclosures'],
  structured: false,
  project: (ctx: AgentContext) => [
    `Review recent disclosures for ${ctx.entityId}.`,
    '',
    '## Disclosures',
    dataBlock(ctx.data.disclosures),
  ].join('\n'),
};

export const sentimentAnalyst: AgentDescriptor = {
  kind: 'sentiment_analyst',
  displayName: 'Sentiment Analyst',
  instructions: `You are a Sentiment Analyst.
Gauge market sentiment toward the company from recent news headlines: tone, recurring themes and how crowded the narrative is.

${REPORT_RULES}`,
  dataSources: ['news'],
  structured: false,
  project: (ctx: AgentContext) => [
    `Gauge news sentiment for ${ctx.entityId}.`,
    '',
    '## News',
    dataBlock(ctx.data.news),
  ].join('\n'),
};

export const technicalAnalyst: AgentDescriptor = {
  kind: 'technical_analyst',
  displayName: 'Technical Analyst',
  instructions: `You are a Technical Analyst.
Read trend, momentum, position in the 52-week range and volume from the price data. Name concrete support and resistance levels.

${REPORT_RULES}`,
  dataSources: ['stock_price'],
  structured: false,
  project: (ctx: AgentContext) => [
    `Analyze the price action for ${ctx.entityId}.`,
    '',
    '## Price Data',
    dataBlock(ctx.data.stock_price),
  ].join('\n'),
};

export const ANALYSTS: Record<AnalystKind, AgentDescriptor> = {
  fundamental_analyst: fundamentalAnalyst,
  macro_analyst: macroAnalyst,
  event_analyst: eventAnalyst,
  sentiment_analyst: sentimentAnalyst,
  technical_analyst: technicalAnalyst,
};
