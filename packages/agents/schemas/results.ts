// Persisted shape of an AnalysisResult. Snapshots read back from disk are
// validated against this before they are used as a diff baseline.

import { z } from 'zod';
import { AGENT_KINDS } from '../types/agents.js';
import { ACTIONS, POSITION_SIZES } from '../types/results.js';

export const AgentReportSchema = z.object({
  agentKind: z.enum(AGENT_KINDS),
  displayName: z.string(),
  content: z.string(),
  dataSources: z.array(z.string()),
});

export const DebateOutcomeSchema = z.object({
  bullCase: AgentReportSchema,
  bearCase: AgentReportSchema,
  rounds: z.number().int().min(1),
});

export const KeyFactSchema = z.object({
  fact: z.string(),
  source: z.string(),
});

export const TradingDecisionSchema = z.object({
  action: z.enum(ACTIONS),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  thesis: z.string(),
  watchConditions: z.array(z.string()),
  keyFacts: z.array(KeyFactSchema),
  targetPrice: z.number().nullable(),
  stopLoss: z.number().nullable(),
  positionSize: z.enum(POSITION_SIZES).nullable(),
});

export const RiskReviewSchema = z.object({
  approved: z.boolean(),
  concerns: z.array(z.string()),
  maxPositionPct: z.number().nullable(),
  reasoning: z.string(),
});

export const AnalysisResultSchema = z.object({
  entityId: z.string().min(1),
  companyName: z.string().nullable(),
  analystReports: z.array(AgentReportSchema),
  debate: DebateOutcomeSchema.nullable(),
  decision: TradingDecisionSchema.nullable(),
  riskReview: RiskReviewSchema.nullable(),
  sourcesUsed: z.array(z.string()),
  phaseErrors: z.record(z.string()),
  rawData: z.record(z.unknown()),
  model: z.string(),
  timestamp: z.string(),
});
