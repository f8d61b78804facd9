// Agent variants: analysts, debaters, the trader and the risk manager.
// Variants are descriptors in a dispatch table, not subclasses.

import type { SourceData } from './data.js';
import type { GenerationProvider } from './provider.js';
import type { AgentReport, DebateOutcome, TradingDecision } from './results.js';

export const ANALYST_KINDS = [
  'fundamental_analyst',
  'macro_analyst',
  'event_analyst',
  'sentiment_analyst',
  'technical_analyst',
] as const;

export const AGENT_KINDS = [
  ...ANALYST_KINDS,
  'bull_researcher',
  'bear_researcher',
  'trader',
  'risk_manager',
] as const;

export type AnalystKind = (typeof ANALYST_KINDS)[number];
export type AgentKind = (typeof AGENT_KINDS)[number];

export const LANGUAGES = ['en', 'ja'] as const;
export type Language = (typeof LANGUAGES)[number];

/** Everything an agent may read. Each descriptor projects the subset it needs. */
export interface AgentContext {
  readonly entityId: string;
  readonly data: SourceData;
  readonly analystReports?: readonly AgentReport[];
  readonly bullCase?: AgentReport;
  readonly bearCase?: AgentReport;
  readonly debate?: DebateOutcome | null;
  readonly currentPrice?: number | null;
  readonly dataSummary?: string;
  readonly decision?: TradingDecision;
}

export interface AgentDescriptor {
  readonly kind: AgentKind;
  readonly displayName: string;
  readonly instructions: string;
  /** Source labels recorded on the report */
  readonly dataSources: readonly string[];
  /** Structured variants are invoked through completeStructured */
  readonly structured: boolean;
  readonly project: (ctx: AgentContext) => string;
}

/** Per-run collaborators threaded through every agent call */
export interface AgentDeps {
  readonly provider: GenerationProvider;
  readonly language: Language;
  readonly timeoutMs: number;
}

export type StructuredOutcome =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly raw: string };
