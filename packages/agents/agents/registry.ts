// Dispatch table from agent kind to descriptor

import type { AgentDescriptor, AgentKind, AnalystKind } from '../types/agents.js';
import { ANALYST_KINDS } from '../types/agents.js';
import { ANALYSTS } from './analysts.js';
import { bearResearcher, bullResearcher } from './researchers.js';
import { riskManager } from './risk-manager.js';
import { trader } from './trader.js';

export const AGENT_REGISTRY: Record<AgentKind, AgentDescriptor> = {
  ...ANALYSTS,
  bull_researcher: bullResearcher,
  bear_researcher: bearResearcher,
  trader,
  risk_manager: riskManager,
};

export function getAgent(kind: AgentKind): AgentDescriptor {
  return AGENT_REGISTRY[kind];
}

/** Analyst descriptors in canonical order, optionally restricted to `kinds` */
export function analystDescriptors(kinds: readonly AnalystKind[] = ANALYST_KINDS): AgentDescriptor[] {
  return kinds.map((kind) => AGENT_REGISTRY[kind]);
}
