// Fact verification and refinement. Claimed key facts are checked against
// the verified data summary; when the checker leaves notes, the narrative
// is re-derived with the summary as the only numeric authority.

import { completeStructured } from '../agents/agent-runner.js';
import type { AgentDeps } from '../types/agents.js';
import type { TradingDecision } from '../types/results.js';
import { withKeyFacts, withNarrative } from '../types/results.js';
import {
  RefineOutputSchema, VerificationOutputSchema, type VerificationOutput,
} from '../schemas/structured-output.js';
import { MalformedOutputError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Verifier');

export const VERIFIER_INSTRUCTIONS = `You are a financial research fact checker.

Check every key fact of an investment decision against the Verified Data Summary provided.
For each key fact:
1. VERIFY that the figure or event appears in the summary.
2. CORRECT the source label when it is wrong:
   - filed financial figures use \`FILING <date>\`
   - disclosure titles use \`DISCLOSURE <date>\` (disclosures carry no figures)
   - policy rates use \`RATES <series>\`
   - prices use \`PRICE <date>\`
   - macro tables carry titles only; remove any figure attributed to them
3. KEEP facts that appear in the summary.
4. REMOVE figures or events that do not appear in the summary.

Reply with JSON only:
{
  "verified_facts": [{"fact": "...", "source": "..."}],
  "corrections": ["what was corrected, or an empty list"],
  "removed": ["what was removed and why, or an empty list"]
}

When in doubt, keep facts that appear in the summary.`;

export const REFINE_INSTRUCTIONS = `You are revising a trading decision after fact-checker feedback.

Rewrite only the thesis and the reasoning so they are consistent with the corrected facts.
The Verified Data Summary is the sole authority for every number you write; do not take figures from the feedback text.
Do not change the action or the confidence.

Reply with JSON only:
{
  "thesis": "revised thesis",
  "reasoning": "revised reasoning"
}`;

export interface VerificationResult {
  decision: TradingDecision;
  /** Correction and removal notes, in that order */
  feedback: string[];
}

/**
 * Apply a parsed checker reply. An empty fact list while the decision had
 * facts is treated as an unreliable reply: the originals are kept.
 */
export function applyVerification(decision: TradingDecision, output: VerificationOutput): VerificationResult {
  const feedback = [...output.corrections, ...output.removed];
  if (output.verified_facts.length === 0 && decision.keyFacts.length > 0) {
    log.warn('Fact checker returned no facts; keeping originals', { original: decision.keyFacts.length });
    return { decision, feedback };
  }
  if (feedback.length > 0) {
    log.info('Fact checker left notes', { corrections: output.corrections.length, removed: output.removed.length });
  }
  return { decision: withKeyFacts(decision, output.verified_facts), feedback };
}

/** Rejects on provider failure, timeout or unparseable reply. */
export async function checkKeyFacts(
  decision: TradingDecision,
  dataSummary: string,
  deps: AgentDeps,
): Promise<VerificationResult> {
  if (decision.keyFacts.length === 0) return { decision, feedback: [] };

  const facts = JSON.stringify(decision.keyFacts.map((kf) => ({ fact: kf.fact, source: kf.source })), null, 2);
  const content = `${dataSummary}\n\n## Key Facts to Check\n${facts}\n`;

  const outcome = await completeStructured(deps, VERIFIER_INSTRUCTIONS, content, 'fact_checker');
  if (!outcome.ok) throw new MalformedOutputError(outcome.raw);
  const parsed = VerificationOutputSchema.safeParse(outcome.value);
  if (!parsed.success) throw new MalformedOutputError(JSON.stringify(outcome.value));
  return applyVerification(decision, parsed.data);
}

/** Never rejects: any failure returns the decision unchanged with no notes. */
export async function verifyKeyFacts(
  decision: TradingDecision,
  dataSummary: string,
  deps: AgentDeps,
): Promise<VerificationResult> {
  try {
    return await checkKeyFacts(decision, dataSummary, deps);
  } catch (err) {
    log.warn('Fact check failed; keeping original facts', { error: errorMessage(err) });
    return { decision, feedback: [] };
  }
}

/**
 * Re-derive thesis and reasoning. A reply carrying neither field leaves the
 * decision unchanged; provider failures and unparseable replies reject.
 */
export async function reviseNarrative(
  decision: TradingDecision,
  feedback: readonly string[],
  dataSummary: string,
  deps: AgentDeps,
): Promise<TradingDecision> {
  if (feedback.length === 0) return decision;

  const current = {
    action: decision.action,
    confidence: decision.confidence,
    thesis: decision.thesis,
    reasoning: decision.reasoning,
    key_facts: decision.keyFacts,
  };
  const content = [
    '## Current Decision',
    JSON.stringify(current, null, 2),
    '',
    '## Fact-Checker Feedback',
    ...feedback.map((note) => `- ${note}`),
    '',
    dataSummary,
  ].join('\n');

  const outcome = await completeStructured(deps, REFINE_INSTRUCTIONS, content, 'refine');
  if (!outcome.ok) throw new MalformedOutputError(outcome.raw);
  const parsed = RefineOutputSchema.safeParse(outcome.value);
  if (!parsed.success) throw new MalformedOutputError(JSON.stringify(outcome.value));
  if (!parsed.data.thesis && !parsed.data.reasoning) {
    log.warn('Refine reply had no narrative fields; decision unchanged');
    return decision;
  }
  return withNarrative(decision, parsed.data);
}

/** Never rejects: any failure returns the decision unchanged. */
export async function refineDecision(
  decision: TradingDecision,
  feedback: readonly string[],
  dataSummary: string,
  deps: AgentDeps,
): Promise<TradingDecision> {
  try {
    return await reviseNarrative(decision, feedback, dataSummary, deps);
  } catch (err) {
    log.warn('Refine failed; keeping decision', { error: errorMessage(err) });
    return decision;
  }
}
