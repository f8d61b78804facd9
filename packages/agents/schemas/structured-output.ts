// Decode-with-default for the structured replies of the trader, the risk
// manager, the fact checker and the refine step.

import { z } from 'zod';
import type { StructuredOutcome } from '../types/agents.js';
import { ACTIONS, POSITION_SIZES } from '../types/results.js';
import type { KeyFact, RiskReview, TradingDecision } from '../types/results.js';
import { asRecord, readString } from '../utils/payload.js';

const RAW_TRACE_LIMIT = 200;

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => (typeof item === 'string' && item.trim() !== '' ? [item.trim()] : [])),
  );

function toKeyFact(item: unknown): KeyFact[] {
  if (typeof item === 'string') {
    return item.trim() !== '' ? [{ fact: item.trim(), source: '' }] : [];
  }
  const record = asRecord(item);
  const fact = readString(record, 'fact');
  if (!fact) return [];
  return [{ fact: fact.trim(), source: readString(record, 'source') ?? '' }];
}

/** Entries without a fact text are dropped */
const keyFactList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.flatMap(toKeyFact));

const positiveNumberOrNull = z
  .preprocess((v) => (v === '' || v === undefined ? null : v), z.coerce.number().nullable())
  .catch(null)
  .transform((n) => (n !== null && Number.isFinite(n) && n > 0 ? n : null));

const narrativeText = z
  .string()
  .catch('')
  .transform((s) => s.trim());

export const DecisionOutputSchema = z.object({
  action: z.preprocess((v) => (typeof v === 'string' ? v.trim().toUpperCase() : v), z.enum(ACTIONS)).default('HOLD'),
  confidence: z.coerce.number().min(0).max(1).default(0.5),
  reasoning: narrativeText,
  thesis: narrativeText,
  watch_conditions: stringList,
  key_facts: keyFactList,
  target_price: positiveNumberOrNull,
  stop_loss: positiveNumberOrNull,
  position_size: z
    .preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(POSITION_SIZES).nullable())
    .catch(null),
});

export const ReviewOutputSchema = z.object({
  approved: z.preprocess((v) => (v === 'true' ? true : v === 'false' ? false : v), z.boolean()),
  concerns: stringList,
  max_position_pct: positiveNumberOrNull,
  reasoning: narrativeText,
});

export const VerificationOutputSchema = z.object({
  verified_facts: keyFactList,
  corrections: stringList,
  removed: stringList,
});

const optionalNarrative = z
  .string()
  .transform((s) => s.trim())
  .optional()
  .catch(undefined)
  .transform((s) => (s ? s : undefined));

export const RefineOutputSchema = z.object({
  thesis: optionalNarrative,
  reasoning: optionalNarrative,
});

export type VerificationOutput = z.infer<typeof VerificationOutputSchema>;
export type RefineOutput = z.infer<typeof RefineOutputSchema>;

function rawTrace(outcome: StructuredOutcome): string {
  return outcome.ok ? JSON.stringify(outcome.value) : outcome.raw;
}

export function fallbackDecision(raw: string): TradingDecision {
  return {
    action: 'HOLD',
    confidence: 0,
    reasoning: `Parse error: ${raw.slice(0, RAW_TRACE_LIMIT)}`,
    thesis: '',
    watchConditions: [],
    keyFacts: [],
    targetPrice: null,
    stopLoss: null,
    positionSize: null,
  };
}

export function fallbackReview(raw: string): RiskReview {
  return {
    approved: false,
    concerns: ['Unable to parse risk review'],
    maxPositionPct: null,
    reasoning: `Parse error: ${raw.slice(0, RAW_TRACE_LIMIT)}`,
  };
}

/**
 * Missing action or confidence take defaults; invalid ones fail the decode,
 * and any failure yields HOLD at zero confidence.
 */
export function decodeDecision(outcome: StructuredOutcome): TradingDecision {
  if (!outcome.ok) return fallbackDecision(outcome.raw);
  const parsed = DecisionOutputSchema.safeParse(outcome.value);
  if (!parsed.success) return fallbackDecision(rawTrace(outcome));
  const data = parsed.data;
  return {
    action: data.action,
    confidence: data.confidence,
    reasoning: data.reasoning,
    thesis: data.thesis,
    watchConditions: data.watch_conditions,
    keyFacts: data.key_facts,
    targetPrice: data.target_price,
    stopLoss: data.stop_loss,
    positionSize: data.position_size,
  };
}

/** Any failure yields a rejected review. */
export function decodeReview(outcome: StructuredOutcome): RiskReview {
  if (!outcome.ok) return fallbackReview(outcome.raw);
  const parsed = ReviewOutputSchema.safeParse(outcome.value);
  if (!parsed.success) return fallbackReview(rawTrace(outcome));
  return {
    approved: parsed.data.approved,
    concerns: parsed.data.concerns,
    maxPositionPct: parsed.data.max_position_pct,
    reasoning: parsed.data.reasoning,
  };
}
