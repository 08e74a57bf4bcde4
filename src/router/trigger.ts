import { TriggerConfig } from "../config";
import { ComplexityTier } from "../types";
import { normalizeText, tokenize } from "../utils/text";

export type TriggerDecision =
  | { shouldRun: false; tier: "none"; signals: string[]; tokenCount: number }
  | { shouldRun: true; tier: ComplexityTier; signals: string[]; tokenCount: number };

const STEM_MIN_LENGTH = 5;

function matchesTerm(term: string, tokens: string[], joined: string): boolean {
  const normalized = tokenize(term);
  if (normalized.length === 0) {
    return false;
  }
  if (normalized.length > 1) {
    return ` ${joined} `.includes(` ${normalized.join(" ")} `);
  }
  const [single] = normalized;
  return tokens.some((token) => token === single || (single.length >= STEM_MIN_LENGTH && token.startsWith(single)));
}

export function classify(requestText: string, config: TriggerConfig): TriggerDecision {
  const tokens = tokenize(requestText);
  if (tokens.length === 0) {
    return { shouldRun: false, tier: "none", signals: [], tokenCount: 0 };
  }
  const joined = tokens.join(" ");
  const signals = Array.from(new Set(config.vocabulary.map((term) => normalizeText(term.trim())))).filter((term) =>
    matchesTerm(term, tokens, joined)
  );
  if (signals.length === 0) {
    return { shouldRun: false, tier: "none", signals: [], tokenCount: tokens.length };
  }
  const conjunctions = new Set(config.conjunctions.map((term) => normalizeText(term.trim())));
  const hasConjunction = tokens.some((token) => conjunctions.has(token));
  let tier: ComplexityTier;
  if (tokens.length < config.simpleMaxTokens && !hasConjunction) {
    tier = "simple";
  } else if (tokens.length < config.moderateMaxTokens) {
    tier = "moderate";
  } else {
    tier = "complex";
  }
  return { shouldRun: true, tier, signals, tokenCount: tokens.length };
}
