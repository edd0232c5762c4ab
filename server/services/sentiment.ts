/**
 * Keyword sentiment scoring for citizen feedback.
 *
 * Each listed term counts once when it appears anywhere in the lower-cased
 * text (substring match, so "unhelpful" still counts as "helpful").
 */

import type { Sentiment, SentimentCounts } from "@shared/schema";

export const POSITIVE_TERMS: readonly string[] = [
  "good", "great", "excellent", "amazing", "wonderful", "fantastic",
  "perfect", "outstanding", "brilliant", "superb", "satisfied",
  "happy", "pleased", "impressed", "helpful", "efficient",
];

export const NEGATIVE_TERMS: readonly string[] = [
  "bad", "terrible", "awful", "horrible", "disappointing",
  "frustrated", "angry", "upset", "poor", "inadequate", "useless",
  "slow", "delayed", "problem", "issue", "complaint",
];

function countTerms(text: string, terms: readonly string[]): number {
  return terms.filter((term) => text.includes(term)).length;
}

export function scoreSentiment(text: string): { positive: number; negative: number } {
  const lower = text.toLowerCase();
  return {
    positive: countTerms(lower, POSITIVE_TERMS),
    negative: countTerms(lower, NEGATIVE_TERMS),
  };
}

export function analyzeSentiment(text: string): Sentiment {
  const { positive, negative } = scoreSentiment(text);

  if (positive > negative) {
    return "Positive";
  }
  if (negative > positive) {
    return "Negative";
  }
  return "Neutral";
}

export function sentimentKey(sentiment: Sentiment): keyof SentimentCounts {
  switch (sentiment) {
    case "Positive":
      return "positive";
    case "Negative":
      return "negative";
    case "Neutral":
      return "neutral";
  }
}
