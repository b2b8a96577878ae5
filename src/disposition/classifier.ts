import type { CompiledRule, DispositionRuleSet } from './rules';
import type { Disposition, TranscriptItem } from './types';

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

function containsAll(text: string, keywords: string[]): boolean {
  return keywords.every((keyword) => text.includes(keyword));
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

export function containsDate(text: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}

export function customerText(transcript: readonly TranscriptItem[]): string {
  return transcript
    .filter((item) => item.speaker === 'customer')
    .map((item) => item.text.toLowerCase())
    .join(' ');
}

function ruleMatches(rule: CompiledRule, text: string, words: number): boolean {
  if (rule.anyKeywords.length > 0 && !containsAny(text, rule.anyKeywords)) {
    return false;
  }
  if (rule.allKeywords.length > 0 && !containsAll(text, rule.allKeywords)) {
    return false;
  }
  if (rule.minWords !== undefined && words < rule.minWords) {
    return false;
  }
  return true;
}

/**
 * Maps a transcript and call duration to a disposition. First match wins:
 * short calls, then silent customers, then the rule table in priority order,
 * then the fallback. The date predicate only refines a rule that already
 * matched on its keywords.
 */
export function classify(
  transcript: readonly TranscriptItem[],
  callDurationSeconds: number,
  rules: DispositionRuleSet,
): Disposition {
  if (callDurationSeconds > 0 && callDurationSeconds < rules.shortCallSeconds) {
    return 'CUSTOMER_HANGUP';
  }

  const text = customerText(transcript);
  if (text.trim() === '') {
    return 'NO_RESPONSE';
  }

  const words = countWords(text);
  for (const rule of rules.rules) {
    if (!ruleMatches(rule, text, words)) {
      continue;
    }
    if (rule.withDateDisposition && containsDate(text, rules.datePatterns)) {
      return rule.withDateDisposition;
    }
    return rule.disposition;
  }

  return rules.fallback;
}

/**
 * Maps the text of a failed dial (SIP status, error message) to a
 * not-connected disposition. Null means nothing in the text reads as a
 * failure.
 */
export function dispositionForDialFailure(
  rawStatusText: string,
  rules: DispositionRuleSet,
): Disposition | null {
  const text = rawStatusText.toLowerCase();
  for (const rule of rules.dialFailure) {
    if (containsAny(text, rule.anyKeywords)) {
      return rule.disposition;
    }
  }
  return null;
}
