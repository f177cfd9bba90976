import type { CheckinRecord, RiskAssessment, RiskBand, RiskComponents } from './types.ts';

export const RISK_SCORE_VERSION = '0.1.0';
export const PROMPT_VERSION = '0.1.0';

export const MIN_HISTORY = 3;

export const CRISIS_NOTICE =
  'If you are in crisis or thinking about harming yourself, call or text 988 or your local emergency number right now.';

export const CRISIS_FOOTER = "You're not alone. If you're in crisis, text 988 (or your local equivalent).";

const REFLECTIONS: Record<RiskBand, string> = {
  insufficient_data:
    "We don't have enough check-ins yet to look for patterns. Keep checking in; every entry helps.",
  low: "You're steady today. Keep building on what's working, one small healthy choice at a time.",
  elevated: 'A few stress signals showed up. What is one support or coping tool you can use in the next hour?',
  moderate:
    'Several stress points are present. Consider pausing to breathe, texting a supporter, or using a craving coping skill.',
  high: "Today looks hard. You don't have to carry it alone; reach out to your supports now.",
};

/**
 * Scores the most recent check-in once the history holds at least
 * MIN_HISTORY records. Earlier records only count toward that floor.
 */
export function evaluate(history: readonly CheckinRecord[]): RiskAssessment {
  const latest = history[history.length - 1];
  if (history.length < MIN_HISTORY || !latest) {
    return { band: 'insufficient_data', score: null, components: null };
  }

  const components = scoreComponents(latest);
  const sum = components.adherence + components.mood + components.cravings + components.sleep + components.isolation;
  const score = Math.min(100, Math.max(0, sum));
  return { band: bandFromScore(score), score, components };
}

export function scoreComponents(record: CheckinRecord): RiskComponents {
  return {
    adherence: Math.floor(Math.max(0, 100 - record.adherence) / 4),
    mood: Math.max(0, -record.mood_trend) * 3,
    cravings: Math.floor(record.cravings / 3),
    sleep: Math.floor(Math.max(0, 8 - record.sleep_hours) * 4),
    isolation: Math.floor(record.isolation / 2),
  };
}

export function bandFromScore(score: number): Exclude<RiskBand, 'insufficient_data'> {
  if (score < 30) return 'low';
  if (score < 55) return 'elevated';
  if (score < 75) return 'moderate';
  return 'high';
}

// The crisis notice is fixed text and is never dropped for the high band.
export function reflectionFor(band: RiskBand): string {
  const text = REFLECTIONS[band];
  return band === 'high' ? `${text} ${CRISIS_NOTICE}` : text;
}

const FALLBACK_REFLECTION = 'Thank you for checking in. Reach out to someone you trust if today feels heavy.';

/** Neutral text for when a reflection is withheld; keeps the crisis notice for the high band. */
export function fallbackReflection(band: RiskBand): string {
  return band === 'high' ? `${FALLBACK_REFLECTION} ${CRISIS_NOTICE}` : FALLBACK_REFLECTION;
}
