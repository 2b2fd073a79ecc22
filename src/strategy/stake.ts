/**
 * Stake Sizing
 *
 * Confidence maps linearly onto [1, maxStake] once it clears the betting
 * threshold; below the threshold the stake is 0, meaning "no bet".
 */

export const DEFAULT_MIN_CONFIDENCE = 0.55;
export const DEFAULT_MAX_STAKE = 20;

export interface StakeOptions {
  minConfidence?: number;
  maxStake?: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Probability kept away from certainty, as the remote scorer expects
 */
export function clampProbability(pYes: number | undefined): number {
  if (pYes === undefined || Number.isNaN(pYes)) return 0.5;
  return clamp(pYes, 0.01, 0.99);
}

export function clampUnit(value: number | undefined): number {
  if (value === undefined || Number.isNaN(value)) return 0;
  return clamp(value, 0, 1);
}

/**
 * Stake for a confidence score; a bet that clears the threshold is never sized to 0
 */
export function calcStake(confidence: number, options: StakeOptions = {}): number {
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  const maxStake = options.maxStake ?? DEFAULT_MAX_STAKE;

  if (confidence < minConfidence) return 0;
  return clamp(Math.round(maxStake * (confidence - 0.5) * 2), 1, maxStake);
}

/**
 * A confident NO counts as much as a confident YES: for binary questions with
 * pYes below 0.5 the confidence is lifted to at least 1 - pYes.
 */
export function effectiveConfidence(pYes: number, confidence: number, binary = true): number {
  if (binary && pYes < 0.5) {
    return Math.max(confidence, 1 - pYes);
  }
  return confidence;
}
