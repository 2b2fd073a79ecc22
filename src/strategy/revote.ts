/**
 * Revote Policy
 *
 * Per market: unvoted -> voted on a successful submission. Whether a voted
 * market is submitted again depends on the mode.
 */

export type RevoteMode =
  | { kind: "never" }
  | { kind: "always" }
  | { kind: "deadline-window"; windowSeconds: number };

export type RevoteReason = "new" | "revote-always" | "revote-deadline" | "already-voted";

export interface RevoteDecision {
  submit: boolean;
  reason: RevoteReason;
  /** Seconds until the deadline, when one was known */
  secondsToDeadline?: number;
}

export interface RevoteInput {
  mode: RevoteMode;
  /** Whether the remote service reports an existing vote */
  hasExisting: boolean;
  deadlineAt?: string | null;
  now?: Date;
}

/**
 * ALLOW_REVOTE wins over REVOTE_DEADLINE_WITHIN; neither means never
 */
export function revoteModeFromFlags(allowRevote: boolean, deadlineWithinSeconds: number): RevoteMode {
  if (allowRevote) return { kind: "always" };
  if (deadlineWithinSeconds > 0) return { kind: "deadline-window", windowSeconds: deadlineWithinSeconds };
  return { kind: "never" };
}

export function describeRevoteMode(mode: RevoteMode): string {
  switch (mode.kind) {
    case "never":
      return "never";
    case "always":
      return "always";
    case "deadline-window":
      return `within ${mode.windowSeconds}s of deadline`;
  }
}

function secondsUntil(deadlineAt: string | null | undefined, now: Date): number | undefined {
  if (!deadlineAt) return undefined;
  const deadline = Date.parse(deadlineAt);
  if (Number.isNaN(deadline)) return undefined;
  return Math.floor(deadline / 1000) - Math.floor(now.getTime() / 1000);
}

export function decideRevote(input: RevoteInput): RevoteDecision {
  if (!input.hasExisting) {
    return { submit: true, reason: "new" };
  }

  switch (input.mode.kind) {
    case "never":
      return { submit: false, reason: "already-voted" };
    case "always":
      return { submit: true, reason: "revote-always" };
    case "deadline-window": {
      const remaining = secondsUntil(input.deadlineAt, input.now ?? new Date());
      // Unknown deadline never counts as inside the window
      if (remaining !== undefined && remaining <= input.mode.windowSeconds) {
        return { submit: true, reason: "revote-deadline", secondsToDeadline: remaining };
      }
      return { submit: false, reason: "already-voted", secondsToDeadline: remaining };
    }
  }
}
