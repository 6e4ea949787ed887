import type { TimerFact, TimerPattern } from "../facts/types"

type CreationFlag = "hasSingleTimer" | "hasIntervalTimer" | "hasCalendarTimer"

const FLAG_PATTERN: Record<CreationFlag, TimerPattern> = {
  hasSingleTimer: "single",
  hasIntervalTimer: "interval",
  hasCalendarTimer: "calendar",
}

const FLAGS: readonly CreationFlag[] = ["hasSingleTimer", "hasIntervalTimer", "hasCalendarTimer"]

/**
 * Lists disagreements between `timerPattern` and the creation-API flags.
 * Advisory only: the declared pattern stays authoritative for classification.
 */
export function checkPatternConsistency(fact: TimerFact): string[] {
  const set = FLAGS.filter((flag) => fact[flag])
  const { timerPattern } = fact

  if (timerPattern === "unknown") {
    return []
  }

  if (timerPattern === "mixed") {
    return set.length === 1
      ? [`timerPattern is mixed but only ${set[0]} is set`]
      : []
  }

  return set
    .filter((flag) => FLAG_PATTERN[flag] !== timerPattern)
    .map((flag) => `${flag} is set but timerPattern is ${timerPattern}`)
}
