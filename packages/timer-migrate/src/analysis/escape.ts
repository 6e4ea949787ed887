import type { TimerFact } from "../facts/types"

export type EscapeVerdict = { kind: "safe" } | { kind: "unsafe"; reason: string }

export const HANDLE_ESCAPE_REASON = "handle lifetime not provably local"
export const SCHEDULE_ESCAPE_REASON = "schedule object lifetime not provably local"

const SAFE: EscapeVerdict = Object.freeze({ kind: "safe" })

/**
 * A TimerHandle is only safe to rewrite when it never leaves the method that
 * obtained it and never arrives from outside as a timeout parameter.
 */
export function analyzeHandleEscape(fact: TimerFact): EscapeVerdict {
  if (!fact.usesTimerHandle) {
    return SAFE
  }
  if (!fact.timerHandleEscapes && !fact.usesTimerHandleParamInTimeout) {
    return SAFE
  }
  return { kind: "unsafe", reason: HANDLE_ESCAPE_REASON }
}

/**
 * `Timer.getSchedule()` is safe only inside the timeout callback; passing it
 * on, returning it, or calling it elsewhere is an escape.
 */
export function analyzeScheduleEscape(fact: TimerFact): EscapeVerdict {
  if (!fact.usesTimerGetSchedule || !fact.timerGetScheduleEscapes) {
    return SAFE
  }
  return { kind: "unsafe", reason: SCHEDULE_ESCAPE_REASON }
}
