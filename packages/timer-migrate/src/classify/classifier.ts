import { analyzeHandleEscape, analyzeScheduleEscape } from "../analysis/escape"
import type { ScheduleFact, TimerFact } from "../facts/types"
import { translate, type CronExpression } from "../schedule/translator"
import { REASONS, manual, type SchedulerConfig, type Verdict } from "./verdict"

export interface ClassifyOptions {
  /** Called when no specific rule matched and the catch-all verdict is returned. */
  onUnclassified?: (fact: TimerFact) => void
}

function jobData(fact: TimerFact, schedule?: ScheduleFact): Record<string, string> {
  const data: Record<string, string> = {}
  if (fact.usesTimerInfo) {
    data.info = schedule?.info ?? ""
  }
  if (fact.migrationNotes.trim() !== "") {
    data.migrationNotes = fact.migrationNotes
  }
  return data
}

function config(fact: TimerFact, schedule?: ScheduleFact, trigger?: CronExpression): SchedulerConfig {
  const base = {
    persistent: schedule?.persistent ?? true,
    jobData: jobData(fact, schedule),
  }
  return trigger ? { ...base, trigger } : base
}

/**
 * Ordered decision table; the first matching rule wins. Mixed patterns and
 * escapes are checked before any success path.
 */
export function classify(
  fact: TimerFact,
  schedule?: ScheduleFact,
  options: ClassifyOptions = {}
): Verdict {
  if (fact.timerPattern === "mixed") {
    return manual(REASONS.mixedPattern)
  }

  const escapes = [analyzeHandleEscape(fact), analyzeScheduleEscape(fact)]
  const unsafe = escapes.flatMap((verdict) => (verdict.kind === "unsafe" ? [verdict.reason] : []))
  if (unsafe.length > 0) {
    return manual(...unsafe)
  }

  const translation = schedule ? translate(schedule) : undefined

  if (fact.dynamicTimerCreation && (translation === undefined || !translation.ok)) {
    return manual(REASONS.dynamicWithoutSchedule)
  }

  if (schedule && translation) {
    if (translation.ok) {
      return { kind: "automatic", config: config(fact, schedule, translation.value) }
    }
    return manual(translation.error.message)
  }

  if (fact.timeoutMethodCount <= 1) {
    return {
      kind: "partial-automatic",
      config: config(fact),
      reasons: [REASONS.programmaticTrigger],
    }
  }

  options.onUnclassified?.(fact)
  return manual(REASONS.unclassified)
}
