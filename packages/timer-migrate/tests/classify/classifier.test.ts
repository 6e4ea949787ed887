import { describe, it, expect, vi } from "vitest"
import { classify } from "../../src/classify/classifier"
import { REASONS } from "../../src/classify/verdict"
import { scheduleFact, timerFact, type TimerPattern } from "../../src/facts/types"

const nightly = scheduleFact({ second: "0", minute: "0", hour: "2" })
const nonLiteral = scheduleFact({ rawExpression: "@Schedules({...})" })
const patterns: TimerPattern[] = ["interval", "single", "calendar", "mixed", "unknown"]

describe("classify", () => {
  it("migrates a literal single-timer schedule automatically", () => {
    const fact = timerFact({ timerPattern: "single", hasSingleTimer: true })
    const verdict = classify(fact, nightly)

    expect(verdict.kind).toBe("automatic")
    if (verdict.kind !== "automatic") return
    expect(verdict.config.trigger?.expression).toBe("0 0 2 * * ? *")
    expect(verdict.config.trigger?.timezone).toBe("system")
    expect(verdict.config.persistent).toBe(true)
    expect(verdict.config.jobData).toEqual({})
  })

  it("requires manual work when a timer handle escapes, with or without a schedule", () => {
    const fact = timerFact({ usesTimerHandle: true, timerHandleEscapes: true })

    expect(classify(fact)).toEqual({
      kind: "manual-required",
      reasons: ["handle lifetime not provably local"],
    })
    expect(classify(fact, nightly)).toEqual({
      kind: "manual-required",
      reasons: ["handle lifetime not provably local"],
    })
  })

  it("requires manual work for dynamic timers without a schedule", () => {
    expect(classify(timerFact({ dynamicTimerCreation: true }))).toEqual({
      kind: "manual-required",
      reasons: ["dynamic timer creation without static schedule"],
    })
  })

  it("gives mixed patterns precedence over a translatable schedule", () => {
    const fact = timerFact({ timerPattern: "mixed", hasSingleTimer: true, hasIntervalTimer: true })

    expect(classify(fact, nightly)).toEqual({
      kind: "manual-required",
      reasons: ["mixed timer creation patterns require manual job-trigger mapping"],
    })
  })

  it("collects reasons from both escape checks in order", () => {
    const fact = timerFact({
      usesTimerHandle: true,
      usesTimerHandleParamInTimeout: true,
      usesTimerGetSchedule: true,
      timerGetScheduleEscapes: true,
    })

    expect(classify(fact, nightly)).toEqual({
      kind: "manual-required",
      reasons: [
        "handle lifetime not provably local",
        "schedule object lifetime not provably local",
      ],
    })
  })

  it("reports dynamic creation when the schedule cannot be translated", () => {
    expect(classify(timerFact({ dynamicTimerCreation: true }), nonLiteral)).toEqual({
      kind: "manual-required",
      reasons: [REASONS.dynamicWithoutSchedule],
    })
  })

  it("migrates dynamic timers that do have a literal schedule", () => {
    expect(classify(timerFact({ dynamicTimerCreation: true }), nightly).kind).toBe("automatic")
  })

  it("surfaces the translator error verbatim", () => {
    expect(classify(timerFact(), scheduleFact({ hour: "25" }))).toEqual({
      kind: "manual-required",
      reasons: ['unsupported token in hour: "25" (25 is outside 0-23)'],
    })
  })

  it("migrates day-of-week increments automatically", () => {
    const verdict = classify(timerFact(), scheduleFact({ dayOfWeek: "1/2" }))

    expect(verdict.kind).toBe("automatic")
    if (verdict.kind !== "automatic") return
    expect(verdict.config.trigger?.expression).toBe("0 0 0 ? * MON/2 *")
  })

  it("generates a trigger-less job for a single programmatic timeout", () => {
    const verdict = classify(timerFact({ timerPattern: "interval", timeoutMethodCount: 1 }))

    expect(verdict).toEqual({
      kind: "partial-automatic",
      config: { persistent: true, jobData: {} },
      reasons: ["manual Trigger configuration needed for programmatic timers"],
    })
  })

  it("falls through to unclassified for several programmatic timeouts", () => {
    const onUnclassified = vi.fn()
    const fact = timerFact({ timeoutMethodCount: 2 })

    expect(classify(fact, undefined, { onUnclassified })).toEqual({
      kind: "manual-required",
      reasons: ["unclassified timer usage pattern"],
    })
    expect(onUnclassified).toHaveBeenCalledTimes(1)
    expect(onUnclassified).toHaveBeenCalledWith(fact)
  })

  it("carries the info payload, notes and persistence flag into the config", () => {
    const fact = timerFact({ usesTimerInfo: true, migrationNotes: "runs after the ledger close" })
    const verdict = classify(fact, scheduleFact({ hour: "3", info: "nightly-ledger", persistent: false }))

    expect(verdict.kind).toBe("automatic")
    if (verdict.kind !== "automatic") return
    expect(verdict.config.persistent).toBe(false)
    expect(verdict.config.jobData).toEqual({
      info: "nightly-ledger",
      migrationNotes: "runs after the ledger close",
    })
  })

  it("is deterministic", () => {
    const fact = timerFact({ timerPattern: "calendar", usesTimerInfo: true })

    expect(classify(fact, nightly)).toEqual(classify(fact, nightly))
    expect(classify(fact)).toEqual(classify(fact))
  })

  it("never turns manual into automatic when a handle starts escaping", () => {
    for (const timerPattern of patterns) {
      for (const schedule of [undefined, nightly, nonLiteral]) {
        for (const dynamicTimerCreation of [false, true]) {
          const base = { timerPattern, dynamicTimerCreation, usesTimerHandle: true }
          const before = classify(timerFact({ ...base, timerHandleEscapes: false }), schedule)
          const after = classify(timerFact({ ...base, timerHandleEscapes: true }), schedule)

          expect(after.kind).toBe("manual-required")
          if (before.kind === "manual-required") {
            expect(after.kind).not.toBe("automatic")
          }
        }
      }
    }
  })

  it("forces manual work for any non-literal schedule", () => {
    for (const timerPattern of patterns) {
      for (const timeoutMethodCount of [0, 1, 3]) {
        const fact = timerFact({ timerPattern, timeoutMethodCount, hasCalendarTimer: true })
        expect(classify(fact, scheduleFact({ hour: "4", rawExpression: "HOURS" })).kind).toBe(
          "manual-required"
        )
      }
    }
  })
})
