import type { CronExpression } from "../schedule/translator"

export interface SchedulerConfig {
  /** Absent when the trigger has to be written by hand. */
  readonly trigger?: CronExpression
  readonly persistent: boolean
  readonly jobData: Readonly<Record<string, string>>
}

export type Verdict =
  | { readonly kind: "automatic"; readonly config: SchedulerConfig }
  | {
      readonly kind: "partial-automatic"
      readonly config: SchedulerConfig
      readonly reasons: readonly string[]
    }
  | { readonly kind: "manual-required"; readonly reasons: readonly string[] }

export type VerdictKind = Verdict["kind"]

export const REASONS = {
  mixedPattern: "mixed timer creation patterns require manual job-trigger mapping",
  dynamicWithoutSchedule: "dynamic timer creation without static schedule",
  programmaticTrigger: "manual Trigger configuration needed for programmatic timers",
  unclassified: "unclassified timer usage pattern",
} as const

export function manual(...reasons: string[]): Verdict {
  return { kind: "manual-required", reasons }
}
