import type { SchedulerConfig, Verdict } from "../classify/verdict"
import type { JobSkeleton, TriggerSpec, UnitReport } from "./types"

export const DEFAULT_JOB_GROUP = "ejb-timers"

export interface EmitOptions {
  group?: string
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

/**
 * `com.acme.Billing#nightly` becomes `BillingNightlyJob`, `com.acme.Billing`
 * becomes `BillingJob`.
 */
export function jobClassName(unitName: string): string {
  const [className = unitName, member] = unitName.split("#")
  const simple = className.slice(className.lastIndexOf(".") + 1).replace(/[^A-Za-z0-9_$]/g, "")
  const suffix = member ? capitalize(member.replace(/[^A-Za-z0-9_$]/g, "")) : ""
  return `${capitalize(simple) || "Timer"}${suffix}Job`
}

function jobSkeleton(unitName: string, config: SchedulerConfig, group: string): JobSkeleton {
  const trigger: TriggerSpec = config.trigger
    ? {
        kind: "cron",
        identity: { name: `${unitName}-trigger`, group },
        cron: config.trigger.expression,
        timezone: config.trigger.timezone,
      }
    : { kind: "tbd" }

  return {
    identity: { name: unitName, group },
    jobClass: jobClassName(unitName),
    durable: true,
    requestsRecovery: config.persistent,
    trigger,
    dataMap: { ...config.jobData },
  }
}

export function emit(unitName: string, verdict: Verdict, options: EmitOptions = {}): UnitReport {
  const group = options.group ?? DEFAULT_JOB_GROUP

  switch (verdict.kind) {
    case "automatic":
      return {
        unit: unitName,
        status: verdict.kind,
        reasons: [],
        job: jobSkeleton(unitName, verdict.config, group),
        warnings: [],
      }
    case "partial-automatic":
      return {
        unit: unitName,
        status: verdict.kind,
        reasons: [...verdict.reasons],
        job: jobSkeleton(unitName, verdict.config, group),
        warnings: [],
      }
    case "manual-required":
      return {
        unit: unitName,
        status: verdict.kind,
        reasons: [...verdict.reasons],
        warnings: [],
      }
    default: {
      const unreachable: never = verdict
      return unreachable
    }
  }
}
