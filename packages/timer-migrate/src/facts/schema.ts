import { z } from "zod"
import { FactValidationError } from "../errors"
import {
  scheduleFact,
  timerFact,
  type MigrationUnit,
  type TimerPattern,
} from "./types"

const timerPatternSchema = z
  .enum(["interval", "single", "calendar", "mixed", "unknown", ""])
  .default("")
  .transform((value): TimerPattern => (value === "" ? "unknown" : value))

export const timerFactSchema = z.object({
  timerPattern: timerPatternSchema,
  usesTimerInfo: z.boolean().default(false),
  dynamicTimerCreation: z.boolean().default(false),
  timeoutMethodCount: z.number().int().nonnegative().default(0),
  usesTimerHandle: z.boolean().default(false),
  timerHandleEscapes: z.boolean().default(false),
  usesTimerHandleParamInTimeout: z.boolean().default(false),
  usesTimerGetSchedule: z.boolean().default(false),
  timerGetScheduleEscapes: z.boolean().default(false),
  hasSingleTimer: z.boolean().default(false),
  hasIntervalTimer: z.boolean().default(false),
  hasCalendarTimer: z.boolean().default(false),
  migrationNotes: z.string().default(""),
})

export const scheduleFactSchema = z.object({
  second: z.string().default("0"),
  minute: z.string().default("0"),
  hour: z.string().default("0"),
  dayOfMonth: z.string().default("*"),
  month: z.string().default("*"),
  dayOfWeek: z.string().default("*"),
  year: z.string().default("*"),
  timezone: z.string().default(""),
  info: z.string().default(""),
  persistent: z.boolean().default(true),
  rawExpression: z.string().default(""),
})

export const unitSchema = z.object({
  name: z.string().min(1),
  timer: timerFactSchema.default({}),
  schedule: scheduleFactSchema.nullish(),
})

/** Units stay opaque here so one malformed entry cannot reject the batch. */
export const batchSchema = z.object({
  units: z.array(z.unknown()),
})

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  )
}

export function unitLabel(raw: unknown, index: number): string {
  if (typeof raw === "object" && raw !== null && "name" in raw) {
    const name = raw.name
    if (typeof name === "string" && name.length > 0) {
      return name
    }
  }
  return `units[${index}]`
}

export function parseUnit(raw: unknown, index = 0): MigrationUnit {
  const result = unitSchema.safeParse(raw)
  if (!result.success) {
    const label = unitLabel(raw, index)
    const issues = formatIssues(result.error)
    throw new FactValidationError(`invalid facts for ${label}: ${issues.join("; ")}`, label, issues)
  }

  const { name, timer, schedule } = result.data
  return schedule
    ? { name, timer: timerFact(timer), schedule: scheduleFact(schedule) }
    : { name, timer: timerFact(timer) }
}

export function parseBatch(raw: unknown): unknown[] {
  const result = batchSchema.safeParse(raw)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new FactValidationError(`invalid fact batch: ${issues.join("; ")}`, "batch", issues)
  }
  return result.data.units
}
