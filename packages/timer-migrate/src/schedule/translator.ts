import {
  CronSyntaxError,
  NonLiteralScheduleError,
  UnsupportedTokenError,
  type TranslationError,
} from "../errors"
import { SCHEDULE_FIELDS, type ScheduleFact, type ScheduleField } from "../facts/types"
import { normalizeField, quartzDayNumbersToNames } from "./grammar"

export const SYSTEM_TIMEZONE = "system"

export type CronFields = Record<ScheduleField, string>

export interface CronExpression {
  /** Seven Quartz fields: second minute hour day-of-month month day-of-week year. */
  readonly expression: string
  readonly timezone: string
  readonly fields: CronFields
}

export type TranslationResult =
  | { ok: true; value: CronExpression }
  | { ok: false; error: TranslationError }

function normalizeFields(source: CronFields): CronFields {
  const fields: CronFields = { ...source }
  for (const field of SCHEDULE_FIELDS) {
    fields[field] = normalizeField(field, source[field])
  }
  return fields
}

/** `source` holds the fields as written, for error messages. */
function formatExpression(fields: CronFields, source: CronFields): string {
  let dayOfMonth = fields.dayOfMonth
  let dayOfWeek = fields.dayOfWeek

  // Quartz wants "?" in exactly one of the day fields
  if (dayOfWeek === "*") {
    dayOfWeek = "?"
  } else if (dayOfMonth === "*") {
    dayOfMonth = "?"
  } else {
    throw new UnsupportedTokenError(
      "dayOfWeek",
      source.dayOfWeek,
      `cannot be combined with dayOfMonth "${source.dayOfMonth}"`
    )
  }

  return [
    fields.second,
    fields.minute,
    fields.hour,
    dayOfMonth,
    fields.month,
    dayOfWeek,
    fields.year,
  ].join(" ")
}

export function translate(schedule: ScheduleFact): TranslationResult {
  if (schedule.rawExpression.trim() !== "") {
    return { ok: false, error: new NonLiteralScheduleError(schedule.rawExpression) }
  }

  try {
    const source: CronFields = {
      second: schedule.second,
      minute: schedule.minute,
      hour: schedule.hour,
      dayOfMonth: schedule.dayOfMonth,
      month: schedule.month,
      dayOfWeek: schedule.dayOfWeek,
      year: schedule.year,
    }
    const fields = normalizeFields(source)
    const timezone = schedule.timezone.trim() === "" ? SYSTEM_TIMEZONE : schedule.timezone.trim()
    return { ok: true, value: { expression: formatExpression(fields, source), timezone, fields } }
  } catch (error) {
    if (error instanceof UnsupportedTokenError) {
      return { ok: false, error }
    }
    throw error
  }
}

/**
 * Reads a Quartz cron string back into schedule fields. `?` reads as `*` and
 * a missing year as `*`, so `parseCron(translate(s).expression)` yields the
 * normalized fields of `s`.
 */
export function parseCron(expression: string): CronFields {
  const parts = expression.trim().split(/\s+/)
  if (parts.length !== 6 && parts.length !== 7) {
    throw new CronSyntaxError(expression)
  }

  const [second, minute, hour, dayOfMonth, month, dayOfWeek, year] = parts.map((part) =>
    part === "?" ? "*" : part
  )
  return normalizeFields({
    second: second ?? "*",
    minute: minute ?? "*",
    hour: hour ?? "*",
    dayOfMonth: dayOfMonth ?? "*",
    month: month ?? "*",
    dayOfWeek: quartzDayNumbersToNames(dayOfWeek ?? "*"),
    year: year ?? "*",
  })
}
