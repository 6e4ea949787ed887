import { UnsupportedTokenError } from "../errors"
import type { ScheduleField } from "../facts/types"

interface FieldDomain {
  min: number
  max: number
  names?: readonly string[]
  /** Numeric value of `names[0]`. */
  nameBase?: number
  /** Largest increment Quartz accepts for the field. */
  maxStep: number
}

export const MONTH_NAMES = [
  "JAN", "FEB", "MAR", "APR", "MAY", "JUN",
  "JUL", "AUG", "SEP", "OCT", "NOV", "DEC",
] as const

export const DAY_NAMES = ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"] as const

const DOMAINS: Record<ScheduleField, FieldDomain> = {
  second: { min: 0, max: 59, maxStep: 59 },
  minute: { min: 0, max: 59, maxStep: 59 },
  hour: { min: 0, max: 23, maxStep: 23 },
  dayOfMonth: { min: 1, max: 31, maxStep: 31 },
  month: { min: 1, max: 12, names: MONTH_NAMES, nameBase: 1, maxStep: 12 },
  // 0 and 7 are both Sunday
  dayOfWeek: { min: 0, max: 7, names: DAY_NAMES, nameBase: 0, maxStep: 7 },
  year: { min: 1970, max: 2099, maxStep: 129 },
}

const DIGITS = /^\d+$/

interface Atom {
  value: number
  text: string
}

/**
 * Validates one schedule field and returns it in normalized form: names upper
 * case, leading zeros dropped, day-of-week numbers rewritten as names.
 */
export function normalizeField(field: ScheduleField, raw: string): string {
  const token = raw.trim()
  if (token === "*") {
    return "*"
  }

  const items = token.split(",")
  return items.map((item) => normalizeItem(field, raw, item.trim())).join(",")
}

function normalizeItem(field: ScheduleField, raw: string, item: string): string {
  const domain = DOMAINS[field]
  const slash = item.indexOf("/")
  if (slash !== -1) {
    const start = item.slice(0, slash)
    const step = item.slice(slash + 1)
    if (!DIGITS.test(step) || Number(step) < 1) {
      throw new UnsupportedTokenError(field, raw)
    }
    if (Number(step) > domain.maxStep) {
      throw new UnsupportedTokenError(
        field,
        raw,
        `increment ${Number(step)} is larger than ${domain.maxStep}`
      )
    }
    const base = start === "*" ? "*" : normalizeRangeOrAtom(field, raw, start)
    return `${base}/${Number(step)}`
  }

  return normalizeRangeOrAtom(field, raw, item)
}

function normalizeRangeOrAtom(field: ScheduleField, raw: string, text: string): string {
  const dash = text.indexOf("-")
  if (dash === -1) {
    return parseAtom(field, raw, text, "start").text
  }

  const from = parseAtom(field, raw, text.slice(0, dash), "start")
  const to = parseAtom(field, raw, text.slice(dash + 1), "end")
  if (from.value > to.value) {
    throw new UnsupportedTokenError(field, raw, "descending range")
  }
  // 0-7 covers the whole week but both ends print as SUN
  if (field === "dayOfWeek" && to.value - from.value >= 7) {
    return "SUN-SAT"
  }
  return `${from.text}-${to.text}`
}

function parseAtom(
  field: ScheduleField,
  raw: string,
  text: string,
  position: "start" | "end"
): Atom {
  const domain = DOMAINS[field]

  if (DIGITS.test(text)) {
    const value = Number(text)
    if (value < domain.min || value > domain.max) {
      throw new UnsupportedTokenError(field, raw, `${value} is outside ${domain.min}-${domain.max}`)
    }
    if (field === "dayOfWeek") {
      return { value, text: DAY_NAMES[value % 7] ?? String(value) }
    }
    return { value, text: String(value) }
  }

  const upper = text.toUpperCase()
  const index = domain.names?.indexOf(upper) ?? -1
  if (index === -1) {
    throw new UnsupportedTokenError(field, raw)
  }

  let value = index + (domain.nameBase ?? 0)
  // SUN closing a range means the trailing Sunday (7)
  if (field === "dayOfWeek" && value === 0 && position === "end") {
    value = 7
  }
  return { value, text: upper }
}

/** Quartz numbers days 1-7 starting at Sunday. */
export function quartzDayNumbersToNames(token: string): string {
  return token
    .split(",")
    .map((item) => {
      const slash = item.indexOf("/")
      const base = slash === -1 ? item : item.slice(0, slash)
      const step = slash === -1 ? "" : item.slice(slash)
      const named = base.replace(/\d+/g, (digits) => DAY_NAMES[Number(digits) - 1] ?? digits)
      return `${named}${step}`
    })
    .join(",")
}
