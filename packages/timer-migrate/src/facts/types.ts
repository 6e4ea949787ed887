export type TimerPattern = "interval" | "single" | "calendar" | "mixed" | "unknown"

/**
 * Observed TimerService usage of one class. Produced by an extraction step
 * upstream and treated as read-only here.
 */
export interface TimerFact {
  readonly timerPattern: TimerPattern
  readonly usesTimerInfo: boolean
  /** Timers are created outside a fixed startup path. */
  readonly dynamicTimerCreation: boolean
  readonly timeoutMethodCount: number
  readonly usesTimerHandle: boolean
  /** The handle is stored in a field, returned, or passed to another method. */
  readonly timerHandleEscapes: boolean
  /** A TimerHandle arrives as a parameter of a timeout callback. */
  readonly usesTimerHandleParamInTimeout: boolean
  readonly usesTimerGetSchedule: boolean
  readonly timerGetScheduleEscapes: boolean
  readonly hasSingleTimer: boolean
  readonly hasIntervalTimer: boolean
  readonly hasCalendarTimer: boolean
  /** Advisory text, carried into the job data map and never classified on. */
  readonly migrationNotes: string
}

export type ScheduleField =
  | "second"
  | "minute"
  | "hour"
  | "dayOfMonth"
  | "month"
  | "dayOfWeek"
  | "year"

export const SCHEDULE_FIELDS: readonly ScheduleField[] = [
  "second",
  "minute",
  "hour",
  "dayOfMonth",
  "month",
  "dayOfWeek",
  "year",
]

/**
 * One `@Schedule` declaration. When `rawExpression` is non-empty the calendar
 * fields could not be resolved statically and must not be translated.
 */
export interface ScheduleFact {
  readonly second: string
  readonly minute: string
  readonly hour: string
  readonly dayOfMonth: string
  readonly month: string
  readonly dayOfWeek: string
  readonly year: string
  /** Empty inherits the system default. */
  readonly timezone: string
  readonly info: string
  readonly persistent: boolean
  readonly rawExpression: string
}

export interface MigrationUnit {
  readonly name: string
  readonly timer: TimerFact
  readonly schedule?: ScheduleFact
}

const TIMER_FACT_DEFAULTS: TimerFact = {
  timerPattern: "unknown",
  usesTimerInfo: false,
  dynamicTimerCreation: false,
  timeoutMethodCount: 0,
  usesTimerHandle: false,
  timerHandleEscapes: false,
  usesTimerHandleParamInTimeout: false,
  usesTimerGetSchedule: false,
  timerGetScheduleEscapes: false,
  hasSingleTimer: false,
  hasIntervalTimer: false,
  hasCalendarTimer: false,
  migrationNotes: "",
}

// EJB 3.2 @Schedule defaults; note persistent is true unless stated otherwise.
const SCHEDULE_FACT_DEFAULTS: ScheduleFact = {
  second: "0",
  minute: "0",
  hour: "0",
  dayOfMonth: "*",
  month: "*",
  dayOfWeek: "*",
  year: "*",
  timezone: "",
  info: "",
  persistent: true,
  rawExpression: "",
}

export function timerFact(overrides: Partial<TimerFact> = {}): TimerFact {
  return Object.freeze({ ...TIMER_FACT_DEFAULTS, ...overrides })
}

export function scheduleFact(overrides: Partial<ScheduleFact> = {}): ScheduleFact {
  return Object.freeze({ ...SCHEDULE_FACT_DEFAULTS, ...overrides })
}
