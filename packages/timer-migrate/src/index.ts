export const version = "0.1.0"

export { timerFact, scheduleFact, SCHEDULE_FIELDS } from "./facts/types"
export type {
  TimerFact,
  TimerPattern,
  ScheduleFact,
  ScheduleField,
  MigrationUnit,
} from "./facts/types"
export { parseUnit, parseBatch, timerFactSchema, scheduleFactSchema } from "./facts/schema"
export { translate, parseCron, SYSTEM_TIMEZONE } from "./schedule/translator"
export type { CronExpression, CronFields, TranslationResult } from "./schedule/translator"
export { analyzeHandleEscape, analyzeScheduleEscape } from "./analysis/escape"
export type { EscapeVerdict } from "./analysis/escape"
export { checkPatternConsistency } from "./analysis/consistency"
export { classify } from "./classify/classifier"
export type { ClassifyOptions } from "./classify/classifier"
export { REASONS } from "./classify/verdict"
export type { Verdict, VerdictKind, SchedulerConfig } from "./classify/verdict"
export { emit, jobClassName, DEFAULT_JOB_GROUP } from "./report/emitter"
export { MigrationCollector } from "./report/collector"
export { generateReport, renderQuartzConfig } from "./report/generator"
export type {
  UnitReport,
  JobSkeleton,
  TriggerSpec,
  MigrationReport,
  BatchStats,
} from "./report/types"
export { analyzeBatch, analyzeUnit, DEFAULT_CONCURRENCY } from "./runner"
export type { AnalyzeOptions, BatchOptions } from "./runner"
export { resolveOptions, parseArgs } from "./config"
export type { CliOptions, OutputFormat } from "./config"
export {
  NonLiteralScheduleError,
  UnsupportedTokenError,
  UnclassifiedPatternError,
  FactValidationError,
  CronSyntaxError,
} from "./errors"
export type { TranslationError } from "./errors"
