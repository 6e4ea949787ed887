import type { ScheduleField } from "./facts/types"

export class NonLiteralScheduleError extends Error {
  override readonly name = "NonLiteralScheduleError"
  readonly code = "NonLiteralSchedule"

  constructor(readonly rawExpression: string) {
    super(`schedule is not statically resolvable: ${rawExpression}`)
  }
}

export class UnsupportedTokenError extends Error {
  override readonly name = "UnsupportedTokenError"
  readonly code = "UnsupportedToken"

  constructor(
    readonly field: ScheduleField,
    readonly value: string,
    detail?: string
  ) {
    super(
      detail
        ? `unsupported token in ${field}: "${value}" (${detail})`
        : `unsupported token in ${field}: "${value}"`
    )
  }
}

export class CronSyntaxError extends Error {
  override readonly name = "CronSyntaxError"

  constructor(readonly expression: string) {
    super(`expected 6 or 7 cron fields: "${expression}"`)
  }
}

export type TranslationError = NonLiteralScheduleError | UnsupportedTokenError

export class UnclassifiedPatternError extends Error {
  override readonly name = "UnclassifiedPatternError"
  readonly code = "UnclassifiedPattern"

  constructor(readonly unit: string) {
    super(`no classification rule matched ${unit}`)
  }
}

export class FactValidationError extends Error {
  override readonly name = "FactValidationError"

  constructor(
    message: string,
    readonly unit: string,
    readonly issues: readonly string[]
  ) {
    super(message)
  }
}
