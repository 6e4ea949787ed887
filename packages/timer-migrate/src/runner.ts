import { SpanStatusCode, trace, type Span, type Tracer } from "@opentelemetry/api"
import { checkPatternConsistency } from "./analysis/consistency"
import { classify } from "./classify/classifier"
import { UnclassifiedPatternError } from "./errors"
import { parseUnit, unitLabel } from "./facts/schema"
import type { MigrationUnit } from "./facts/types"
import { emit } from "./report/emitter"
import type { UnitReport } from "./report/types"

export const DEFAULT_CONCURRENCY = 4

export interface AnalyzeOptions {
  group?: string
  onUnclassified?: (error: UnclassifiedPatternError) => void
}

export interface BatchOptions extends AnalyzeOptions {
  concurrency?: number
  /** Defaults to the globally registered tracer, a no-op unless an SDK is installed. */
  tracer?: Tracer
}

export function analyzeUnit(unit: MigrationUnit, options: AnalyzeOptions = {}): UnitReport {
  const verdict = classify(unit.timer, unit.schedule, {
    onUnclassified: () => options.onUnclassified?.(new UnclassifiedPatternError(unit.name)),
  })
  const report = emit(unit.name, verdict, { group: options.group })
  return { ...report, warnings: checkPatternConsistency(unit.timer) }
}

function failedReport(name: string, error: unknown): UnitReport {
  return {
    unit: name,
    status: "manual-required",
    reasons: [error instanceof Error ? error.message : String(error)],
    warnings: [],
  }
}

async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (next < items.length) {
      const index = next++
      results[index] = await worker(items[index], index)
    }
  })

  await Promise.all(lanes)
  return results
}

function traceUnit(span: Span, raw: unknown, index: number, options: AnalyzeOptions): UnitReport {
  const name = unitLabel(raw, index)
  span.setAttribute("unit.name", name)

  try {
    const report = analyzeUnit(parseUnit(raw, index), options)
    span.setAttribute("verdict.status", report.status)
    span.setStatus({ code: SpanStatusCode.OK })
    return report
  } catch (err) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: err instanceof Error ? err.message : String(err),
    })
    if (err instanceof Error) {
      span.recordException(err)
    }
    const report = failedReport(name, err)
    span.setAttribute("verdict.status", report.status)
    return report
  } finally {
    span.end()
  }
}

/**
 * Classifies every unit of a batch. Units are independent: one with invalid
 * facts becomes a manual-required report and the rest carry on. Output order
 * matches input order.
 */
export async function analyzeBatch(
  units: readonly unknown[],
  options: BatchOptions = {}
): Promise<UnitReport[]> {
  const tracer = options.tracer ?? trace.getTracer("timer-migrate")
  const concurrency = Math.max(1, Math.trunc(options.concurrency ?? DEFAULT_CONCURRENCY))

  return runPool(units, concurrency, async (raw, index) => {
    // yield between units so lanes interleave
    await Promise.resolve()
    return tracer.startActiveSpan("timer-migrate.unit", (span) =>
      traceUnit(span, raw, index, options)
    )
  })
}
