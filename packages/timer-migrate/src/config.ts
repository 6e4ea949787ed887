import { z } from "zod"
import { DEFAULT_JOB_GROUP } from "./report/emitter"
import { DEFAULT_CONCURRENCY } from "./runner"

const ENV_PREFIX = "TIMER_MIGRATE_"

export type OutputFormat = "markdown" | "json"

export interface CliOptions {
  input: string
  out: string
  format: OutputFormat
  concurrency: number
  group: string
  dry: boolean
}

const optionsSchema = z.object({
  input: z.string().min(1, "a fact batch file is required"),
  out: z.string().min(1).optional(),
  format: z.enum(["markdown", "json"]).default("markdown"),
  concurrency: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
  group: z.string().min(1).default(DEFAULT_JOB_GROUP),
  dry: z.boolean().default(false),
})

type RawOptions = Record<string, string | boolean | undefined>

const VALUE_FLAGS = new Set(["out", "format", "concurrency", "group"])

/** `--key=value`, `--key value` and bare `--flag` are accepted. */
export function parseArgs(argv: readonly string[]): { positional: string[]; flags: RawOptions } {
  const positional: string[] = []
  const flags: RawOptions = {}

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === undefined) continue
    if (!arg.startsWith("--")) {
      positional.push(arg)
      continue
    }

    const body = arg.slice(2)
    const eq = body.indexOf("=")
    if (eq !== -1) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const value = argv[i + 1]
    if (value !== undefined && !value.startsWith("--") && VALUE_FLAGS.has(body)) {
      flags[body] = value
      i++
    } else {
      flags[body] = true
    }
  }

  return { positional, flags }
}

function fromEnv(env: NodeJS.ProcessEnv): RawOptions {
  return {
    format: env[`${ENV_PREFIX}FORMAT`],
    concurrency: env[`${ENV_PREFIX}CONCURRENCY`],
    group: env[`${ENV_PREFIX}GROUP`],
  }
}

function defined(options: RawOptions): RawOptions {
  return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined))
}

/**
 * Command-line flags take precedence over `TIMER_MIGRATE_*` variables, which
 * take precedence over defaults.
 */
export function resolveOptions(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const { positional, flags } = parseArgs(argv)
  const json = flags.json === true

  const merged = {
    ...defined(fromEnv(env)),
    ...defined({
      out: flags.out,
      format: json ? "json" : flags.format,
      concurrency: flags.concurrency,
      group: flags.group,
    }),
    input: positional[0] ?? "",
    dry: flags.dry === true,
  }

  const result = optionsSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new Error(`invalid options: ${issues.join("; ")}`)
  }

  const { out, ...options } = result.data
  return {
    ...options,
    out: out ?? (options.format === "json" ? "migration-report.json" : "migration-report.md"),
  }
}
