import type { VerdictKind } from "../classify/verdict"

export type ReportStatus = VerdictKind

export interface JobIdentity {
  name: string
  group: string
}

export type TriggerSpec =
  | { kind: "cron"; identity: JobIdentity; cron: string; timezone: string }
  | { kind: "tbd" }

export interface JobSkeleton {
  identity: JobIdentity
  jobClass: string
  durable: boolean
  requestsRecovery: boolean
  trigger: TriggerSpec
  dataMap: Record<string, string>
}

export interface UnitReport {
  unit: string
  status: ReportStatus
  reasons: string[]
  job?: JobSkeleton
  warnings: string[]
}

export interface BatchStats {
  unitsProcessed: number
  automatic: number
  partialAutomatic: number
  manualRequired: number
}

export interface MigrationReport {
  generatedAt: string
  stats: BatchStats
  units: UnitReport[]
}
