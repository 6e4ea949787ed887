import { SYSTEM_TIMEZONE } from "../schedule/translator"
import type { JobSkeleton, MigrationReport, ReportStatus, UnitReport } from "./types"

const STATUS_DISPLAY: Record<ReportStatus, string> = {
  automatic: "automatic",
  "partial-automatic": "partially automatic, trigger TBD",
  "manual-required": "manual migration required",
}

function javaString(value: string): string {
  return JSON.stringify(value)
}

/** Quartz builder calls equivalent to the generated skeleton. */
export function renderQuartzConfig(job: JobSkeleton): string[] {
  const lines: string[] = []

  lines.push(`JobDetail job = JobBuilder.newJob(${job.jobClass}.class)`)
  lines.push(`    .withIdentity(${javaString(job.identity.name)}, ${javaString(job.identity.group)})`)
  if (job.durable) {
    lines.push("    .storeDurably()")
  }
  if (job.requestsRecovery) {
    lines.push("    .requestRecovery()")
  }
  for (const [key, value] of Object.entries(job.dataMap)) {
    lines.push(`    .usingJobData(${javaString(key)}, ${javaString(value)})`)
  }
  lines.push("    .build();")
  lines.push("")

  const trigger = job.trigger
  if (trigger.kind === "tbd") {
    lines.push("// Trigger TBD: configure the schedule the timer service created at runtime")
    return lines
  }

  let schedule = `CronScheduleBuilder.cronSchedule(${javaString(trigger.cron)})`
  if (trigger.timezone !== SYSTEM_TIMEZONE) {
    schedule += `.inTimeZone(TimeZone.getTimeZone(${javaString(trigger.timezone)}))`
  }

  lines.push("Trigger trigger = TriggerBuilder.newTrigger()")
  lines.push("    .forJob(job)")
  lines.push(
    `    .withIdentity(${javaString(trigger.identity.name)}, ${javaString(trigger.identity.group)})`
  )
  lines.push(`    .withSchedule(${schedule})`)
  lines.push("    .build();")
  return lines
}

function pushWarnings(sections: string[], unit: UnitReport): void {
  if (unit.warnings.length === 0) return
  sections.push("**Warnings**:")
  unit.warnings.forEach((warning) => sections.push(`- ${warning}`))
}

export function generateReport(report: MigrationReport): string {
  const sections: string[] = []

  sections.push("# Timer Migration Report")
  sections.push(`Generated: ${report.generatedAt}`)
  sections.push("")

  sections.push("## Summary")
  sections.push(`- ✅ Automatically migrated: ${report.stats.automatic} units`)
  sections.push(`- ⚠️ Job generated, trigger TBD: ${report.stats.partialAutomatic} units`)
  sections.push(`- 🔴 Requires manual migration: ${report.stats.manualRequired} units`)
  sections.push(`- 📁 Units processed: ${report.stats.unitsProcessed}`)
  sections.push("")

  const generated = report.units.filter((unit) => unit.job !== undefined)
  if (generated.length > 0) {
    sections.push("## Generated Scheduler Configuration")
    generated.forEach((unit, index) => {
      sections.push(`### ${index + 1}. ${unit.unit}`)
      sections.push(`**Status**: ${STATUS_DISPLAY[unit.status]}`)
      if (unit.job) {
        sections.push("```java")
        renderQuartzConfig(unit.job).forEach((line) => sections.push(line))
        sections.push("```")
      }
      unit.reasons.forEach((reason) => sections.push(`- ${reason}`))
      pushWarnings(sections, unit)
      sections.push("")
    })
  }

  const manual = report.units.filter((unit) => unit.status === "manual-required")
  if (manual.length > 0) {
    sections.push("## Manual Migration Required")
    manual.forEach((unit, index) => {
      sections.push(`### ${index + 1}. ${unit.unit}`)
      unit.reasons.forEach((reason) => sections.push(`- ${reason}`))
      pushWarnings(sections, unit)
      sections.push("")
    })
  }

  sections.push("## Machine-Readable Report")
  sections.push("```json")
  sections.push(JSON.stringify({ stats: report.stats, units: report.units }, null, 2))
  sections.push("```")

  return sections.join("\n")
}
