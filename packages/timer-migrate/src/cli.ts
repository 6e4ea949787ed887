#!/usr/bin/env node

import { readFileSync, writeFileSync } from "node:fs"
import { resolve } from "node:path"
import { resolveOptions } from "./config"
import { parseBatch } from "./facts/schema"
import { MigrationCollector } from "./report/collector"
import { generateReport } from "./report/generator"
import { analyzeBatch } from "./runner"

async function main(): Promise<void> {
  const options = resolveOptions(process.argv.slice(2))
  const inputPath = resolve(process.cwd(), options.input)

  console.log(`🔄 Classifying timer facts from ${inputPath}`)
  console.log("")

  const units = parseBatch(JSON.parse(readFileSync(inputPath, "utf-8")))
  const reports = await analyzeBatch(units, {
    concurrency: options.concurrency,
    group: options.group,
    onUnclassified: (error) => console.warn(`⚠️  ${error.message}`),
  })

  const collector = new MigrationCollector()
  collector.addAll(reports)
  const report = collector.getReport()

  if (options.dry) {
    console.log("ℹ️  Dry run complete - no report was written")
  } else {
    const reportPath = resolve(process.cwd(), options.out)
    const body =
      options.format === "json" ? JSON.stringify(report, null, 2) : generateReport(report)
    writeFileSync(reportPath, body, "utf-8")
    console.log(`📄 Migration report saved to: ${reportPath}`)
  }

  console.log("")
  console.log("✅ Classification complete!")
  console.log(`   Units processed: ${report.stats.unitsProcessed}`)
  console.log(`   Automatic: ${report.stats.automatic}`)
  console.log(`   Trigger TBD: ${report.stats.partialAutomatic}`)
  console.log(`   Manual migration needed: ${report.stats.manualRequired}`)
}

main().catch((error) => {
  console.error("Fatal error:", error)
  process.exit(1)
})
