import type { BatchStats, MigrationReport, UnitReport } from "./types"

function emptyStats(): BatchStats {
  return {
    unitsProcessed: 0,
    automatic: 0,
    partialAutomatic: 0,
    manualRequired: 0,
  }
}

export class MigrationCollector {
  private units: UnitReport[] = []
  private stats: BatchStats = emptyStats()

  add(report: UnitReport): void {
    this.units.push(report)
    this.stats.unitsProcessed++

    switch (report.status) {
      case "automatic":
        this.stats.automatic++
        break
      case "partial-automatic":
        this.stats.partialAutomatic++
        break
      case "manual-required":
        this.stats.manualRequired++
        break
    }
  }

  addAll(reports: readonly UnitReport[]): void {
    for (const report of reports) {
      this.add(report)
    }
  }

  getReport(): MigrationReport {
    return {
      generatedAt: new Date().toISOString(),
      stats: { ...this.stats },
      units: [...this.units],
    }
  }

  clear(): void {
    this.units = []
    this.stats = emptyStats()
  }
}
