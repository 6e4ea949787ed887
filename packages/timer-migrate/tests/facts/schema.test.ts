import { describe, it, expect } from "vitest"
import { parseBatch, parseUnit } from "../../src/facts/schema"
import { FactValidationError } from "../../src/errors"

describe("parseUnit", () => {
  it("fills schedule defaults from the marker schema", () => {
    const unit = parseUnit({
      name: "com.acme.Billing#nightly",
      timer: { timerPattern: "single", hasSingleTimer: true },
      schedule: { hour: "2" },
    })

    expect(unit.name).toBe("com.acme.Billing#nightly")
    expect(unit.timer.timerPattern).toBe("single")
    expect(unit.schedule).toEqual({
      second: "0",
      minute: "0",
      hour: "2",
      dayOfMonth: "*",
      month: "*",
      dayOfWeek: "*",
      year: "*",
      timezone: "",
      info: "",
      persistent: true,
      rawExpression: "",
    })
  })

  it("reads an empty timer pattern as unknown", () => {
    const unit = parseUnit({ name: "com.acme.Poller", timer: { timerPattern: "" } })

    expect(unit.timer.timerPattern).toBe("unknown")
    expect(unit.timer.timeoutMethodCount).toBe(0)
    expect(unit.schedule).toBeUndefined()
  })

  it("accepts a missing timer block and a null schedule", () => {
    const unit = parseUnit({ name: "com.acme.Idle", schedule: null })

    expect(unit.timer.usesTimerHandle).toBe(false)
    expect(unit.schedule).toBeUndefined()
  })

  it("returns frozen facts", () => {
    const unit = parseUnit({ name: "com.acme.Billing", schedule: {} })

    expect(Object.isFrozen(unit.timer)).toBe(true)
    expect(Object.isFrozen(unit.schedule)).toBe(true)
  })

  it("throws FactValidationError naming the unit and the field", () => {
    let caught: unknown
    try {
      parseUnit({ name: "com.acme.Broken", timer: { timeoutMethodCount: -1 } })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(FactValidationError)
    if (!(caught instanceof FactValidationError)) return
    expect(caught.unit).toBe("com.acme.Broken")
    expect(caught.issues).toHaveLength(1)
    expect(caught.issues[0]).toMatch(/^timer\.timeoutMethodCount: /)
    expect(caught.message).toMatch(/^invalid facts for com\.acme\.Broken: timer\.timeoutMethodCount: /)
  })

  it("labels nameless units by position", () => {
    expect(() => parseUnit({ timer: {} }, 3)).toThrow(/^invalid facts for units\[3\]: name: /)
  })

  it("rejects unknown timer patterns", () => {
    expect(() => parseUnit({ name: "x", timer: { timerPattern: "cron" } })).toThrow(FactValidationError)
  })
})

describe("parseBatch", () => {
  it("returns raw units without validating them", () => {
    expect(parseBatch({ units: [1, { name: "a" }] })).toEqual([1, { name: "a" }])
  })

  it("rejects a document without units", () => {
    expect(() => parseBatch({})).toThrow(FactValidationError)
    expect(() => parseBatch({})).toThrow(/^invalid fact batch: units: /)
  })
})
