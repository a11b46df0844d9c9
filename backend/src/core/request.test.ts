import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { readFilter, readStartDate, RequestError } from "./request"

describe("readFilter", () => {
    it("treats a missing filter as no filtering", () => {
        expect(readFilter(undefined)).toEqual({})
        expect(readFilter(null)).toEqual({})
    })

    it("normalises system and category names", () => {
        expect(readFilter({ intervals: [1, 6], systems: [" linac"], categories: ["Mechanical"] })).toEqual({
            intervals: [1, 6],
            systems: ["LINAC"],
            categories: ["MECHANICAL"],
        })
    })

    it("rejects malformed selections", () => {
        expect(() => readFilter({ intervals: ["6"] })).toThrow("filter.intervals must be an array")
        expect(() => readFilter("LINAC")).toThrow(RequestError)
    })
})

describe("readStartDate", () => {
    beforeEach(() => {
        vi.useFakeTimers()
        vi.setSystemTime(new Date(2026, 1, 14, 9, 30))
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    it("reads a calendar date at local midnight", () => {
        expect(readStartDate("2026-01-03")).toEqual(new Date(2026, 0, 3))
    })

    it("defaults to today", () => {
        expect(readStartDate(undefined)).toEqual(new Date(2026, 1, 14))
    })

    it("rejects other formats and impossible dates", () => {
        expect(() => readStartDate("03/01/2026")).toThrow("startDate must be yyyy-MM-dd")
        expect(() => readStartDate("2026-02-31")).toThrow(RequestError)
        expect(() => readStartDate(20260103)).toThrow(RequestError)
    })
})
