import { describe, expect, it } from "vitest"
import type { PmTask } from "./types"
import {
    annualWorkload,
    burdenScores,
    durationBy,
    durationByIntervalAndCategory,
    longestTasks,
    suggestions,
    summaryMetrics,
    taskCountByCategory,
} from "./analytics"

const tasks: PmTask[] = [
    { description: "a", system: "LINAC", durationMins: 120, intervalMonths: 1, category: "MECHANICAL" },
    { description: "b", system: "LINAC", durationMins: 60, intervalMonths: 3, category: "ELECTRICAL" },
    { description: "c", system: "XVI", durationMins: 90, intervalMonths: 6, category: "MECHANICAL" },
    { description: "d", system: "COUCH", durationMins: 30, intervalMonths: 0 },
    { description: "e", system: "XVI", durationMins: 30, intervalMonths: 12, category: "ELECTRICAL" },
]

describe("analytics", () => {
    it("summarises the selection", () => {
        expect(summaryMetrics(tasks)).toEqual({ totalTasks: 5, totalHours: 5.5, uniqueSystems: 3 })
        expect(summaryMetrics([])).toEqual({ totalTasks: 0, totalHours: 0, uniqueSystems: 0 })
    })

    it("totals duration by system and by category", () => {
        expect(durationBy(tasks, "system")).toEqual([
            { key: "LINAC", totalMins: 180 },
            { key: "XVI", totalMins: 120 },
            { key: "COUCH", totalMins: 30 },
        ])
        expect(durationBy(tasks, "category")).toEqual([
            { key: "MECHANICAL", totalMins: 210 },
            { key: "ELECTRICAL", totalMins: 90 },
        ])
    })

    it("counts tasks per category", () => {
        expect(taskCountByCategory(tasks)).toEqual([
            { category: "ELECTRICAL", count: 2 },
            { category: "MECHANICAL", count: 2 },
        ])
    })

    it("breaks duration down by interval and category", () => {
        expect(durationByIntervalAndCategory(tasks)).toEqual([
            { intervalMonths: 1, category: "MECHANICAL", totalMins: 120 },
            { intervalMonths: 3, category: "ELECTRICAL", totalMins: 60 },
            { intervalMonths: 6, category: "MECHANICAL", totalMins: 90 },
            { intervalMonths: 12, category: "ELECTRICAL", totalMins: 30 },
        ])
    })

    it("picks the longest tasks", () => {
        expect(longestTasks(tasks, 2).map(t => t.description)).toEqual(["a", "c"])
    })

    it("scores burden as total minutes over mean interval", () => {
        const scores = burdenScores(tasks)
        expect(scores.map(s => s.system)).toEqual(["LINAC", "XVI", "COUCH"])
        expect(scores[0]).toEqual({ system: "LINAC", totalMins: 180, avgInterval: 2, score: 90 })
        expect(scores[1].score).toBeCloseTo(120 / 9)
        expect(scores[2].score).toBe(0)
    })

    it("projects hours per month across the year", () => {
        const months = annualWorkload(tasks)
        expect(months.map(m => m.label)).toEqual(["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"])
        expect(months.map(m => m.hours)).toEqual([5, 2, 2, 3, 2, 2, 4.5, 2, 2, 3, 2, 2])
    })

    it("suggests the heaviest systems and longest tasks", () => {
        expect(suggestions(tasks)).toEqual({
            burdenSystems: ["LINAC", "XVI", "COUCH"],
            longestTasks: ["a", "c", "b"],
        })
    })
})
