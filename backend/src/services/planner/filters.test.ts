import { describe, expect, it } from "vitest"
import type { PmTask } from "./types"
import { filterOptions, filterTasks } from "./filters"

const tasks: PmTask[] = [
    { description: "a", system: "LINAC", durationMins: 30, intervalMonths: 1, category: "MECHANICAL" },
    { description: "b", system: "XVI", durationMins: 20, intervalMonths: 6, category: "ELECTRICAL" },
    { description: "c", system: "LINAC", durationMins: 10, intervalMonths: 12 },
    { description: "d", system: "COUCH", durationMins: 5, intervalMonths: 6, category: "MECHANICAL" },
]

describe("filterTasks", () => {
    it("keeps everything without a filter", () => {
        expect(filterTasks(tasks)).toEqual(tasks)
        expect(filterTasks(tasks, { systems: [], intervals: [] })).toEqual(tasks)
    })

    it("combines the selections", () => {
        const out = filterTasks(tasks, { intervals: [6, 12], systems: ["LINAC", "COUCH"] })
        expect(out.map(t => t.description)).toEqual(["c", "d"])
    })

    it("drops uncategorised tasks once categories are selected", () => {
        expect(filterTasks(tasks, { categories: ["MECHANICAL"] }).map(t => t.description)).toEqual(["a", "d"])
    })
})

describe("filterOptions", () => {
    it("lists sorted distinct values", () => {
        expect(filterOptions(tasks)).toEqual({
            intervals: [1, 6, 12],
            systems: ["COUCH", "LINAC", "XVI"],
            categories: ["ELECTRICAL", "MECHANICAL"],
        })
    })
})
