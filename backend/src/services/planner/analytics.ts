import { format } from "date-fns"
import type { PmTask } from "./types"

export type SummaryMetrics = { totalTasks: number; totalHours: number; uniqueSystems: number }
export type DurationTotal = { key: string; totalMins: number }
export type CategoryCount = { category: string; count: number }
export type IntervalCategoryTotal = { intervalMonths: number; category: string; totalMins: number }
export type BurdenScore = { system: string; totalMins: number; avgInterval: number; score: number }
export type MonthLoad = { month: number; label: string; hours: number }
export type Suggestions = { burdenSystems: string[]; longestTasks: string[] }

const sumMins = (tasks: readonly PmTask[]) => tasks.reduce((s, t) => s + t.durationMins, 0)

function groupBy<K>(tasks: readonly PmTask[], keyOf: (t: PmTask) => K | undefined): Map<K, PmTask[]> {
    const m = new Map<K, PmTask[]>()
    for (const t of tasks) {
        const k = keyOf(t)
        if (k === undefined) continue
        const arr = m.get(k) ?? []
        arr.push(t)
        m.set(k, arr)
    }
    return m
}

const byKey = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

export function summaryMetrics(tasks: readonly PmTask[]): SummaryMetrics {
    return {
        totalTasks: tasks.length,
        totalHours: sumMins(tasks) / 60,
        uniqueSystems: new Set(tasks.map(t => t.system)).size,
    }
}

export function durationBy(tasks: readonly PmTask[], key: "category" | "system"): DurationTotal[] {
    const groups = groupBy(tasks, t => t[key])
    return [...groups]
        .map(([k, ts]) => ({ key: k, totalMins: sumMins(ts) }))
        .sort((a, b) => b.totalMins - a.totalMins || byKey(a.key, b.key))
}

export function taskCountByCategory(tasks: readonly PmTask[]): CategoryCount[] {
    return [...groupBy(tasks, t => t.category)]
        .map(([category, ts]) => ({ category, count: ts.length }))
        .sort((a, b) => b.count - a.count || byKey(a.category, b.category))
}

export function durationByIntervalAndCategory(tasks: readonly PmTask[]): IntervalCategoryTotal[] {
    const out: IntervalCategoryTotal[] = []
    for (const [intervalMonths, ts] of groupBy(tasks, t => t.intervalMonths)) {
        for (const [category, group] of groupBy(ts, t => t.category)) {
            out.push({ intervalMonths, category, totalMins: sumMins(group) })
        }
    }
    return out.sort((a, b) => a.intervalMonths - b.intervalMonths || byKey(a.category, b.category))
}

export function longestTasks(tasks: readonly PmTask[], n = 10): PmTask[] {
    return [...tasks].sort((a, b) => b.durationMins - a.durationMins).slice(0, n)
}

/**
 * Effort per system: total minutes over the mean recurrence interval.
 * A mean interval of zero scores 0.
 */
export function burdenScores(tasks: readonly PmTask[]): BurdenScore[] {
    return [...groupBy(tasks, t => t.system)]
        .sort(([a], [b]) => byKey(a, b))
        .map(([system, ts]) => {
            const totalMins = sumMins(ts)
            const avgInterval = ts.reduce((s, t) => s + t.intervalMonths, 0) / ts.length
            return { system, totalMins, avgInterval, score: avgInterval ? totalMins / avgInterval : 0 }
        })
        .sort((a, b) => b.score - a.score)
}

/** Hours falling due in each calendar month when every recurring task starts in January. */
export function annualWorkload(tasks: readonly PmTask[]): MonthLoad[] {
    const hours = new Array<number>(12).fill(0)
    for (const t of tasks) {
        const step = Math.trunc(t.intervalMonths)
        if (step <= 0) continue
        for (let m = 1; m <= 12; m += step) hours[m - 1] += t.durationMins / 60
    }
    return hours.map((h, i) => ({ month: i + 1, label: format(new Date(2000, i, 1), "MMM"), hours: h }))
}

export function suggestions(tasks: readonly PmTask[]): Suggestions {
    return {
        burdenSystems: burdenScores(tasks).slice(0, 3).map(b => b.system),
        longestTasks: longestTasks(tasks, 3).map(t => t.description),
    }
}
