import { addDays, addMinutes, format, isWeekend, setHours, startOfDay } from "date-fns"
import type { Assignment, CandidateDay, PmTask, SchedulePolicy, ScheduleResult } from "./types"

export function defaultPolicy(): SchedulePolicy {
    return { dailyMins: 300, dayStartHour: 16, maxWorkdays: 60, lookaheadDays: 90 }
}

export const dayKey = (d: Date) => format(d, "yyyy-MM-dd")

const byText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

/** Placement priority: system, then shorter recurrence, then longest first. */
export function orderTasks(tasks: readonly PmTask[]): PmTask[] {
    return [...tasks].sort((a, b) =>
        byText(a.system, b.system) ||
        a.intervalMonths - b.intervalMonths ||
        b.durationMins - a.durationMins
    )
}

export function candidateDays(startDate: Date, policy: SchedulePolicy = defaultPolicy()): CandidateDay[] {
    const out: CandidateDay[] = []
    const first = startOfDay(startDate)
    for (let i = 0; i < policy.lookaheadDays; i++) {
        if (out.length >= policy.maxWorkdays) break
        const d = addDays(first, i)
        if (!isWeekend(d)) out.push({ key: dayKey(d), date: d })
    }
    return out
}

/**
 * `n` indices spread evenly over `0..len-1`, i.e. round(i * (len-1) / (n-1)),
 * rounding halves up, in integer arithmetic.
 */
export function spreadIndices(len: number, n: number): number[] {
    const k = Math.min(n, len)
    if (k <= 0) return []
    if (k === 1) return [0]
    const den = k - 1
    const out: number[] = []
    for (let i = 0; i < k; i++) out.push(Math.floor((2 * i * (len - 1) + den) / (2 * den)))
    return out
}

export function spreadDates(candidates: readonly CandidateDay[], n: number): CandidateDay[] {
    return spreadIndices(candidates.length, n).map(i => candidates[i])
}

export type Placement = Pick<ScheduleResult, "assignments" | "truncated" | "unscheduled">

/**
 * Greedy first-fit over the selected dates. The cursor only moves forward;
 * a date is never revisited once left.
 */
export function placeTasks(ordered: readonly PmTask[], dates: readonly CandidateDay[], policy: SchedulePolicy = defaultPolicy()): Placement {
    const assignments: Assignment[] = []
    let cursor = 0
    let remaining = policy.dailyMins

    for (let i = 0; i < ordered.length; i++) {
        const t = ordered[i]
        if (t.durationMins === 0) continue

        // an untouched day takes any task, even one longer than the day itself
        while (cursor < dates.length && remaining < t.durationMins && remaining < policy.dailyMins) {
            cursor++
            remaining = policy.dailyMins
        }
        if (cursor >= dates.length) {
            const unscheduled = ordered.slice(i).filter(x => x.durationMins !== 0)
            return { assignments, truncated: true, unscheduled }
        }

        const day = dates[cursor]
        const start = addMinutes(setHours(day.date, policy.dayStartHour), policy.dailyMins - remaining)
        assignments.push({
            date: day.key,
            task: { description: t.description, system: t.system, durationMins: t.durationMins, page: t.page },
            start,
            end: addMinutes(start, t.durationMins),
        })
        remaining -= t.durationMins
    }
    return { assignments, truncated: false, unscheduled: [] }
}

export function scheduleTasks(tasks: readonly PmTask[], startDate: Date, policy: SchedulePolicy = defaultPolicy()): ScheduleResult {
    const ordered = orderTasks(tasks)
    const total = ordered.reduce((s, t) => s + t.durationMins, 0)
    if (!(total > 0)) return { assignments: [], truncated: false, unscheduled: [], workdaysNeeded: 0, dates: [] }

    const workdaysNeeded = Math.ceil(total / policy.dailyMins)
    const dates = spreadDates(candidateDays(startDate, policy), workdaysNeeded)
    const placed = placeTasks(ordered, dates, policy)
    return { ...placed, workdaysNeeded, dates: dates.map(d => d.key) }
}
