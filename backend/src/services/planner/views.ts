import { differenceInMinutes, format, parseISO, startOfDay } from "date-fns"
import type { Assignment, ScheduleResult } from "./types"

export type TimelineRow = {
    date: string
    system: string
    description: string
    startMins: number
    endMins: number
}

export type AgendaEntry = {
    start: string
    end: string
    durationMins: number
    system: string
    description: string
    page: string
}

export type AgendaDay = { date: string; heading: string; entries: AgendaEntry[] }

/** Gantt rows keyed by date, with times as minutes past local midnight. */
export function timelineRows(result: ScheduleResult): TimelineRow[] {
    return result.assignments.map(a => {
        const midnight = startOfDay(a.start)
        return {
            date: a.date,
            system: a.task.system,
            description: a.task.description,
            startMins: differenceInMinutes(a.start, midnight),
            endMins: differenceInMinutes(a.end, midnight),
        }
    })
}

const clock = (d: Date) => format(d, "hh:mm a")

export function dailyAgenda(result: ScheduleResult): AgendaDay[] {
    const days = new Map<string, Assignment[]>()
    for (const a of result.assignments) {
        const arr = days.get(a.date) ?? []
        arr.push(a)
        days.set(a.date, arr)
    }
    return [...days.keys()].sort().map(date => ({
        date,
        heading: format(parseISO(date), "EEEE, MMMM dd, yyyy"),
        entries: (days.get(date) ?? [])
            .slice()
            .sort((x, y) => x.start.getTime() - y.start.getTime())
            .map(a => ({
                start: clock(a.start),
                end: clock(a.end),
                durationMins: a.task.durationMins,
                system: a.task.system,
                description: a.task.description,
                page: a.task.page ?? "N/A",
            })),
    }))
}
