import { isValid, parseISO, startOfToday } from "date-fns"
import type { TaskFilter } from "../services/planner/types"

export class RequestError extends Error {
    constructor(message: string, readonly status = 400) {
        super(message)
        this.name = "RequestError"
    }
}

export const isRecord = (v: unknown): v is Record<string, unknown> =>
    typeof v === "object" && v !== null && !Array.isArray(v)

export function field(body: unknown, key: string): unknown {
    return isRecord(body) ? body[key] : undefined
}

function list<T>(v: unknown, name: string, ok: (x: unknown) => x is T): T[] | undefined {
    if (v === undefined || v === null) return undefined
    if (!Array.isArray(v) || !v.every(ok)) throw new RequestError(`filter.${name} must be an array`)
    return v
}

const isNum = (x: unknown): x is number => typeof x === "number" && Number.isFinite(x)
const isStr = (x: unknown): x is string => typeof x === "string"

export function readFilter(v: unknown): TaskFilter {
    if (v === undefined || v === null) return {}
    if (!isRecord(v)) throw new RequestError("filter must be an object")
    const filter: TaskFilter = {}
    const intervals = list(v.intervals, "intervals", isNum)
    const systems = list(v.systems, "systems", isStr)
    const categories = list(v.categories, "categories", isStr)
    if (intervals) filter.intervals = intervals
    if (systems) filter.systems = systems.map(s => s.trim().toUpperCase())
    if (categories) filter.categories = categories.map(s => s.trim().toUpperCase())
    return filter
}

/** `yyyy-MM-dd`, read as a local calendar date; today when absent. */
export function readStartDate(v: unknown): Date {
    if (v === undefined || v === null || v === "") return startOfToday()
    if (typeof v !== "string" || !/^\d{4}-\d{2}-\d{2}$/.test(v)) throw new RequestError("startDate must be yyyy-MM-dd")
    const d = parseISO(v)
    if (!isValid(d)) throw new RequestError("startDate must be yyyy-MM-dd")
    return d
}
