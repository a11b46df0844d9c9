import { parse } from "csv-parse/sync"
import type { PmTask } from "./types"

const COLUMNS = {
    description: "Task Description",
    system: "System",
    legacySystem: "Option ID",
    duration: "Duration (mins)",
    interval: "Interval (months)",
    category: "Category of PM check",
    page: "Page Number",
} as const

export const UNSPECIFIED_SYSTEM = "NOT SPECIFIED"

export class TaskCsvError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "TaskCsvError"
    }
}

function toNumber(v: string | undefined): number {
    const s = (v ?? "").trim()
    if (!s) return 0
    const n = Number(s)
    return Number.isFinite(n) ? n : 0
}

function label(v: string | undefined): string | undefined {
    const s = (v ?? "").trim().toUpperCase()
    return s || undefined
}

/**
 * Reads an exported PM task sheet. Numeric columns that are blank or
 * unreadable count as 0; system and category are normalised to upper case.
 */
export function parseTaskCsv(text: string): PmTask[] {
    const rows: string[][] = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true })
    if (!rows.length) throw new TaskCsvError("file is empty")

    const header = rows[0].map(h => h.trim())
    const col = (name: string) => header.indexOf(name)
    const iDesc = col(COLUMNS.description)
    const iDur = col(COLUMNS.duration)
    if (iDesc < 0) throw new TaskCsvError(`missing column "${COLUMNS.description}"`)
    if (iDur < 0) throw new TaskCsvError(`missing column "${COLUMNS.duration}"`)
    const iSys = col(COLUMNS.system) >= 0 ? col(COLUMNS.system) : col(COLUMNS.legacySystem)
    const iInt = col(COLUMNS.interval)
    const iCat = col(COLUMNS.category)
    const iPage = col(COLUMNS.page)

    const cell = (r: string[], i: number) => (i >= 0 ? r[i] : undefined)

    return rows.slice(1).map(r => {
        const task: PmTask = {
            description: (cell(r, iDesc) ?? "").trim(),
            system: label(cell(r, iSys)) ?? UNSPECIFIED_SYSTEM,
            durationMins: toNumber(cell(r, iDur)),
            intervalMonths: toNumber(cell(r, iInt)),
        }
        const category = label(cell(r, iCat))
        if (category) task.category = category
        const page = (cell(r, iPage) ?? "").trim()
        if (page) task.page = page
        return task
    })
}
