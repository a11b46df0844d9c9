import type { PmTask, TaskFilter } from "./types"

const has = <T>(list: T[] | undefined, v: T | undefined) =>
    !list?.length || (v !== undefined && list.includes(v))

export function filterTasks(tasks: readonly PmTask[], filter: TaskFilter = {}): PmTask[] {
    return tasks.filter(t =>
        has(filter.intervals, t.intervalMonths) &&
        has(filter.systems, t.system) &&
        has(filter.categories, t.category)
    )
}

export type FilterOptions = { intervals: number[]; systems: string[]; categories: string[] }

export function filterOptions(tasks: readonly PmTask[]): FilterOptions {
    const intervals = new Set<number>()
    const systems = new Set<string>()
    const categories = new Set<string>()
    for (const t of tasks) {
        intervals.add(t.intervalMonths)
        systems.add(t.system)
        if (t.category) categories.add(t.category)
    }
    return {
        intervals: [...intervals].sort((a, b) => a - b),
        systems: [...systems].sort(),
        categories: [...categories].sort(),
    }
}
