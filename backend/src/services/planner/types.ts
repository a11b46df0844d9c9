export type PmTask = {
    description: string
    system: string
    durationMins: number
    intervalMonths: number
    category?: string
    page?: string
}

export type SchedulePolicy = {
    dailyMins: number
    dayStartHour: number
    maxWorkdays: number
    lookaheadDays: number
}

export type CandidateDay = {
    key: string
    date: Date
}

export type AssignedTask = Pick<PmTask, "description" | "system" | "durationMins" | "page">

export type Assignment = {
    date: string
    task: AssignedTask
    start: Date
    end: Date
}

export type ScheduleResult = {
    assignments: Assignment[]
    truncated: boolean
    unscheduled: PmTask[]
    workdaysNeeded: number
    dates: string[]
}

export type TaskFilter = {
    intervals?: number[]
    systems?: string[]
    categories?: string[]
}

export type PmDataset = {
    id: string
    name: string
    tasks: PmTask[]
    createdAt: number
    updatedAt: number
}

export type DatasetSummary = Omit<PmDataset, "tasks"> & { taskCount: number }
