import crypto from "crypto"
import { openStore } from "../../utils/database/keyv"
import type { DatasetSummary, PmDataset, PmTask } from "./types"

const LIST_KEY = "ids"

const index = openStore<string[]>("index")
const datasets = openStore<PmDataset>("datasets")

// index edits run one at a time
let indexQueue: Promise<void> = Promise.resolve()

function editIndex(edit: (ids: string[]) => string[]): Promise<void> {
    const run = indexQueue.then(async () => {
        const ids = (await index.get(LIST_KEY)) ?? []
        await index.set(LIST_KEY, edit(ids))
    })
    // the caller gets the failure through `run`; the queue moves on
    indexQueue = run.catch(e => console.error("[planner] index update failed", e))
    return run
}

export async function createDataset(input: { name: string; tasks: PmTask[] }): Promise<PmDataset> {
    const id = crypto.randomUUID()
    const now = Date.now()
    const dataset: PmDataset = { id, name: input.name, tasks: input.tasks, createdAt: now, updatedAt: now }
    await datasets.set(id, dataset)
    await editIndex(ids => [...ids, id])
    return dataset
}

export async function getDataset(id: string): Promise<PmDataset | null> {
    return (await datasets.get(id)) ?? null
}

export async function updateDataset(id: string, patch: Partial<Pick<PmDataset, "name" | "tasks">>): Promise<PmDataset | null> {
    const cur = await getDataset(id)
    if (!cur) return null
    const next: PmDataset = { ...cur, ...patch, id: cur.id, updatedAt: Date.now() }
    await datasets.set(id, next)
    return next
}

export async function deleteDataset(id: string): Promise<boolean> {
    await editIndex(ids => ids.filter(x => x !== id))
    return datasets.delete(id)
}

export async function listDatasets(): Promise<DatasetSummary[]> {
    const ids = (await index.get(LIST_KEY)) ?? []
    const out: DatasetSummary[] = []
    for (const id of ids) {
        const d = await getDataset(id)
        if (!d) continue
        const { tasks, ...rest } = d
        out.push({ ...rest, taskCount: tasks.length })
    }
    return out.sort((a, b) => b.createdAt - a.createdAt)
}
