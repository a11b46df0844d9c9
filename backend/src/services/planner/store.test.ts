import { describe, expect, it } from "vitest"
import type { PmTask } from "./types"
import { createDataset, deleteDataset, getDataset, listDatasets, updateDataset } from "./store"

const tasks: PmTask[] = [
    { description: "Check output", system: "LINAC", durationMins: 45, intervalMonths: 1 },
    { description: "Swap filter", system: "COUCH", durationMins: 15, intervalMonths: 6, page: "7" },
]

describe("dataset store", () => {
    it("creates, reads, updates and deletes a dataset", async () => {
        const created = await createDataset({ name: "march export", tasks })
        expect(created.name).toBe("march export")
        expect(await getDataset(created.id)).toEqual(created)

        const renamed = await updateDataset(created.id, { name: "q1 export" })
        expect(renamed?.name).toBe("q1 export")
        expect(renamed?.tasks).toEqual(tasks)
        expect(renamed?.id).toBe(created.id)

        expect(await deleteDataset(created.id)).toBe(true)
        expect(await getDataset(created.id)).toBeNull()
        expect(await updateDataset(created.id, { name: "gone" })).toBeNull()
    })

    it("lists datasets without their tasks", async () => {
        const a = await createDataset({ name: "listed", tasks })
        const listed = (await listDatasets()).find(d => d.id === a.id)
        expect(listed).toEqual({ id: a.id, name: "listed", createdAt: a.createdAt, updatedAt: a.updatedAt, taskCount: 2 })
        await deleteDataset(a.id)
        expect((await listDatasets()).some(d => d.id === a.id)).toBe(false)
    })

    it("keeps every id when datasets are created and deleted concurrently", async () => {
        const [a, b, c] = await Promise.all([
            createDataset({ name: "night shift", tasks }),
            createDataset({ name: "day shift", tasks }),
            createDataset({ name: "weekend", tasks }),
        ])
        await Promise.all([deleteDataset(b.id), createDataset({ name: "spare", tasks })])
        const ids = (await listDatasets()).map(d => d.id)
        expect(ids).toContain(a.id)
        expect(ids).toContain(c.id)
        expect(ids).not.toContain(b.id)
        expect((await listDatasets()).some(d => d.name === "spare")).toBe(true)
    })
})
