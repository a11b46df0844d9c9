import type { Request, Response } from "express"
import type { Application } from "express-ws"
import type WebSocket from "ws"
import { parseTaskCsv, TaskCsvError } from "../../services/planner/ingest"
import { filterOptions, filterTasks } from "../../services/planner/filters"
import { scheduleTasks } from "../../services/planner/scheduler"
import { createDataset, deleteDataset, getDataset, listDatasets, updateDataset } from "../../services/planner/store"
import {
    annualWorkload,
    burdenScores,
    durationBy,
    durationByIntervalAndCategory,
    longestTasks,
    suggestions,
    summaryMetrics,
    taskCountByCategory,
} from "../../services/planner/analytics"
import { dailyAgenda, timelineRows } from "../../services/planner/views"
import { scheduleToCsv, scheduleToIcs } from "../../services/planner/export"
import { agendaPdf, reportPdf } from "../../services/planner/report"
import { emitToAll } from "../../utils/ws"
import { field, readFilter, readStartDate, RequestError } from "../request"

const rooms = new Map<string, Set<WebSocket>>()
const log = (...a: unknown[]) => console.log("[planner]", ...a)

export const TRUNCATION_WARNING = "Total task duration exceeds the capacity of the scheduling window. Some tasks were not scheduled."

function fail(res: Response, e: unknown) {
    if (e instanceof RequestError || e instanceof TaskCsvError) {
        res.status(e instanceof RequestError ? e.status : 400).send({ ok: false, error: e.message })
        return
    }
    log("request failed", e)
    res.status(500).send({ ok: false, error: e instanceof Error ? e.message : "failed" })
}

async function requireDataset(req: Request) {
    const d = await getDataset(req.params.id)
    if (!d) throw new RequestError("not found", 404)
    return d
}

function readCsv(body: unknown): string {
    const csv = field(body, "csv")
    if (typeof csv !== "string" || !csv.trim()) throw new RequestError("csv required")
    return csv
}

async function planFor(req: Request) {
    const dataset = await requireDataset(req)
    const tasks = filterTasks(dataset.tasks, readFilter(field(req.body, "filter")))
    const result = scheduleTasks(tasks, readStartDate(field(req.body, "startDate")))
    if (result.truncated) log("schedule truncated", { dataset: dataset.id, unscheduled: result.unscheduled.length })
    return { dataset, tasks, result }
}

const EXPORTS = {
    csv: { type: "text/csv", file: "pm_schedule.csv" },
    ics: { type: "text/calendar", file: "pm_schedule.ics" },
    pdf: { type: "application/pdf", file: "pm_agenda.pdf" },
    report: { type: "application/pdf", file: "pm_analysis_report.pdf" },
} as const

type ExportFormat = keyof typeof EXPORTS
const isExportFormat = (v: string): v is ExportFormat => Object.hasOwn(EXPORTS, v)

export function plannerRoutes(app: Application) {
    app.ws("/ws/planner", (ws, req) => {
        const u = new URL(req.url, "http://localhost")
        const sid = u.searchParams.get("sid") || "default"
        let set = rooms.get(sid)
        if (!set) {
            set = new Set()
            rooms.set(sid, set)
        }
        const room = set
        room.add(ws)
        ws.send(JSON.stringify({ type: "ready", sid }))
        ws.on("close", () => {
            room.delete(ws)
            if (room.size === 0) rooms.delete(sid)
        })
    })

    app.post("/pm/datasets", async (req, res) => {
        try {
            const tasks = parseTaskCsv(readCsv(req.body))
            const name = String(field(req.body, "name") ?? "").trim() || "PM tasks"
            const created = await createDataset({ name, tasks })
            log("dataset created", created.id, `${tasks.length} tasks`)
            res.send({ ok: true, dataset: created })
        } catch (e) {
            fail(res, e)
        }
    })

    app.get("/pm/datasets", async (_req, res) => {
        try {
            res.send({ ok: true, datasets: await listDatasets() })
        } catch (e) {
            fail(res, e)
        }
    })

    app.get("/pm/datasets/:id", async (req, res) => {
        try {
            res.send({ ok: true, dataset: await requireDataset(req) })
        } catch (e) {
            fail(res, e)
        }
    })

    app.patch("/pm/datasets/:id", async (req, res) => {
        try {
            const name = field(req.body, "name")
            const csv = field(req.body, "csv")
            const patch = {
                ...(typeof name === "string" && name.trim() ? { name: name.trim() } : {}),
                ...(csv !== undefined ? { tasks: parseTaskCsv(readCsv(req.body)) } : {}),
            }
            const d = await updateDataset(req.params.id, patch)
            if (!d) throw new RequestError("not found", 404)
            res.send({ ok: true, dataset: d })
        } catch (e) {
            fail(res, e)
        }
    })

    app.delete("/pm/datasets/:id", async (req, res) => {
        try {
            await deleteDataset(req.params.id)
            res.send({ ok: true })
        } catch (e) {
            fail(res, e)
        }
    })

    app.get("/pm/datasets/:id/options", async (req, res) => {
        try {
            const d = await requireDataset(req)
            res.send({ ok: true, options: filterOptions(d.tasks) })
        } catch (e) {
            fail(res, e)
        }
    })

    app.post("/pm/datasets/:id/analytics", async (req, res) => {
        try {
            const d = await requireDataset(req)
            const tasks = filterTasks(d.tasks, readFilter(field(req.body, "filter")))
            res.send({
                ok: true,
                summary: summaryMetrics(tasks),
                durationByCategory: durationBy(tasks, "category"),
                durationBySystem: durationBy(tasks, "system"),
                taskCountByCategory: taskCountByCategory(tasks),
                durationByIntervalAndCategory: durationByIntervalAndCategory(tasks),
                longestTasks: longestTasks(tasks),
                burden: burdenScores(tasks),
                annualWorkload: annualWorkload(tasks),
                suggestions: suggestions(tasks),
            })
        } catch (e) {
            fail(res, e)
        }
    })

    app.post("/pm/datasets/:id/schedule", async (req, res) => {
        try {
            const { dataset, result } = await planFor(req)
            const body = {
                ok: true,
                schedule: result,
                timeline: timelineRows(result),
                agenda: dailyAgenda(result),
                warning: result.truncated ? TRUNCATION_WARNING : undefined,
            }
            res.send(body)
            emitToAll(rooms.get("default"), {
                type: "schedule.update",
                datasetId: dataset.id,
                assignments: result.assignments.length,
                truncated: result.truncated,
            })
        } catch (e) {
            fail(res, e)
        }
    })

    app.post("/pm/datasets/:id/export/:format", async (req, res) => {
        try {
            const format = req.params.format
            if (!isExportFormat(format)) throw new RequestError(`unknown export format "${format}"`)
            const { tasks, result } = await planFor(req)
            const out =
                format === "csv" ? scheduleToCsv(result) :
                format === "ics" ? scheduleToIcs(result) :
                format === "pdf" ? Buffer.from(await agendaPdf(result)) :
                Buffer.from(await reportPdf({ tasks, result }))
            res.setHeader("Content-Type", EXPORTS[format].type)
            res.setHeader("Content-Disposition", `attachment; filename="${EXPORTS[format].file}"`)
            if (result.truncated) res.setHeader("X-Schedule-Truncated", "true")
            res.send(out)
        } catch (e) {
            fail(res, e)
        }
    })
}
