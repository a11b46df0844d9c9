import { stringify } from "csv-stringify/sync"
import { format } from "date-fns"
import type { ScheduleResult } from "./types"

const CSV_COLUMNS = ["Date", "Task", "Start", "Finish", "System", "Duration (mins)", "Page Number"]
const stamp = (d: Date) => format(d, "yyyy-MM-dd HH:mm:ss")

export function scheduleToCsv(result: ScheduleResult): string {
    const records = result.assignments.map(a => ({
        "Date": a.date,
        "Task": a.task.description,
        "Start": stamp(a.start),
        "Finish": stamp(a.end),
        "System": a.task.system,
        "Duration (mins)": a.task.durationMins,
        "Page Number": a.task.page ?? "N/A",
    }))
    return stringify(records, { header: true, columns: CSV_COLUMNS })
}

const icsText = (s: string) =>
    s.replace(/\\/g, "\\\\").replace(/;/g, "\\;").replace(/,/g, "\\,").replace(/\r?\n/g, "\\n")

const icsLocal = (d: Date) => format(d, "yyyyMMdd'T'HHmmss")
const icsUtc = (d: Date) => d.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "")

// content lines longer than 75 octets continue on a line starting with a space;
// breaks fall between code points
function fold(line: string): string {
    const parts: string[] = []
    let cur = ""
    let octets = 0
    for (const ch of line) {
        const n = Buffer.byteLength(ch)
        if (octets + n > 75) {
            parts.push(cur)
            cur = " "
            octets = 1
        }
        cur += ch
        octets += n
    }
    parts.push(cur)
    return parts.join("\r\n")
}

/** One floating-time VEVENT per assignment. */
export function scheduleToIcs(result: ScheduleResult, now: Date = new Date()): string {
    const lines = ["BEGIN:VCALENDAR", "VERSION:2.0", "PRODID:-//pm-planner//PM schedule//EN", "CALSCALE:GREGORIAN"]
    result.assignments.forEach((a, i) => {
        lines.push(
            "BEGIN:VEVENT",
            `UID:${a.date}-${i + 1}@pm-planner`,
            `DTSTAMP:${icsUtc(now)}`,
            `DTSTART:${icsLocal(a.start)}`,
            `DTEND:${icsLocal(a.end)}`,
            `SUMMARY:${icsText(`PM Task: ${a.task.description}`)}`,
            `DESCRIPTION:${icsText(`System: ${a.task.system}\nDuration: ${a.task.durationMins} minutes`)}`,
            "END:VEVENT",
        )
    })
    lines.push("END:VCALENDAR")
    return lines.map(fold).join("\r\n") + "\r\n"
}
