import { PageSizes, PDFDocument, type PDFFont, type PDFPage, type RGB, rgb, StandardFonts } from "pdf-lib"
import { annualWorkload, burdenScores, durationBy, suggestions, summaryMetrics } from "./analytics"
import { type AgendaDay, dailyAgenda } from "./views"
import type { PmTask, ScheduleResult } from "./types"

const [PAGE_W, PAGE_H] = PageSizes.A4
const MARGIN = 50
const BOTTOM = 60
const CONTENT_W = PAGE_W - MARGIN * 2

const BLACK = rgb(0, 0, 0)
const GREY = rgb(0.53, 0.53, 0.53)
const SLATE = rgb(0.33, 0.33, 0.33)
const BLUE = rgb(0, 0.48, 1)

type Fonts = { regular: PDFFont; bold: PDFFont; italic: PDFFont }
type Line = { text: string; size: number; font: keyof Fonts; color: RGB }

// standard fonts only encode WinAnsi
export function sanitizeText(s: string) {
    if (!s) return ""
    return s
        .replace(/\u2192/g, "->")
        .replace(/[\u2018\u2019]/g, "'")
        .replace(/[\u201c\u201d]/g, '"')
        .replace(/[\u2013\u2014]/g, "-")
        .replace(/\t/g, " ")
        .replace(/[^\n\x20-\x7E\xA0-\xFF]/g, "?")
}

// a token wider than the line on its own is cut between characters
function breakWord(word: string, font: PDFFont, size: number, width: number): string[] {
    if (font.widthOfTextAtSize(word, size) <= width) return [word]
    const out: string[] = []
    let cur = ""
    for (const ch of word) {
        if (cur && font.widthOfTextAtSize(cur + ch, size) > width) {
            out.push(cur)
            cur = ch
        } else cur += ch
    }
    out.push(cur)
    return out
}

export function wrapText(text: string, font: PDFFont, size: number, width: number): string[] {
    const out: string[] = []
    for (const para of sanitizeText(text).split("\n")) {
        let cur = ""
        for (const w of para.split(/\s+/).flatMap(w => breakWord(w, font, size, width))) {
            const next = cur ? `${cur} ${w}` : w
            if (cur && font.widthOfTextAtSize(next, size) > width) {
                out.push(cur)
                cur = w
            } else cur = next
        }
        out.push(cur)
    }
    return out
}

class Writer {
    private page: PDFPage
    private y = 0
    private pages = 0

    constructor(private doc: PDFDocument, private fonts: Fonts, private title: string) {
        this.page = this.addPage()
    }

    addPage(): PDFPage {
        const page = this.doc.addPage(PageSizes.A4)
        this.pages++
        const title = sanitizeText(this.title)
        const w = this.fonts.bold.widthOfTextAtSize(title, 12)
        page.drawText(title, { x: (PAGE_W - w) / 2, y: PAGE_H - 40, size: 12, font: this.fonts.bold })
        page.drawText(`Page ${this.pages}`, { x: PAGE_W / 2 - 12, y: 25, size: 8, font: this.fonts.italic, color: GREY })
        this.page = page
        this.y = PAGE_H - 75
        return page
    }

    gap(h: number) {
        this.y -= h
    }

    text(text: string, opts: Partial<Omit<Line, "text">> = {}) {
        const size = opts.size ?? 10
        const font = this.fonts[opts.font ?? "regular"]
        for (const l of wrapText(text, font, size, CONTENT_W)) {
            if (this.y - size < BOTTOM) this.addPage()
            this.page.drawText(l, { x: MARGIN, y: this.y - size, size, font, color: opts.color ?? BLACK })
            this.y -= size + 4
        }
    }

    heading(text: string) {
        if (this.y - 40 < BOTTOM) this.addPage()
        this.gap(6)
        this.text(text, { size: 12, font: "bold" })
        this.gap(4)
    }

    card(lines: Line[]) {
        const pad = 6
        const inner = CONTENT_W - pad * 2
        const rows = lines.flatMap(l =>
            wrapText(l.text, this.fonts[l.font], l.size, inner).map(text => ({ ...l, text })))
        const height = rows.reduce((h, r) => h + r.size + 4, pad * 2)
        if (this.y - height < BOTTOM) this.addPage()
        this.page.drawRectangle({
            x: MARGIN,
            y: this.y - height,
            width: CONTENT_W,
            height,
            color: rgb(0.96, 0.96, 0.96),
            borderColor: rgb(0.86, 0.86, 0.86),
            borderWidth: 0.2,
        })
        let y = this.y - pad
        for (const r of rows) {
            this.page.drawText(r.text, { x: MARGIN + pad, y: y - r.size, size: r.size, font: this.fonts[r.font], color: r.color })
            y -= r.size + 4
        }
        this.y -= height + 6
    }

    save() {
        return this.doc.save()
    }
}

async function openWriter(title: string): Promise<Writer> {
    const doc = await PDFDocument.create()
    doc.setTitle(title)
    doc.setCreator("pm-planner")
    const fonts: Fonts = {
        regular: await doc.embedFont(StandardFonts.Helvetica),
        bold: await doc.embedFont(StandardFonts.HelveticaBold),
        italic: await doc.embedFont(StandardFonts.HelveticaOblique),
    }
    return new Writer(doc, fonts, title)
}

function writeAgenda(w: Writer, days: AgendaDay[]) {
    w.heading("Daily Agenda")
    if (!days.length) {
        w.text("No tasks scheduled.", { color: GREY })
        return
    }
    for (const day of days) {
        w.heading(day.heading)
        for (const e of day.entries) {
            w.card([
                { text: `${e.start} - ${e.end} (${e.durationMins} mins)`, size: 10, font: "bold", color: BLUE },
                { text: `System: ${e.system}`, size: 9, font: "italic", color: SLATE },
                { text: `Task: ${e.description}`, size: 10, font: "regular", color: BLACK },
                { text: `Ref. Page: ${e.page}`, size: 8, font: "regular", color: GREY },
            ])
        }
    }
}

export async function agendaPdf(result: ScheduleResult): Promise<Uint8Array> {
    const w = await openWriter("PM Task Agenda")
    writeAgenda(w, dailyAgenda(result))
    return w.save()
}

const fixed = (n: number, digits = 2) => n.toFixed(digits)

export function suggestionText(tasks: readonly PmTask[]): string[] {
    if (!tasks.length) return []
    const s = suggestions(tasks)
    const longest = [0, 1, 2].map(i => `- ${s.longestTasks[i] ?? "N/A"}`)
    return [
        `1. Focus on high-burden systems: ${s.burdenSystems.join(", ")}. Reviewing their procedures yields the biggest time savings.`,
        ["2. Review the longest tasks:", ...longest].join("\n"),
        "3. Parallelise work where possible: the schedule groups tasks by system, so engineers can take different systems on the same day.",
        "4. Stage tools, parts and documentation before each scheduled day to make the most of the 4 PM to 9 PM window.",
        "5. For systems with a strong reliability record, discuss with the manufacturer whether low-impact task intervals can be extended.",
    ]
}

export async function reportPdf(input: { tasks: readonly PmTask[]; result: ScheduleResult }): Promise<Uint8Array> {
    const { tasks, result } = input
    const w = await openWriter("PM Task Analysis Report")

    const m = summaryMetrics(tasks)
    w.heading("Summary")
    w.text(`Total PM tasks: ${m.totalTasks}`)
    w.text(`Total duration (hours): ${fixed(m.totalHours)}`)
    w.text(`Unique systems: ${m.uniqueSystems}`)

    w.heading("Total Maintenance Duration by System")
    for (const d of durationBy(tasks, "system")) w.text(`${d.key}: ${d.totalMins} min`)

    w.heading("Maintenance Burden Score")
    for (const b of burdenScores(tasks)) w.text(`${b.system}: ${fixed(b.score)} (total ${b.totalMins} min, avg interval ${fixed(b.avgInterval, 1)} months)`)

    w.heading("Annual Maintenance Workload")
    for (const mo of annualWorkload(tasks)) w.text(`${mo.label}: ${fixed(mo.hours)} h`)

    w.heading("Suggestions for Shortening PM Duration")
    for (const para of suggestionText(tasks)) {
        w.text(para)
        w.gap(4)
    }

    w.heading("Proposed PM Task Schedule")
    w.text(`Workdays needed: ${result.workdaysNeeded}; scheduled dates: ${result.dates.length}; tasks placed: ${result.assignments.length}`)
    if (result.truncated) {
        w.text(`Total task duration exceeds the capacity of the scheduling window. ${result.unscheduled.length} task(s) were not scheduled.`, { color: rgb(0.8, 0.1, 0.1) })
    }

    w.addPage()
    writeAgenda(w, dailyAgenda(result))
    return w.save()
}
