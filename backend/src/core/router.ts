import type { Application } from "express-ws"
import { plannerRoutes } from "./routes/planner"

export function registerRoutes(app: Application) {
    plannerRoutes(app)
}
