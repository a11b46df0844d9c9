import express from "express"
import expressWs from "express-ws"
import { config } from "../config/env"
import { registerRoutes } from "./router"

export function createApp() {
    const { app } = expressWs(express())
    app.use(express.json({ limit: config.jsonLimit }))
    registerRoutes(app)
    return app
}
