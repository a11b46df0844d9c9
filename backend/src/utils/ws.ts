import type WebSocket from "ws"

export function emitToAll(clients: Set<WebSocket> | undefined, msg: unknown) {
    if (!clients?.size) return
    const data = JSON.stringify(msg)
    for (const ws of clients) {
        if (ws.readyState === ws.OPEN) ws.send(data)
    }
}
