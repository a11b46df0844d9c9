import Keyv from "keyv"
import { config } from "../../config/env"

export function openStore<T>(name: string): Keyv<T> {
    const namespace = `${config.storageNs}:${name}`
    const db = config.keyvUri ? new Keyv<T>(config.keyvUri, { namespace }) : new Keyv<T>({ namespace })
    db.on("error", (err: unknown) => console.error("[keyv]", namespace, err))
    return db
}
