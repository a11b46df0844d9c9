const num = (v: string | undefined, fallback: number) => {
    const n = Number(v)
    return v && Number.isFinite(n) ? n : fallback
}

export const config = {
    port: num(process.env.PORT, 5000),
    jsonLimit: process.env.PM_JSON_LIMIT || "10mb",
    storageNs: process.env.PM_STORAGE_NS || "pm",
    // e.g. sqlite://storage/pm.sqlite, needs the matching @keyv adapter installed
    keyvUri: process.env.PM_KEYV_URI || undefined,
}
