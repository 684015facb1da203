import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"

export type EnvTarget = Record<string, string | undefined>

export function defaultEnvFilePath(): string {
    return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", ".env")
}

/**
 * Copy `KEY=value` pairs from a .env file into `target` (process.env by default).
 * Values already present in `target` win. Returns the keys that were set.
 */
export function loadEnv(envFilePath: string = defaultEnvFilePath(), target: EnvTarget = process.env): string[] {
    if (!fs.existsSync(envFilePath)) {
        return []
    }

    let content: string
    try {
        content = fs.readFileSync(envFilePath, "utf8")
    } catch (error) {
        console.warn(`[env] Failed to load ${envFilePath}:`, error)
        return []
    }

    const applied: string[] = []
    for (const entry of parseEnvFile(content)) {
        if (target[entry.key] === undefined) {
            target[entry.key] = entry.value
            applied.push(entry.key)
        }
    }
    return applied
}

export function parseEnvFile(content: string): Array<{ key: string; value: string }> {
    return content
        .split(/\r?\n/)
        .map(parseLine)
        .filter((entry): entry is { key: string; value: string } => entry !== null)
}

function parseLine(line: string): { key: string; value: string } | null {
    const trimmed = line.trim()
    if (trimmed === "" || trimmed.startsWith("#")) return null

    const assignment = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trim() : trimmed
    const eq = assignment.indexOf("=")
    if (eq <= 0) return null

    const key = assignment.slice(0, eq).trim()
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) return null

    return { key, value: parseValue(assignment.slice(eq + 1).trim()) }
}

function parseValue(raw: string): string {
    const quote = raw[0]
    if (quote === '"' || quote === "'") {
        const closing = raw.indexOf(quote, 1)
        const inner = closing === -1 ? raw.slice(1) : raw.slice(1, closing)
        if (quote === "'") return inner
        return inner.replace(/\\n/g, "\n").replace(/\\r/g, "\r").replace(/\\t/g, "\t")
    }

    const hash = raw.search(/\s#/)
    return hash === -1 ? raw : raw.slice(0, hash).trimEnd()
}
