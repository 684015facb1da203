import path from "node:path"
import { mkdir, appendFile } from "node:fs/promises"

export type LogLevel = "info" | "warn" | "error"

export type LogSink = (level: LogLevel, line: string) => void

export interface Logger {
    info(message: string): void
    warn(message: string): void
    error(message: string, error?: unknown): void
    /**
     * Logger with an extra bracketed label, sharing sink and log file.
     */
    child(label: string): Logger
}

export interface JobLoggerOptions {
    labels?: string[]
    /**
     * Append-only log file; null keeps output on the sink only.
     */
    filePath?: string | null
    sink?: LogSink
    now?: () => Date
}

function formatTimestamp(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, "0")
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    )
}

export const consoleSink: LogSink = (level, line) => {
    if (level === "error") console.error(line)
    else if (level === "warn") console.warn(line)
    else console.log(line)
}

/**
 * Shared state between a logger and its children so that writes to one file stay ordered.
 */
class LogFile {
    private ready = false
    private queue: Promise<void> = Promise.resolve()

    constructor(readonly filePath: string) {}

    append(line: string) {
        this.queue = this.queue.then(() => this.write(line))
    }

    flush(): Promise<void> {
        return this.queue
    }

    private async write(line: string) {
        try {
            if (!this.ready) {
                await mkdir(path.dirname(this.filePath), { recursive: true })
                this.ready = true
            }
            await appendFile(this.filePath, line.endsWith("\n") ? line : `${line}\n`)
        } catch (error) {
            console.warn(`[log] Failed to write ${this.filePath}:`, error)
        }
    }
}

export class JobLogger implements Logger {
    private readonly labels: string[]
    private readonly sink: LogSink
    private readonly now: () => Date
    private readonly file: LogFile | null

    constructor(options: JobLoggerOptions = {}, file?: LogFile | null) {
        this.labels = options.labels ?? []
        this.sink = options.sink ?? consoleSink
        this.now = options.now ?? (() => new Date())
        this.file =
            file !== undefined ? file : options.filePath ? new LogFile(path.resolve(options.filePath)) : null
    }

    get filePath(): string | null {
        return this.file?.filePath ?? null
    }

    info(message: string) {
        this.emit("info", message)
    }

    warn(message: string) {
        this.emit("warn", message)
    }

    error(message: string, error?: unknown) {
        const details =
            error === undefined ? "" : `\n${error instanceof Error ? error.stack ?? error.message : String(error)}`
        this.emit("error", `${message}${details}`)
    }

    child(label: string): JobLogger {
        return new JobLogger(
            { labels: [...this.labels, label], sink: this.sink, now: this.now },
            this.file,
        )
    }

    /**
     * Resolves once every queued file write has been attempted.
     */
    flush(): Promise<void> {
        return this.file?.flush() ?? Promise.resolve()
    }

    private emit(level: LogLevel, message: string) {
        const prefix = this.labels.map((label) => `[${label}]`).join(" ")
        const line = `${formatTimestamp(this.now())} ${prefix ? `${prefix} ` : ""}${message}`
        this.sink(level, line)
        this.file?.append(level === "info" ? line : `${line} (${level})`)
    }
}

export function createLogger(label: string, options: Omit<JobLoggerOptions, "labels"> = {}): JobLogger {
    return new JobLogger({ ...options, labels: [label] })
}

export function jobLogPath(logDir: string | null | undefined, task: string, round: number): string | null {
    if (!logDir) return null
    return path.resolve(logDir, `${task}-round-${round}.log`)
}
