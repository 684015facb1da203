const BODY_EXCERPT_LIMIT = 200

function excerpt(text: string): string {
    const trimmed = text.trim()
    if (trimmed.length <= BODY_EXCERPT_LIMIT) return trimmed
    return `${trimmed.slice(0, BODY_EXCERPT_LIMIT)}...`
}

/**
 * Non-2xx response from an external HTTP service.
 */
export class HttpStatusError extends Error {
    readonly status: number
    readonly body: string

    constructor(status: number, body: string, message?: string) {
        const detail = excerpt(body)
        super(message ?? `HTTP ${status}${detail ? `: ${detail}` : ""}`)
        this.name = "HttpStatusError"
        this.status = status
        this.body = detail
    }

    /**
     * 4xx responses are caller-side mistakes and are never retried.
     */
    isClientError(): boolean {
        return this.status >= 400 && this.status < 500
    }
}

export class GitHubApiError extends HttpStatusError {
    readonly operation: string

    constructor(operation: string, status: number, body: string) {
        super(status, body, `GitHub ${operation} failed with HTTP ${status}${body ? `: ${excerpt(body)}` : ""}`)
        this.name = "GitHubApiError"
        this.operation = operation
    }

    isNotFound(): boolean {
        return this.status === 404
    }
}

export class RetryExhaustedError extends Error {
    readonly label: string
    readonly attempts: number

    constructor(label: string, attempts: number, cause: unknown) {
        super(`${label} failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause })
        this.name = "RetryExhaustedError"
        this.label = label
        this.attempts = attempts
    }
}

export class ContentValidationError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "ContentValidationError"
    }
}

export class ConfigError extends Error {
    readonly problems: string[]

    constructor(problems: string[]) {
        super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`)
        this.name = "ConfigError"
        this.problems = problems
    }
}

/**
 * Raised from wait points when a job hits its deadline or the process shuts down.
 */
export class JobAbortedError extends Error {
    readonly reason: "timeout" | "shutdown"

    constructor(reason: "timeout" | "shutdown", message?: string) {
        super(message ?? (reason === "timeout" ? "Build timed out" : "Service is shutting down"))
        this.name = "JobAbortedError"
        this.reason = reason
    }
}

export function isNotFound(error: unknown): boolean {
    return error instanceof GitHubApiError && error.isNotFound()
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.name
    }
    if (typeof error === "string") return error
    try {
        return JSON.stringify(error) ?? String(error)
    } catch {
        return String(error)
    }
}
