import { HttpStatusError, JobAbortedError, RetryExhaustedError, describeError } from "./errors.js"
import type { Logger } from "./jobLogger.js"

export interface RetryPolicy {
    maxAttempts: number
    initialDelayMs: number
    maxDelayMs: number
    /**
     * Fraction of the next delay used as +/- jitter. Defaults to 0.1; 0 disables jitter.
     */
    jitterRatio?: number
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export interface RetryOptions {
    /**
     * Operation name used in log lines and in the exhausted-retries error.
     */
    label: string
    logger: Logger
    isRetryable?: (error: unknown) => boolean
    /**
     * Errors the caller branches on, such as a 404 meaning "create it". They end the call like a
     * permanent failure but are logged at info level.
     */
    isExpected?: (error: unknown) => boolean
    sleep?: Sleep
    random?: () => number
    signal?: AbortSignal
}

export type RetryOutcome<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; reason: "permanent" | "exhausted"; error: unknown; attempts: number }

function abortError(signal: AbortSignal): JobAbortedError {
    const reason: unknown = signal.reason
    return reason instanceof JobAbortedError ? reason : new JobAbortedError("shutdown", describeError(reason))
}

export function throwIfAborted(signal?: AbortSignal) {
    if (signal?.aborted) throw abortError(signal)
}

export const sleep: Sleep = (ms, signal) =>
    new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortError(signal))
            return
        }
        const onAbort = () => {
            clearTimeout(timer)
            if (signal) reject(abortError(signal))
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort)
            resolve()
        }, ms)
        signal?.addEventListener("abort", onAbort, { once: true })
    })

/**
 * Client errors (4xx) are permanent; everything else is worth another attempt.
 */
export function isTransientError(error: unknown): boolean {
    if (error instanceof HttpStatusError) return !error.isClientError()
    return true
}

export function nextBackoffDelay(
    delayMs: number,
    maxDelayMs: number,
    jitterRatio: number,
    random: () => number = Math.random,
): number {
    const capped = Math.min(delayMs * 2, maxDelayMs)
    if (jitterRatio <= 0) return capped
    const jitter = capped * jitterRatio * (random() * 2 - 1)
    return Math.max(0, capped + jitter)
}

/**
 * Runs `operation` up to `policy.maxAttempts` times with exponential backoff between attempts.
 * Never sleeps after the last attempt. Aborts propagate as JobAbortedError instead of an outcome.
 */
export async function executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    options: RetryOptions,
): Promise<RetryOutcome<T>> {
    const { label, logger, signal } = options
    const wait = options.sleep ?? sleep
    const random = options.random ?? Math.random
    const isRetryable = options.isRetryable ?? isTransientError
    const jitterRatio = policy.jitterRatio ?? 0.1
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts))

    let delay = Math.max(0, policy.initialDelayMs)
    let lastError: unknown = null

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
        throwIfAborted(signal)
        logger.info(`${label}: attempt ${attempt}/${maxAttempts}`)

        try {
            const value = await operation(attempt)
            if (attempt > 1) logger.info(`${label}: succeeded on attempt ${attempt}`)
            return { ok: true, value, attempts: attempt }
        } catch (error) {
            if (error instanceof JobAbortedError) throw error
            throwIfAborted(signal)
            lastError = error

            if (options.isExpected?.(error)) {
                logger.info(`${label}: ${describeError(error)}`)
                return { ok: false, reason: "permanent", error, attempts: attempt }
            }
            if (!isRetryable(error)) {
                logger.warn(`${label}: permanent failure, not retrying: ${describeError(error)}`)
                return { ok: false, reason: "permanent", error, attempts: attempt }
            }
            logger.warn(`${label}: attempt ${attempt} failed: ${describeError(error)}`)
        }

        if (attempt < maxAttempts) {
            logger.info(`${label}: waiting ${Math.round(delay)}ms before retry`)
            await wait(delay, signal)
            delay = nextBackoffDelay(delay, policy.maxDelayMs, jitterRatio, random)
        }
    }

    logger.error(`${label}: giving up after ${maxAttempts} attempt(s)`)
    return { ok: false, reason: "exhausted", error: lastError, attempts: maxAttempts }
}

/**
 * Same as executeWithRetry but throws: the original error when it is permanent,
 * RetryExhaustedError once attempts run out.
 */
export async function retryOrThrow<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    options: RetryOptions,
): Promise<T> {
    const outcome = await executeWithRetry(operation, policy, options)
    if (outcome.ok) return outcome.value
    if (outcome.reason === "permanent") throw outcome.error
    throw new RetryExhaustedError(options.label, outcome.attempts, outcome.error)
}
