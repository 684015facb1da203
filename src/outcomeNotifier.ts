import type { BuildJob, DeploymentResult, FailurePayload, NotificationPayload, SuccessPayload } from "./buildTypes.js"
import { HttpStatusError, describeError } from "./errors.js"
import type { FetchLike } from "./githubClient.js"
import type { Logger } from "./jobLogger.js"
import { executeWithRetry, type RetryPolicy, type Sleep } from "./retry.js"

export interface OutcomeNotifierOptions {
    retryPolicy: RetryPolicy
    fetch?: FetchLike
    requestTimeoutMs?: number
    sleep?: Sleep
    random?: () => number
}

export interface NotifyContext {
    logger: Logger
    signal?: AbortSignal
}

export function successPayload(job: BuildJob, result: DeploymentResult): SuccessPayload {
    return {
        email: job.email,
        task: job.task,
        round: job.round,
        nonce: job.nonce,
        status: "success",
        repo_url: result.repoUrl,
        commit_sha: result.commitSha,
        pages_url: result.pagesUrl,
    }
}

export function failurePayload(job: BuildJob, error: string): FailurePayload {
    return {
        email: job.email,
        task: job.task,
        round: job.round,
        nonce: job.nonce,
        status: "failure",
        error,
    }
}

/**
 * Best-effort delivery of build outcomes to the caller's callback URL.
 * Never throws for delivery problems; the boolean says whether a 2xx came back.
 */
export class OutcomeNotifier {
    private readonly retryPolicy: RetryPolicy
    private readonly fetchImpl: FetchLike
    private readonly requestTimeoutMs: number
    private readonly sleep?: Sleep
    private readonly random?: () => number

    constructor(options: OutcomeNotifierOptions) {
        this.retryPolicy = options.retryPolicy
        this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000
        this.sleep = options.sleep
        this.random = options.random
    }

    notifySuccess(job: BuildJob, result: DeploymentResult, ctx: NotifyContext): Promise<boolean> {
        return this.send(job.evaluationUrl, successPayload(job, result), ctx)
    }

    notifyFailure(job: BuildJob, error: string, ctx: NotifyContext): Promise<boolean> {
        return this.send(job.evaluationUrl, failurePayload(job, error), ctx)
    }

    private async post(url: string, payload: NotificationPayload): Promise<number> {
        const response = await this.fetchImpl(url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(this.requestTimeoutMs),
        })
        if (!response.ok) {
            throw new HttpStatusError(response.status, await response.text())
        }
        return response.status
    }

    private async send(url: string, payload: NotificationPayload, ctx: NotifyContext): Promise<boolean> {
        const logger = ctx.logger.child("notifier")
        const outcome = await executeWithRetry(() => this.post(url, payload), this.retryPolicy, {
            label: `notify ${payload.status}`,
            logger,
            sleep: this.sleep,
            random: this.random,
            signal: ctx.signal,
        })

        if (outcome.ok) {
            logger.info(`callback accepted ${payload.status} notification (HTTP ${outcome.value})`)
            return true
        }

        logger.error(
            outcome.reason === "permanent"
                ? `callback rejected ${payload.status} notification: ${describeError(outcome.error)}`
                : `callback unreachable after ${outcome.attempts} attempt(s): ${describeError(outcome.error)}`,
        )
        return false
    }
}
