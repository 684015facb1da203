import {
    buildLabel,
    type BuildJob,
    type BuildOutcome,
    type BuildState,
    type DeploymentResult,
} from "./buildTypes.js"
import type { ContentGenerator, StepContext } from "./contentGenerator.js"
import type { BuildRecordPatch } from "./db/buildStore.js"
import { JobAbortedError, describeError } from "./errors.js"
import type { Logger } from "./jobLogger.js"
import type { OutcomeNotifier } from "./outcomeNotifier.js"
import type { RepositoryPublisher } from "./repositoryPublisher.js"

export type PipelineGenerator = Pick<ContentGenerator, "generateAppCode" | "generateReadme">
export type PipelinePublisher = Pick<
    RepositoryPublisher,
    "createOrReuse" | "ensureLicense" | "publish" | "activateStaticSite"
>
export type PipelineNotifier = Pick<OutcomeNotifier, "notifySuccess" | "notifyFailure">

export interface BuildLedger {
    recordState(job: BuildJob, state: BuildState, patch?: BuildRecordPatch): void
}

export interface BuildOrchestratorOptions {
    generator: PipelineGenerator
    publisher: PipelinePublisher
    notifier: PipelineNotifier
    ledger?: BuildLedger
    /**
     * Creates the logger a job writes to; one per job so file logs stay separate.
     */
    createJobLogger: (job: BuildJob) => Logger
    pagesPollAttempts: number
    /**
     * Wall-clock ceiling per job; 0 disables it.
     */
    jobTimeoutMs: number
}

export interface BuildHandle {
    job: BuildJob
    /**
     * Settles when the job reaches done or failed. Never rejects.
     */
    done: Promise<BuildOutcome>
}

/**
 * Runs one pipeline per submitted job: generate -> README -> repository -> license ->
 * commit -> Pages -> notify. Jobs for the same task run one after another.
 */
export class BuildOrchestrator {
    private readonly options: BuildOrchestratorOptions
    private readonly shutdownController = new AbortController()
    private readonly taskTails = new Map<string, Promise<BuildOutcome>>()
    private readonly inFlight = new Set<Promise<BuildOutcome>>()

    constructor(options: BuildOrchestratorOptions) {
        this.options = options
    }

    get isShuttingDown(): boolean {
        return this.shutdownController.signal.aborted
    }

    activeJobs(): number {
        return this.inFlight.size
    }

    submit(job: BuildJob): BuildHandle {
        const previous = this.taskTails.get(job.task)
        const done = previous ? previous.then(() => this.execute(job)) : this.execute(job)

        this.taskTails.set(job.task, done)
        this.inFlight.add(done)
        void done.then(() => {
            this.inFlight.delete(done)
            if (this.taskTails.get(job.task) === done) {
                this.taskTails.delete(job.task)
            }
        })

        return { job, done }
    }

    /**
     * Resolves once every submitted job has settled.
     */
    async idle(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight])
        }
    }

    /**
     * Interrupts every wait point of in-flight jobs. Interrupted jobs are recorded as failed
     * and not notified.
     */
    async shutdown(): Promise<void> {
        if (!this.isShuttingDown) {
            this.shutdownController.abort(new JobAbortedError("shutdown"))
        }
        await this.idle()
    }

    private async execute(job: BuildJob): Promise<BuildOutcome> {
        const logger = this.options.createJobLogger(job)
        const jobController = new AbortController()
        const signal = AbortSignal.any([jobController.signal, this.shutdownController.signal])
        const timeoutMs = this.options.jobTimeoutMs
        const timer =
            timeoutMs > 0
                ? setTimeout(
                      () => jobController.abort(new JobAbortedError("timeout", `Build timed out after ${timeoutMs}ms`)),
                      timeoutMs,
                  )
                : null

        try {
            return await this.runPipeline(job, logger, signal)
        } catch (error) {
            // runPipeline handles its own failures; this only guards against bugs in that path
            logger.error(`unexpected pipeline error for ${buildLabel(job)}`, error)
            return {
                state: "failed",
                failedAt: "accepted",
                error: describeError(error),
                notified: false,
                abandoned: false,
            }
        } finally {
            if (timer) clearTimeout(timer)
        }
    }

    private record(job: BuildJob, state: BuildState, logger: Logger, patch?: BuildRecordPatch) {
        logger.info(`state -> ${state}`)
        this.options.ledger?.recordState(job, state, patch)
    }

    private async runPipeline(job: BuildJob, logger: Logger, signal: AbortSignal): Promise<BuildOutcome> {
        const { generator, publisher, notifier } = this.options
        const ctx: StepContext = { logger, signal }
        // Notifications only stop for shutdown, never for the job deadline.
        const notifyCtx = { logger, signal: this.shutdownController.signal }
        let state: BuildState = "accepted"

        const advance = (next: BuildState, patch?: BuildRecordPatch) => {
            state = next
            this.record(job, next, logger, patch)
        }

        advance("accepted")
        logger.info(`starting build for ${job.task} (round ${job.round})`)

        try {
            if (this.isShuttingDown) throw new JobAbortedError("shutdown")

            advance("generating")
            const files = await generator.generateAppCode(job.brief, job.checks, job.attachments, ctx)

            advance("documenting_readme")
            const readme = await generator.generateReadme(job.task, job.brief, job.checks, files, ctx)

            advance("creating_repo")
            const repo = await publisher.createOrReuse(job.task, `Auto-generated app: ${job.brief.slice(0, 100)}`, ctx)

            advance("licensing", { repoUrl: repo.htmlUrl })
            await publisher.ensureLicense(repo, ctx)

            advance("publishing")
            const commitSha = await publisher.publish(
                repo,
                files,
                readme,
                `Round ${job.round}: ${job.brief.slice(0, 50)}`,
                ctx,
            )

            advance("activating_site", { commitSha })
            const pagesUrl = await publisher.activateStaticSite(repo, this.options.pagesPollAttempts, ctx)

            const result: DeploymentResult = { repoUrl: repo.htmlUrl, commitSha, pagesUrl }
            advance("notifying_success", { pagesUrl })
            const notified = await notifier.notifySuccess(job, result, notifyCtx)

            advance("done", { notified })
            logger.info(`build completed: ${result.repoUrl} @ ${result.commitSha} -> ${result.pagesUrl}`)
            return { state: "done", result, notified }
        } catch (error) {
            return this.fail(job, state, error, logger, notifyCtx)
        }
    }

    private async fail(
        job: BuildJob,
        failedAt: BuildState,
        error: unknown,
        logger: Logger,
        notifyCtx: StepContext,
    ): Promise<BuildOutcome> {
        const message = describeError(error)

        if (error instanceof JobAbortedError && error.reason === "shutdown") {
            logger.warn(`build abandoned during ${failedAt}: ${message}`)
            this.record(job, "failed", logger, { error: message, notified: false })
            return { state: "failed", failedAt, error: message, notified: false, abandoned: true }
        }

        logger.error(`build failed during ${failedAt}: ${message}`, error)
        this.record(job, "notifying_failure", logger, { error: message })

        let notified = false
        try {
            notified = await this.options.notifier.notifyFailure(job, message, notifyCtx)
        } catch (notifyError) {
            logger.error(`failure notification interrupted: ${describeError(notifyError)}`)
        }

        this.record(job, "failed", logger, { notified })
        return { state: "failed", failedAt, error: message, notified, abandoned: false }
    }
}
