import { BuildOrchestrator } from "./buildOrchestrator.js"
import { buildLabel } from "./buildTypes.js"
import type { AppConfig } from "./config.js"
import { ContentGenerator } from "./contentGenerator.js"
import { BuildStore } from "./db/buildStore.js"
import { FetchGitHubApiClient } from "./githubClient.js"
import { JobLogger, jobLogPath } from "./jobLogger.js"
import { OpenAiAgentModel } from "./openAiModel.js"
import { OutcomeNotifier } from "./outcomeNotifier.js"
import { RepositoryPublisher } from "./repositoryPublisher.js"

export interface Services {
    orchestrator: BuildOrchestrator
    store: BuildStore
}

/**
 * Builds every long-lived service once; jobs receive them by reference.
 */
export function createServices(config: AppConfig, logger: JobLogger): Services {
    const store = new BuildStore(config.buildDbPath, { logger: logger.child("db") })

    const generator = new ContentGenerator({
        model: new OpenAiAgentModel({ apiKey: config.openai.apiKey, model: config.openai.model }),
        account: config.github.username,
        maxAttempts: config.openai.maxAttempts,
    })

    const publisher = new RepositoryPublisher({
        api: new FetchGitHubApiClient({ token: config.github.token, baseUrl: config.github.apiUrl }),
        account: config.github.username,
        licenseAuthor: config.github.licenseAuthor,
        retryPolicy: config.retry,
        settleDelayMs: config.repoSettleDelayMs,
        pollIntervalMs: config.pages.pollIntervalMs,
    })

    const notifier = new OutcomeNotifier({ retryPolicy: config.retry })

    const orchestrator = new BuildOrchestrator({
        generator,
        publisher,
        notifier,
        ledger: store,
        pagesPollAttempts: config.pages.pollAttempts,
        jobTimeoutMs: config.jobTimeoutMs,
        createJobLogger: (job) =>
            new JobLogger({
                labels: ["pipeline", buildLabel(job)],
                filePath: jobLogPath(config.buildLogDir, job.task, job.round),
            }),
    })

    return { orchestrator, store }
}
