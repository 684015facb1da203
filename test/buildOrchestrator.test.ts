import assert from "node:assert/strict"
import { test } from "node:test"
import {
    BuildOrchestrator,
    type BuildLedger,
    type PipelineGenerator,
    type PipelineNotifier,
    type PipelinePublisher,
} from "../src/buildOrchestrator.js"
import type { BuildJob, BuildState, DeploymentResult } from "../src/buildTypes.js"
import { ContentGenerator, type GenerativeModel } from "../src/contentGenerator.js"
import type { FetchLike, RepoInfo } from "../src/githubClient.js"
import { OutcomeNotifier } from "../src/outcomeNotifier.js"
import { RepositoryPublisher } from "../src/repositoryPublisher.js"
import { FakeGitHub, recordingLogger, recordingSleep } from "./support/fakes.js"

type Step =
    | "generateAppCode"
    | "generateReadme"
    | "createOrReuse"
    | "ensureLicense"
    | "publish"
    | "activateStaticSite"

function makeJob(overrides: Partial<BuildJob> = {}): BuildJob {
    return {
        email: "student@example.com",
        task: "counter-v1",
        round: 1,
        nonce: "n-1",
        brief: "Create a counter app with increment and reset buttons",
        checks: ["has increment button"],
        attachments: [],
        evaluationUrl: "https://eval.example.com/notify",
        ...overrides,
    }
}

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
    return new Promise((_, reject) => {
        if (!signal) return
        if (signal.aborted) reject(signal.reason)
        signal.addEventListener("abort", () => reject(signal.reason), { once: true })
    })
}

function harness(
    options: {
        failAt?: Step
        block?: (step: Step, key: string) => boolean
        notifyResult?: boolean
        jobTimeoutMs?: number
    } = {},
) {
    const events: string[] = []
    const successes: Array<{ job: BuildJob; result: DeploymentResult }> = []
    const failures: Array<{ job: BuildJob; error: string }> = []
    const states: Array<{ task: string; round: number; state: BuildState }> = []
    const { logger, lines } = recordingLogger()

    const step = async (name: Step, job: string, signal?: AbortSignal) => {
        events.push(`${name}:${job}`)
        if (options.block?.(name, job)) await waitForAbort(signal)
        if (options.failAt === name) throw new Error(`${name} exploded`)
    }

    const repoFor = (name: string): RepoInfo => ({
        owner: "octo-dev",
        name,
        fullName: `octo-dev/${name}`,
        htmlUrl: `https://github.com/octo-dev/${name}`,
        defaultBranch: "main",
    })

    const generator: PipelineGenerator = {
        async generateAppCode(brief, _checks, _attachments, ctx) {
            await step("generateAppCode", brief, ctx.signal)
            return { "index.html": `<html>${brief}</html>` }
        },
        async generateReadme(taskId, _brief, _checks, _files, ctx) {
            await step("generateReadme", taskId, ctx.signal)
            return `# ${taskId}`
        },
    }

    const publisher: PipelinePublisher = {
        async createOrReuse(name, description, ctx) {
            await step("createOrReuse", description, ctx.signal)
            return repoFor(name)
        },
        async ensureLicense(repo, ctx) {
            await step("ensureLicense", repo.name, ctx.signal)
        },
        async publish(repo, _files, _readme, message, ctx) {
            await step("publish", message, ctx.signal)
            return `sha-${repo.name}`
        },
        async activateStaticSite(repo, maxPollAttempts, ctx) {
            await step("activateStaticSite", `${repo.name}/${maxPollAttempts}`, ctx.signal)
            return `https://octo-dev.github.io/${repo.name}/`
        },
    }

    const notifier: PipelineNotifier = {
        async notifySuccess(job, result) {
            successes.push({ job, result })
            return options.notifyResult ?? true
        },
        async notifyFailure(job, error) {
            failures.push({ job, error })
            return options.notifyResult ?? true
        },
    }

    const ledger: BuildLedger = {
        recordState(job, state) {
            states.push({ task: job.task, round: job.round, state })
        },
    }

    const orchestrator = new BuildOrchestrator({
        generator,
        publisher,
        notifier,
        ledger,
        createJobLogger: (job) => logger.child(`${job.task}#r${job.round}`),
        pagesPollAttempts: 10,
        jobTimeoutMs: options.jobTimeoutMs ?? 0,
    })

    return { orchestrator, events, successes, failures, states, lines }
}

test("a successful build runs every step in order and notifies success once", async () => {
    const { orchestrator, events, successes, failures, states } = harness()
    const job = makeJob()

    const outcome = await orchestrator.submit(job).done

    assert.deepEqual(outcome, {
        state: "done",
        result: {
            repoUrl: "https://github.com/octo-dev/counter-v1",
            commitSha: "sha-counter-v1",
            pagesUrl: "https://octo-dev.github.io/counter-v1/",
        },
        notified: true,
    })
    assert.deepEqual(events, [
        "generateAppCode:Create a counter app with increment and reset buttons",
        "generateReadme:counter-v1",
        "createOrReuse:Auto-generated app: Create a counter app with increment and reset buttons",
        "ensureLicense:counter-v1",
        "publish:Round 1: Create a counter app with increment and reset butt",
        "activateStaticSite:counter-v1/10",
    ])
    assert.equal(successes.length, 1)
    assert.equal(successes[0]?.job, job)
    assert.equal(failures.length, 0)
    assert.deepEqual(
        states.map((entry) => entry.state),
        [
            "accepted",
            "generating",
            "documenting_readme",
            "creating_repo",
            "licensing",
            "publishing",
            "activating_site",
            "notifying_success",
            "done",
        ],
    )
})

test("an undelivered success notification still ends in done", async () => {
    const { orchestrator } = harness({ notifyResult: false })

    const outcome = await orchestrator.submit(makeJob()).done

    assert.equal(outcome.state, "done")
    assert.equal(outcome.notified, false)
})

const failureCases: Array<{ step: Step; failedAt: BuildState; stepsRun: number }> = [
    { step: "generateAppCode", failedAt: "generating", stepsRun: 1 },
    { step: "generateReadme", failedAt: "documenting_readme", stepsRun: 2 },
    { step: "createOrReuse", failedAt: "creating_repo", stepsRun: 3 },
    { step: "ensureLicense", failedAt: "licensing", stepsRun: 4 },
    { step: "publish", failedAt: "publishing", stepsRun: 5 },
    { step: "activateStaticSite", failedAt: "activating_site", stepsRun: 6 },
]

for (const { step, failedAt, stepsRun } of failureCases) {
    test(`a failure in ${step} notifies failure exactly once and never success`, async () => {
        const { orchestrator, events, successes, failures, states } = harness({ failAt: step })

        const outcome = await orchestrator.submit(makeJob()).done

        assert.deepEqual(outcome, {
            state: "failed",
            failedAt,
            error: `${step} exploded`,
            notified: true,
            abandoned: false,
        })
        assert.equal(events.length, stepsRun)
        assert.equal(successes.length, 0)
        assert.equal(failures.length, 1)
        assert.equal(failures[0]?.error, `${step} exploded`)
        assert.deepEqual(
            states.slice(-2).map((entry) => entry.state),
            ["notifying_failure", "failed"],
        )
    })
}

test("jobs for the same task run one after another", async () => {
    const { orchestrator, events } = harness()
    const first = orchestrator.submit(makeJob({ round: 1, nonce: "n-1", brief: "round one brief text" }))
    const second = orchestrator.submit(makeJob({ round: 2, nonce: "n-2", brief: "round two brief text" }))

    assert.equal(orchestrator.activeJobs(), 2)
    await Promise.all([first.done, second.done])

    assert.equal(events.indexOf("generateAppCode:round two brief text"), 6)
    assert.equal(events.indexOf("activateStaticSite:counter-v1/10"), 5)
    assert.equal(orchestrator.activeJobs(), 0)
})

test("jobs for different tasks do not wait for each other", async () => {
    const { orchestrator } = harness({
        block: (step, key) => step === "generateReadme" && key === "slow-task",
        jobTimeoutMs: 50,
    })
    const blocked = orchestrator.submit(makeJob({ task: "slow-task", brief: "slow brief text" }))
    const other = orchestrator.submit(makeJob({ task: "quick-task", brief: "quick brief text" }))

    const quickOutcome = await other.done
    assert.equal(quickOutcome.state, "done")
    assert.equal(orchestrator.activeJobs(), 1)

    const slowOutcome = await blocked.done
    assert.equal(slowOutcome.state, "failed")
    assert.equal(slowOutcome.state === "failed" && slowOutcome.failedAt, "documenting_readme")
})

test("a job that exceeds its deadline is failed and the caller is notified", async () => {
    const { orchestrator, failures, successes } = harness({ block: (step) => step === "publish", jobTimeoutMs: 20 })

    const outcome = await orchestrator.submit(makeJob()).done

    assert.deepEqual(outcome, {
        state: "failed",
        failedAt: "publishing",
        error: "Build timed out after 20ms",
        notified: true,
        abandoned: false,
    })
    assert.equal(failures.length, 1)
    assert.equal(failures[0]?.error, "Build timed out after 20ms")
    assert.equal(successes.length, 0)
})

test("shutdown abandons in-flight jobs without notifying", async () => {
    const { orchestrator, failures, successes, states } = harness({ block: (step) => step === "generateAppCode" })
    const handle = orchestrator.submit(makeJob())

    await orchestrator.shutdown()
    const outcome = await handle.done

    assert.deepEqual(outcome, {
        state: "failed",
        failedAt: "generating",
        error: "Service is shutting down",
        notified: false,
        abandoned: true,
    })
    assert.equal(failures.length, 0)
    assert.equal(successes.length, 0)
    assert.equal(states.at(-1)?.state, "failed")
    assert.equal(orchestrator.isShuttingDown, true)
})

test("jobs submitted after shutdown are abandoned before any step runs", async () => {
    const { orchestrator, events, failures } = harness()
    await orchestrator.shutdown()

    const outcome = await orchestrator.submit(makeJob()).done

    assert.equal(outcome.state, "failed")
    assert.equal(outcome.state === "failed" && outcome.abandoned, true)
    assert.deepEqual(events, [])
    assert.equal(failures.length, 0)
})

test("each state transition is logged with the job label", async () => {
    const { orchestrator, lines } = harness()

    await orchestrator.submit(makeJob()).done

    const transitions = lines
        .map((entry) => entry.line)
        .filter((line) => line.includes("state -> "))
    assert.equal(transitions[0], "2026-01-02 03:04:05 [test] [counter-v1#r1] state -> accepted")
    assert.equal(transitions.at(-1), "2026-01-02 03:04:05 [test] [counter-v1#r1] state -> done")
})

test("a build over the real generator, publisher and notifier deploys the generated site", async () => {
    const replies = [
        '```json\n{"index.html": "<html><button id=\\"inc\\">+</button></html>", "app.js": "let count = 0"}\n```',
        "# counter-v1\n\nA counter app.",
    ]
    const model: GenerativeModel = {
        name: "gpt-test",
        async generate() {
            const reply = replies.shift()
            if (reply === undefined) throw new Error("no reply left")
            return reply
        },
    }
    const api = new FakeGitHub("octo-dev")
    const { sleep } = recordingSleep()
    const { logger } = recordingLogger()
    const posts: Array<{ url: string; body: unknown }> = []
    const fetchImpl: FetchLike = async (url, init) => {
        posts.push({ url, body: typeof init.body === "string" ? JSON.parse(init.body) : undefined })
        return new Response("{}", { status: 200 })
    }
    const retryPolicy = { maxAttempts: 3, initialDelayMs: 10, maxDelayMs: 40 }

    const orchestrator = new BuildOrchestrator({
        generator: new ContentGenerator({ model, account: "octo-dev", sleep }),
        publisher: new RepositoryPublisher({
            api,
            account: "octo-dev",
            licenseAuthor: "Octo Dev",
            retryPolicy,
            probe: async () => true,
            sleep,
            random: () => 0.5,
        }),
        notifier: new OutcomeNotifier({ retryPolicy, fetch: fetchImpl, sleep }),
        createJobLogger: () => logger,
        pagesPollAttempts: 3,
        jobTimeoutMs: 0,
    })
    const job = makeJob({ brief: "a counter app", round: 2, nonce: "n-2" })

    const outcome = await orchestrator.submit(job).done

    assert.ok(outcome.state === "done")
    const head = api.headOf("counter-v1")
    assert.ok(head)
    assert.deepEqual(outcome.result, {
        repoUrl: "https://github.com/octo-dev/counter-v1",
        commitSha: head,
        pagesUrl: "https://octo-dev.github.io/counter-v1/",
    })
    const commit = api.commits.get(head)
    assert.ok(commit)
    assert.deepEqual(api.treeFiles(commit.tree), {
        "index.html": '<html><button id="inc">+</button></html>',
        "app.js": "let count = 0",
        "README.md": "# counter-v1\n\nA counter app.",
    })
    assert.equal(posts.length, 1)
    assert.equal(posts[0]?.url, "https://eval.example.com/notify")
    assert.deepEqual(posts[0]?.body, {
        email: "student@example.com",
        task: "counter-v1",
        round: 2,
        nonce: "n-2",
        status: "success",
        repo_url: "https://github.com/octo-dev/counter-v1",
        commit_sha: head,
        pages_url: "https://octo-dev.github.io/counter-v1/",
    })
})
