import assert from "node:assert/strict"
import { test } from "node:test"
import { GitHubApiError, RetryExhaustedError } from "../src/errors.js"
import { RepositoryPublisher, renderLicense, type SiteProbe } from "../src/repositoryPublisher.js"
import { FakeGitHub, recordingLogger, recordingSleep } from "./support/fakes.js"

function setup(options: { probe?: SiteProbe } = {}) {
    const api = new FakeGitHub("octo-dev")
    const { sleep, delays } = recordingSleep()
    const { logger, lines } = recordingLogger()
    const probed: string[] = []
    const publisher = new RepositoryPublisher({
        api,
        account: "octo-dev",
        licenseAuthor: "Octo Dev",
        retryPolicy: { maxAttempts: 3, initialDelayMs: 10, maxDelayMs: 40 },
        settleDelayMs: 2_000,
        pollIntervalMs: 10_000,
        probe:
            options.probe ??
            (async (url) => {
                probed.push(url)
                return true
            }),
        sleep,
        random: () => 0.5,
        now: () => new Date(2026, 9, 18),
    })
    return { api, publisher, delays, lines, probed, ctx: { logger } }
}

test("createOrReuse creates a missing repository once and reuses it afterwards", async () => {
    const { api, publisher, delays, ctx } = setup()

    const first = await publisher.createOrReuse("counter-v1", "Auto-generated app: a counter app", ctx)
    const second = await publisher.createOrReuse("counter-v1", "Auto-generated app: a counter app", ctx)

    assert.deepEqual(first, second)
    assert.equal(first.htmlUrl, "https://github.com/octo-dev/counter-v1")
    assert.deepEqual(api.calls, ["getRepo", "createRepo", "getRepo"])
    assert.deepEqual(delays, [2_000])
})

test("createOrReuse propagates lookup errors other than not-found", async () => {
    const { api, publisher, ctx } = setup()
    api.failNext("getRepo", new GitHubApiError("get repository", 401, "Bad credentials"))

    await assert.rejects(
        publisher.createOrReuse("counter-v1", "desc", ctx),
        (error: unknown) => error instanceof GitHubApiError && error.status === 401,
    )
    assert.deepEqual(api.calls, ["getRepo"])
})

test("createOrReuse retries server errors before giving up", async () => {
    const { api, publisher, delays, ctx } = setup()
    for (let i = 0; i < 3; i += 1) {
        api.failNext("getRepo", new GitHubApiError("get repository", 502, "Bad Gateway"))
    }

    await assert.rejects(
        publisher.createOrReuse("counter-v1", "desc", ctx),
        (error: unknown) => error instanceof RetryExhaustedError && error.attempts === 3,
    )
    assert.deepEqual(delays, [10, 20])
})

test("a repository create that landed before a server error is reused instead of failing", async () => {
    const { api, publisher, delays, ctx } = setup()
    api.failNextAfterApplying("createRepo", new GitHubApiError("create repository", 502, "Bad Gateway"))

    const repo = await publisher.createOrReuse("counter-v1", "desc", ctx)

    assert.equal(repo.fullName, "octo-dev/counter-v1")
    assert.deepEqual(api.calls, ["getRepo", "createRepo", "createRepo", "getRepo"])
    assert.deepEqual(delays, [10, 2_000])
})

test("a rejected create is reported as is when the repository still does not exist", async () => {
    const { api, publisher, ctx } = setup()
    const rejection = new GitHubApiError("create repository", 422, "name is invalid")
    api.failNext("createRepo", rejection)

    await assert.rejects(publisher.createOrReuse("counter-v1", "desc", ctx), (error: unknown) => error === rejection)
    assert.deepEqual(api.calls, ["getRepo", "createRepo", "getRepo"])
})

test("ensureLicense adds the MIT license once", async () => {
    const { api, publisher, ctx } = setup()
    const repo = api.addRepo("counter-v1")

    await publisher.ensureLicense(repo, ctx)
    await publisher.ensureLicense(repo, ctx)

    assert.deepEqual(api.calls, ["getFile", "createFile", "getFile"])
    const license = api.repos.get("counter-v1")?.files.get("LICENSE") ?? ""
    assert.ok(license.startsWith("MIT License\n\nCopyright (c) 2026 Octo Dev\n"))
    assert.equal(license, renderLicense(2026, "Octo Dev"))
})

test("a license create that landed before a server error counts as added", async () => {
    const { api, publisher, delays, ctx } = setup()
    const repo = api.addRepo("counter-v1")
    api.failNextAfterApplying("createFile", new GitHubApiError("create file", 502, "Bad Gateway"))

    await publisher.ensureLicense(repo, ctx)

    assert.deepEqual(api.calls, ["getFile", "createFile", "createFile", "getFile"])
    assert.equal(api.repos.get("counter-v1")?.files.get("LICENSE"), renderLicense(2026, "Octo Dev"))
    assert.deepEqual(delays, [10])
})

test("publish on an empty repository creates a root commit and the branch ref", async () => {
    const { api, publisher, ctx } = setup()
    const repo = api.addRepo("counter-v1")

    const sha = await publisher.publish(
        repo,
        { "index.html": "<html></html>" },
        "# counter-v1",
        "Round 1: a counter app",
        ctx,
    )

    const commit = api.commits.get(sha)
    assert.ok(commit)
    assert.deepEqual(commit.parents, [])
    assert.equal(commit.message, "Round 1: a counter app")
    assert.deepEqual(api.treeFiles(commit.tree), { "index.html": "<html></html>", "README.md": "# counter-v1" })
    assert.equal(api.headOf("counter-v1"), sha)
    assert.ok(api.calls.includes("createRef"))
    assert.ok(!api.calls.includes("updateRef"))
    assert.ok(api.calls.includes("createTree"))
    assert.ok(!api.calls.includes("createTree(base)"))
})

test("publish on an existing head layers a single commit on top of the previous tree", async () => {
    const { api, publisher, ctx } = setup()
    const repo = api.addRepo("counter-v1")
    const previous = api.seedCommit("counter-v1", {
        LICENSE: "MIT",
        "index.html": "<html>v1</html>",
        "notes.txt": "keep me",
    })

    const sha = await publisher.publish(
        repo,
        { "index.html": "<html>v2</html>", "app.js": "let n = 1" },
        "# v2",
        "Round 2: add reset",
        ctx,
    )

    const commit = api.commits.get(sha)
    assert.ok(commit)
    assert.deepEqual(commit.parents, [previous])
    assert.deepEqual(api.treeFiles(commit.tree), {
        LICENSE: "MIT",
        "index.html": "<html>v2</html>",
        "notes.txt": "keep me",
        "app.js": "let n = 1",
        "README.md": "# v2",
    })
    assert.equal(api.headOf("counter-v1"), sha)
    assert.equal(api.calls.filter((call) => call === "createCommit").length, 1)
    assert.ok(api.calls.includes("updateRef"))
    assert.ok(!api.calls.includes("createRef"))
})

test("activateStaticSite enables Pages and returns once the site answers", async () => {
    const { api, publisher, delays, probed, ctx } = setup()
    const repo = api.addRepo("counter-v1")

    const url = await publisher.activateStaticSite(repo, 10, ctx)

    assert.equal(url, "https://octo-dev.github.io/counter-v1/")
    assert.deepEqual(api.calls, ["getPages", "enablePages"])
    assert.deepEqual(probed, ["https://octo-dev.github.io/counter-v1/"])
    assert.deepEqual(delays, [10_000])
})

test("activateStaticSite treats an already enabled site as success", async () => {
    const { api, publisher, lines, ctx } = setup()
    const repo = api.addRepo("counter-v1")
    await api.enablePages(repo, { branch: "main", path: "/" })
    api.calls.length = 0

    await publisher.activateStaticSite(repo, 1, ctx)

    assert.deepEqual(api.calls, ["getPages"])
    assert.ok(
        lines.some(
            (entry) => entry.line === "2026-01-02 03:04:05 [test] [github] GitHub Pages already enabled (status: built)",
        ),
    )
})

test("activateStaticSite returns the URL with a warning when no probe succeeds", async () => {
    let probes = 0
    const { api, publisher, delays, lines, ctx } = setup({
        probe: async () => {
            probes += 1
            if (probes === 2) throw new TypeError("fetch failed")
            return false
        },
    })
    const repo = api.addRepo("counter-v1")

    const url = await publisher.activateStaticSite(repo, 3, ctx)

    assert.equal(url, "https://octo-dev.github.io/counter-v1/")
    assert.equal(probes, 3)
    assert.deepEqual(delays, [10_000, 10_000, 10_000])
    const warnings = lines.filter((entry) => entry.level === "warn").map((entry) => entry.line)
    assert.deepEqual(warnings, [
        "2026-01-02 03:04:05 [test] [pages] no successful probe after 3 attempt(s), returning https://octo-dev.github.io/counter-v1/ unconfirmed",
    ])
})
