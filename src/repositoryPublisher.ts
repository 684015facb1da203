import { LICENSE_FILE, README_FILE, type FileMap } from "./buildTypes.js"
import { GitHubApiError, describeError, isNotFound } from "./errors.js"
import type { StepContext } from "./contentGenerator.js"
import { pagesUrlFor } from "./contentGenerator.js"
import type { GitHubApi, RepoInfo, RepoRef, TreeEntry } from "./githubClient.js"
import { retryOrThrow, sleep as defaultSleep, throwIfAborted, type RetryPolicy, type Sleep } from "./retry.js"

const MIT_LICENSE_TEMPLATE = `MIT License

Copyright (c) {year} {author}

Permission is hereby granted, free of charge, to any person obtaining a copy
of this software and associated documentation files (the "Software"), to deal
in the Software without restriction, including without limitation the rights
to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
copies of the Software, and to permit persons to whom the Software is
furnished to do so, subject to the following conditions:

The above copyright notice and this permission notice shall be included in all
copies or substantial portions of the Software.

THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
SOFTWARE.
`

function isUnprocessable(error: unknown): boolean {
    return error instanceof GitHubApiError && error.status === 422
}

function isEmptyRepository(error: unknown): boolean {
    return error instanceof GitHubApiError && (error.status === 404 || error.status === 409)
}

export function renderLicense(year: number, author: string): string {
    return MIT_LICENSE_TEMPLATE.replace("{year}", String(year)).replace("{author}", author)
}

/**
 * Reachability check for the published site. Resolves true once the URL answers 2xx.
 */
export type SiteProbe = (url: string, signal?: AbortSignal) => Promise<boolean>

export function httpProbe(timeoutMs = 10_000): SiteProbe {
    return async (url, signal) => {
        const timeout = AbortSignal.timeout(timeoutMs)
        const response = await fetch(url, {
            method: "GET",
            redirect: "follow",
            signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        })
        await response.body?.cancel()
        return response.ok
    }
}

export interface RepositoryPublisherOptions {
    api: GitHubApi
    account: string
    licenseAuthor: string
    retryPolicy: RetryPolicy
    settleDelayMs?: number
    pollIntervalMs?: number
    probe?: SiteProbe
    sleep?: Sleep
    random?: () => number
    now?: () => Date
}

export class RepositoryPublisher {
    private readonly api: GitHubApi
    private readonly account: string
    private readonly licenseAuthor: string
    private readonly retryPolicy: RetryPolicy
    private readonly settleDelayMs: number
    private readonly pollIntervalMs: number
    private readonly probe: SiteProbe
    private readonly sleep: Sleep
    private readonly random?: () => number
    private readonly now: () => Date

    constructor(options: RepositoryPublisherOptions) {
        this.api = options.api
        this.account = options.account
        this.licenseAuthor = options.licenseAuthor
        this.retryPolicy = options.retryPolicy
        this.settleDelayMs = options.settleDelayMs ?? 2_000
        this.pollIntervalMs = options.pollIntervalMs ?? 10_000
        this.probe = options.probe ?? httpProbe()
        this.sleep = options.sleep ?? defaultSleep
        this.random = options.random
        this.now = options.now ?? (() => new Date())
    }

    /**
     * Hosting API call with the shared retry policy. 4xx surfaces immediately; `isExpected`
     * marks the answers the caller branches on (usually 404).
     */
    private call<T>(
        label: string,
        operation: () => Promise<T>,
        ctx: StepContext,
        isExpected?: (error: unknown) => boolean,
    ): Promise<T> {
        return retryOrThrow(operation, this.retryPolicy, {
            label: `github ${label}`,
            logger: ctx.logger.child("github"),
            isExpected,
            sleep: this.sleep,
            random: this.random,
            signal: ctx.signal,
        })
    }

    /**
     * Lookup after a rejected create. The create's own error wins when the resource is still missing.
     */
    private async recheck<T>(
        lookup: () => Promise<T>,
        label: string,
        createError: unknown,
        ctx: StepContext,
    ): Promise<T> {
        try {
            return await this.call(label, lookup, ctx, isNotFound)
        } catch (error) {
            throw isNotFound(error) ? createError : error
        }
    }

    async createOrReuse(name: string, description: string, ctx: StepContext): Promise<RepoInfo> {
        const logger = ctx.logger.child("github")
        const ref: RepoRef = { owner: this.account, name }

        try {
            const existing = await this.call("get repository", () => this.api.getRepo(ref), ctx, isNotFound)
            logger.info(`repository ${existing.fullName} already exists, reusing it`)
            return existing
        } catch (error) {
            if (!isNotFound(error)) throw error
        }

        logger.info(`creating repository ${this.account}/${name}`)
        let created: RepoInfo
        try {
            created = await this.call("create repository", () => this.api.createRepo({ name, description }), ctx)
        } catch (error) {
            // a create that timed out may still have landed; the retry then answers 422
            if (!isUnprocessable(error)) throw error
            logger.info(`create answered ${describeError(error)}, looking the repository up again`)
            created = await this.recheck(() => this.api.getRepo(ref), "get repository", error, ctx)
        }
        await this.sleep(this.settleDelayMs, ctx.signal)
        logger.info(`repository created: ${created.htmlUrl}`)
        return created
    }

    async ensureLicense(repo: RepoInfo, ctx: StepContext): Promise<void> {
        const logger = ctx.logger.child("github")

        try {
            await this.call("get license", () => this.api.getFile(repo, LICENSE_FILE), ctx, isNotFound)
            logger.info(`${LICENSE_FILE} already present, skipping`)
            return
        } catch (error) {
            if (!isNotFound(error)) throw error
        }

        const content = renderLicense(this.now().getFullYear(), this.licenseAuthor)
        try {
            await this.call(
                "create license",
                () => this.api.createFile(repo, { path: LICENSE_FILE, message: "Add MIT License", content }),
                ctx,
            )
        } catch (error) {
            if (!isUnprocessable(error)) throw error
            logger.info(`create answered ${describeError(error)}, checking for ${LICENSE_FILE} again`)
            await this.recheck(() => this.api.getFile(repo, LICENSE_FILE), "get license", error, ctx)
        }
        logger.info(`${LICENSE_FILE} added`)
    }

    /**
     * Reads the branch head, or null when the repository has no commits yet
     * (GitHub answers 404 or 409 for an empty repository).
     */
    private async readHead(repo: RepoInfo, ctx: StepContext): Promise<{ sha: string; treeSha: string } | null> {
        let headSha: string
        try {
            const ref = await this.call(
                "get ref",
                () => this.api.getBranchRef(repo, repo.defaultBranch),
                ctx,
                isEmptyRepository,
            )
            headSha = ref.sha
        } catch (error) {
            if (isEmptyRepository(error)) return null
            throw error
        }
        const commit = await this.call("get commit", () => this.api.getCommit(repo, headSha), ctx)
        return { sha: commit.sha, treeSha: commit.treeSha }
    }

    /**
     * One commit containing every file plus the README, layered on the current tree.
     * Returns the new commit sha.
     */
    async publish(repo: RepoInfo, files: FileMap, readme: string, message: string, ctx: StepContext): Promise<string> {
        const logger = ctx.logger.child("github")
        const contents: FileMap = { ...files, [README_FILE]: readme }
        logger.info(`publishing ${Object.keys(contents).length} file(s) to ${repo.fullName}`)

        const head = await this.readHead(repo, ctx)

        const entries: TreeEntry[] = []
        for (const [filePath, content] of Object.entries(contents)) {
            const blob = await this.call(`create blob ${filePath}`, () => this.api.createBlob(repo, content), ctx)
            entries.push({ path: filePath, mode: "100644", type: "blob", sha: blob.sha })
        }

        const tree = await this.call(
            "create tree",
            () => this.api.createTree(repo, entries, head?.treeSha),
            ctx,
        )
        const commit = await this.call(
            "create commit",
            () => this.api.createCommit(repo, { message, tree: tree.sha, parents: head ? [head.sha] : [] }),
            ctx,
        )

        if (head) {
            await this.call("update ref", () => this.api.updateRef(repo, repo.defaultBranch, commit.sha), ctx)
        } else {
            await this.call(
                "create ref",
                () => this.api.createRef(repo, `refs/heads/${repo.defaultBranch}`, commit.sha),
                ctx,
            )
        }

        logger.info(`pushed commit ${commit.sha}${head ? ` on top of ${head.sha}` : " (root commit)"}`)
        return commit.sha
    }

    private async ensurePagesEnabled(repo: RepoInfo, ctx: StepContext) {
        const logger = ctx.logger.child("github")
        try {
            const pages = await this.call("get pages", () => this.api.getPages(repo), ctx, isNotFound)
            logger.info(`GitHub Pages already enabled (status: ${pages.status ?? "unknown"})`)
            return
        } catch (error) {
            if (!isNotFound(error)) throw error
        }

        const result = await this.call(
            "enable pages",
            () => this.api.enablePages(repo, { branch: repo.defaultBranch, path: "/" }),
            ctx,
        )
        logger.info(result === "already_enabled" ? "GitHub Pages already enabled" : "GitHub Pages enabled")
    }

    /**
     * Turns on Pages and waits for the site to answer. The URL is returned even when no probe
     * succeeds: propagation can take longer than the polling budget.
     */
    async activateStaticSite(repo: RepoInfo, maxPollAttempts: number, ctx: StepContext): Promise<string> {
        const logger = ctx.logger.child("pages")
        await this.ensurePagesEnabled(repo, ctx)

        const siteUrl = pagesUrlFor(this.account, repo.name)
        logger.info(`waiting for ${siteUrl}`)

        for (let attempt = 1; attempt <= maxPollAttempts; attempt += 1) {
            await this.sleep(this.pollIntervalMs, ctx.signal)
            try {
                if (await this.probe(siteUrl, ctx.signal)) {
                    logger.info(`site is live: ${siteUrl}`)
                    return siteUrl
                }
                logger.info(`site not ready yet (attempt ${attempt}/${maxPollAttempts})`)
            } catch (error) {
                throwIfAborted(ctx.signal)
                logger.info(`site not reachable yet (attempt ${attempt}/${maxPollAttempts}): ${describeError(error)}`)
            }
        }

        logger.warn(`no successful probe after ${maxPollAttempts} attempt(s), returning ${siteUrl} unconfirmed`)
        return siteUrl
    }
}
