import { GitHubApiError } from "./errors.js"

export interface RepoRef {
    owner: string
    name: string
}

export interface RepoInfo extends RepoRef {
    fullName: string
    htmlUrl: string
    defaultBranch: string
}

export interface TreeEntry {
    path: string
    mode: "100644"
    type: "blob"
    sha: string
}

export interface GitCommitInfo {
    sha: string
    treeSha: string
    parents: string[]
}

export interface PagesInfo {
    /**
     * Build status reported by Pages ("built", "building", ...), null before the first build.
     */
    status: string | null
}

export type EnablePagesResult = "enabled" | "already_enabled"

/**
 * The subset of the hosting API the publisher needs. Every method throws GitHubApiError on
 * a non-2xx response; 404 means "does not exist".
 */
export interface GitHubApi {
    getRepo(repo: RepoRef): Promise<RepoInfo>
    createRepo(params: { name: string; description: string }): Promise<RepoInfo>
    getFile(repo: RepoRef, path: string): Promise<{ path: string; sha: string }>
    createFile(repo: RepoRef, params: { path: string; message: string; content: string }): Promise<{ commitSha: string }>
    getBranchRef(repo: RepoRef, branch: string): Promise<{ sha: string }>
    getCommit(repo: RepoRef, sha: string): Promise<GitCommitInfo>
    createBlob(repo: RepoRef, content: string): Promise<{ sha: string }>
    createTree(repo: RepoRef, entries: TreeEntry[], baseTree?: string): Promise<{ sha: string }>
    createCommit(repo: RepoRef, params: { message: string; tree: string; parents: string[] }): Promise<{ sha: string }>
    updateRef(repo: RepoRef, branch: string, sha: string): Promise<void>
    createRef(repo: RepoRef, ref: string, sha: string): Promise<void>
    enablePages(repo: RepoRef, source: { branch: string; path: string }): Promise<EnablePagesResult>
    getPages(repo: RepoRef): Promise<PagesInfo>
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface FetchGitHubApiClientOptions {
    token: string
    baseUrl?: string
    fetch?: FetchLike
    requestTimeoutMs?: number
}

interface RequestOptions {
    method?: "GET" | "POST" | "PUT" | "PATCH"
    body?: unknown
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

function field(value: unknown, ...keys: string[]): unknown {
    let current = value
    for (const key of keys) {
        if (!isRecord(current)) return undefined
        current = current[key]
    }
    return current
}

function stringField(value: unknown, operation: string, ...keys: string[]): string {
    const found = field(value, ...keys)
    if (typeof found !== "string") {
        throw new Error(`GitHub ${operation}: response is missing ${keys.join(".")}`)
    }
    return found
}

function toRepoInfo(json: unknown, operation: string): RepoInfo {
    const defaultBranch = field(json, "default_branch")
    return {
        owner: stringField(json, operation, "owner", "login"),
        name: stringField(json, operation, "name"),
        fullName: stringField(json, operation, "full_name"),
        htmlUrl: stringField(json, operation, "html_url"),
        defaultBranch: typeof defaultBranch === "string" && defaultBranch ? defaultBranch : "main",
    }
}

function encodePath(filePath: string): string {
    return filePath.split("/").map(encodeURIComponent).join("/")
}

/**
 * REST client over fetch. One instance is shared by all jobs.
 */
export class FetchGitHubApiClient implements GitHubApi {
    private readonly baseUrl: string
    private readonly fetchImpl: FetchLike
    private readonly requestTimeoutMs: number

    constructor(private readonly options: FetchGitHubApiClientOptions) {
        this.baseUrl = (options.baseUrl ?? "https://api.github.com").replace(/\/+$/, "")
        this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000
    }

    private repoPath(repo: RepoRef): string {
        return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`
    }

    private async request(operation: string, urlPath: string, options: RequestOptions = {}): Promise<unknown> {
        const response = await this.fetchImpl(`${this.baseUrl}${urlPath}`, {
            method: options.method ?? "GET",
            headers: {
                Authorization: `Bearer ${this.options.token}`,
                Accept: "application/vnd.github+json",
                "X-GitHub-Api-Version": "2022-11-28",
                ...(options.body !== undefined ? { "Content-Type": "application/json" } : {}),
            },
            body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
            signal: AbortSignal.timeout(this.requestTimeoutMs),
        })

        const text = await response.text()
        if (!response.ok) {
            throw new GitHubApiError(operation, response.status, text)
        }
        if (!text) return null
        try {
            return JSON.parse(text)
        } catch {
            throw new GitHubApiError(operation, response.status, `unparseable response body: ${text}`)
        }
    }

    async getRepo(repo: RepoRef): Promise<RepoInfo> {
        return toRepoInfo(await this.request("get repository", this.repoPath(repo)), "get repository")
    }

    async createRepo(params: { name: string; description: string }): Promise<RepoInfo> {
        const json = await this.request("create repository", "/user/repos", {
            method: "POST",
            body: {
                name: params.name,
                description: params.description,
                private: false,
                auto_init: false,
                has_issues: true,
                has_wiki: false,
            },
        })
        return toRepoInfo(json, "create repository")
    }

    async getFile(repo: RepoRef, filePath: string): Promise<{ path: string; sha: string }> {
        const json = await this.request("get file", `${this.repoPath(repo)}/contents/${encodePath(filePath)}`)
        return { path: stringField(json, "get file", "path"), sha: stringField(json, "get file", "sha") }
    }

    async createFile(
        repo: RepoRef,
        params: { path: string; message: string; content: string },
    ): Promise<{ commitSha: string }> {
        const json = await this.request("create file", `${this.repoPath(repo)}/contents/${encodePath(params.path)}`, {
            method: "PUT",
            body: {
                message: params.message,
                content: Buffer.from(params.content, "utf8").toString("base64"),
            },
        })
        return { commitSha: stringField(json, "create file", "commit", "sha") }
    }

    async getBranchRef(repo: RepoRef, branch: string): Promise<{ sha: string }> {
        const json = await this.request("get ref", `${this.repoPath(repo)}/git/ref/heads/${encodePath(branch)}`)
        return { sha: stringField(json, "get ref", "object", "sha") }
    }

    async getCommit(repo: RepoRef, sha: string): Promise<GitCommitInfo> {
        const json = await this.request("get commit", `${this.repoPath(repo)}/git/commits/${sha}`)
        const parents = field(json, "parents")
        return {
            sha: stringField(json, "get commit", "sha"),
            treeSha: stringField(json, "get commit", "tree", "sha"),
            parents: Array.isArray(parents)
                ? parents.map((parent) => field(parent, "sha")).filter((value): value is string => typeof value === "string")
                : [],
        }
    }

    async createBlob(repo: RepoRef, content: string): Promise<{ sha: string }> {
        const json = await this.request("create blob", `${this.repoPath(repo)}/git/blobs`, {
            method: "POST",
            body: { content, encoding: "utf-8" },
        })
        return { sha: stringField(json, "create blob", "sha") }
    }

    async createTree(repo: RepoRef, entries: TreeEntry[], baseTree?: string): Promise<{ sha: string }> {
        const json = await this.request("create tree", `${this.repoPath(repo)}/git/trees`, {
            method: "POST",
            body: baseTree ? { tree: entries, base_tree: baseTree } : { tree: entries },
        })
        return { sha: stringField(json, "create tree", "sha") }
    }

    async createCommit(
        repo: RepoRef,
        params: { message: string; tree: string; parents: string[] },
    ): Promise<{ sha: string }> {
        const json = await this.request("create commit", `${this.repoPath(repo)}/git/commits`, {
            method: "POST",
            body: params,
        })
        return { sha: stringField(json, "create commit", "sha") }
    }

    async updateRef(repo: RepoRef, branch: string, sha: string): Promise<void> {
        await this.request("update ref", `${this.repoPath(repo)}/git/refs/heads/${encodePath(branch)}`, {
            method: "PATCH",
            body: { sha, force: false },
        })
    }

    async createRef(repo: RepoRef, ref: string, sha: string): Promise<void> {
        await this.request("create ref", `${this.repoPath(repo)}/git/refs`, {
            method: "POST",
            body: { ref, sha },
        })
    }

    async enablePages(repo: RepoRef, source: { branch: string; path: string }): Promise<EnablePagesResult> {
        try {
            await this.request("enable pages", `${this.repoPath(repo)}/pages`, {
                method: "POST",
                body: { source },
            })
            return "enabled"
        } catch (error) {
            if (error instanceof GitHubApiError && error.status === 409) {
                return "already_enabled"
            }
            throw error
        }
    }

    async getPages(repo: RepoRef): Promise<PagesInfo> {
        const json = await this.request("get pages", `${this.repoPath(repo)}/pages`)
        const status = field(json, "status")
        return { status: typeof status === "string" ? status : null }
    }
}
