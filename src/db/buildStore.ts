import path from "node:path"
import { mkdirSync } from "node:fs"
import Database from "better-sqlite3"
import type { BuildJob, BuildState } from "../buildTypes.js"
import { describeError } from "../errors.js"
import type { Logger } from "../jobLogger.js"

export interface BuildRecord {
    task: string
    round: number
    nonce: string
    email: string
    state: BuildState
    repoUrl: string | null
    commitSha: string | null
    pagesUrl: string | null
    error: string | null
    notified: boolean | null
    startedAt: string
    updatedAt: string
}

export interface BuildRecordPatch {
    repoUrl?: string
    commitSha?: string
    pagesUrl?: string
    error?: string
    notified?: boolean
}

interface BuildRow {
    task: string
    round: number
    nonce: string
    email: string
    state: string
    repo_url: string | null
    commit_sha: string | null
    pages_url: string | null
    error: string | null
    notified: number | null
    started_at: string
    updated_at: string
}

const BUILD_STATES: readonly BuildState[] = [
    "accepted",
    "generating",
    "documenting_readme",
    "creating_repo",
    "licensing",
    "publishing",
    "activating_site",
    "notifying_success",
    "done",
    "notifying_failure",
    "failed",
]

function toBuildState(value: string): BuildState {
    const match = BUILD_STATES.find((state) => state === value)
    if (!match) throw new Error(`Unknown build state in ledger: ${value}`)
    return match
}

function toRecord(row: BuildRow): BuildRecord {
    return {
        task: row.task,
        round: row.round,
        nonce: row.nonce,
        email: row.email,
        state: toBuildState(row.state),
        repoUrl: row.repo_url,
        commitSha: row.commit_sha,
        pagesUrl: row.pages_url,
        error: row.error,
        notified: row.notified === null ? null : row.notified === 1,
        startedAt: row.started_at,
        updatedAt: row.updated_at,
    }
}

/**
 * Build ledger for observability. Nothing is resumed from it; writes never fail the pipeline.
 */
export class BuildStore {
    private readonly db: Database.Database
    private readonly logger?: Logger
    private readonly now: () => Date

    constructor(dbPath: string, options: { logger?: Logger; now?: () => Date } = {}) {
        if (dbPath !== ":memory:") {
            mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true })
        }
        this.db = new Database(dbPath)
        if (dbPath !== ":memory:") {
            this.db.pragma("journal_mode = WAL")
        }
        this.logger = options.logger
        this.now = options.now ?? (() => new Date())
        this.migrate()
    }

    private migrate() {
        this.db.exec(`
    CREATE TABLE IF NOT EXISTS builds (
      task TEXT NOT NULL,
      round INTEGER NOT NULL,
      nonce TEXT NOT NULL,
      email TEXT NOT NULL,
      state TEXT NOT NULL,
      repo_url TEXT,
      commit_sha TEXT,
      pages_url TEXT,
      error TEXT,
      notified INTEGER,
      started_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (task, round, nonce)
    );
    CREATE INDEX IF NOT EXISTS builds_by_task ON builds (task, updated_at);
  `)
    }

    recordState(job: BuildJob, state: BuildState, patch: BuildRecordPatch = {}) {
        try {
            const now = this.now().toISOString()
            this.db
                .prepare(
                    `
    INSERT INTO builds (task, round, nonce, email, state, repo_url, commit_sha, pages_url, error, notified, started_at, updated_at)
    VALUES (@task, @round, @nonce, @email, @state, @repo_url, @commit_sha, @pages_url, @error, @notified, @now, @now)
    ON CONFLICT(task, round, nonce) DO UPDATE SET
      state=excluded.state,
      repo_url=COALESCE(excluded.repo_url, builds.repo_url),
      commit_sha=COALESCE(excluded.commit_sha, builds.commit_sha),
      pages_url=COALESCE(excluded.pages_url, builds.pages_url),
      error=COALESCE(excluded.error, builds.error),
      notified=COALESCE(excluded.notified, builds.notified),
      updated_at=excluded.updated_at
    `,
                )
                .run({
                    task: job.task,
                    round: job.round,
                    nonce: job.nonce,
                    email: job.email,
                    state,
                    repo_url: patch.repoUrl ?? null,
                    commit_sha: patch.commitSha ?? null,
                    pages_url: patch.pagesUrl ?? null,
                    error: patch.error ?? null,
                    notified: patch.notified === undefined ? null : patch.notified ? 1 : 0,
                    now,
                })
        } catch (error) {
            this.logger?.warn(`[db] recordState failed: ${describeError(error)}`)
        }
    }

    listByTask(task: string): BuildRecord[] {
        const rows = this.db
            .prepare(
                `SELECT * FROM builds WHERE task = ? ORDER BY round DESC, updated_at DESC`,
            )
            .all(task) as BuildRow[]
        return rows.map(toRecord)
    }

    close() {
        this.db.close()
    }
}
