export interface Attachment {
    name: string
    /**
     * Either a `data:` URI carrying the content or an external reference.
     */
    url: string
}

export interface DecodedAttachment {
    name: string
    content: string
    mimeType: string
}

/**
 * One accepted build request. Never mutated after acceptance.
 */
export interface BuildJob {
    readonly email: string
    /**
     * Unique task identifier; doubles as the repository name.
     */
    readonly task: string
    readonly round: number
    readonly nonce: string
    readonly brief: string
    readonly checks: readonly string[]
    readonly attachments: readonly Attachment[]
    readonly evaluationUrl: string
}

/**
 * Relative file path -> full text content.
 */
export type FileMap = Record<string, string>

export const ENTRY_POINT_FILE = "index.html"
export const README_FILE = "README.md"
export const LICENSE_FILE = "LICENSE"

export interface DeploymentResult {
    repoUrl: string
    commitSha: string
    pagesUrl: string
}

interface PayloadCorrelation {
    email: string
    task: string
    round: number
    nonce: string
}

export interface SuccessPayload extends PayloadCorrelation {
    status: "success"
    repo_url: string
    commit_sha: string
    pages_url: string
}

export interface FailurePayload extends PayloadCorrelation {
    status: "failure"
    error: string
}

export type NotificationPayload = SuccessPayload | FailurePayload

export type BuildState =
    | "accepted"
    | "generating"
    | "documenting_readme"
    | "creating_repo"
    | "licensing"
    | "publishing"
    | "activating_site"
    | "notifying_success"
    | "done"
    | "notifying_failure"
    | "failed"

export type BuildOutcome =
    | {
          state: "done"
          result: DeploymentResult
          notified: boolean
      }
    | {
          state: "failed"
          /**
           * Last non-terminal state reached before the failure.
           */
          failedAt: BuildState
          error: string
          notified: boolean
          abandoned: boolean
      }

export function buildLabel(job: Pick<BuildJob, "task" | "round">): string {
    return `${job.task}#r${job.round}`
}
