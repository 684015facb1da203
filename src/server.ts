import express, { type NextFunction, type Request, type Response } from "express"
import { timingSafeEqual } from "node:crypto"
import type { BuildHandle } from "./buildOrchestrator.js"
import { BuildRequestSchema, toBuildJob } from "./buildRequest.js"
import type { BuildJob } from "./buildTypes.js"
import type { BuildRecord } from "./db/buildStore.js"
import { describeError } from "./errors.js"
import type { Logger } from "./jobLogger.js"

export const SERVICE_NAME = "siteforge"
export const SERVICE_VERSION = "1.0.0"

export interface BuildSubmitter {
    submit(job: BuildJob): BuildHandle
    activeJobs(): number
}

export interface BuildHistory {
    listByTask(task: string): BuildRecord[]
}

export interface ServerDeps {
    appSecret: string
    orchestrator: BuildSubmitter
    history?: BuildHistory
    logger: Logger
}

function secretsMatch(expected: string, provided: string): boolean {
    const a = Buffer.from(expected, "utf8")
    const b = Buffer.from(provided, "utf8")
    return a.length === b.length && timingSafeEqual(a, b)
}

export function createServer(deps: ServerDeps): express.Express {
    const { orchestrator, history } = deps
    const logger = deps.logger.child("server")
    const app = express()

    app.use(express.json({ limit: "25mb" }))

    app.get("/", (_req, res) => {
        res.json({
            status: "operational",
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
            active_jobs: orchestrator.activeJobs(),
        })
    })

    app.post("/build", (req, res) => {
        const parsed = BuildRequestSchema.safeParse(req.body)
        if (!parsed.success) {
            res.status(422).json({
                status: "error",
                message: "Invalid build request",
                issues: parsed.error.issues.map((issue) => ({
                    path: issue.path.join("."),
                    message: issue.message,
                })),
            })
            return
        }

        const request = parsed.data
        if (!secretsMatch(deps.appSecret, request.secret)) {
            logger.warn(`invalid secret provided for task ${request.task}`)
            res.status(401).json({ status: "error", message: "Invalid secret" })
            return
        }

        logger.info(`build request received for ${request.task} (round ${request.round})`)
        orchestrator.submit(toBuildJob(request))

        res.json({
            status: "accepted",
            message: `Build request for '${request.task}' (round ${request.round}) accepted and processing`,
            task: request.task,
        })
    })

    app.get("/builds/:task", (req, res) => {
        const records = history?.listByTask(req.params.task) ?? []
        if (records.length === 0) {
            res.status(404).json({ status: "error", message: `No builds recorded for '${req.params.task}'` })
            return
        }
        res.json({ task: req.params.task, builds: records })
    })

    app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(error)
            return
        }
        const status =
            typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
                ? error.status
                : 500
        if (status >= 500) {
            logger.error("unhandled request error", error)
            res.status(status).json({ status: "error", message: "Internal server error", detail: describeError(error) })
            return
        }
        res.status(status).json({ status: "error", message: describeError(error) })
    })

    return app
}
