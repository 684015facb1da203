import { z } from "zod"
import type { BuildJob } from "./buildTypes.js"

export const AttachmentSchema = z.object({
    name: z.string().min(1).describe("Attachment filename"),
    url: z.string().min(1).describe("Attachment URL; may be a data: URI"),
})

export const BuildRequestSchema = z.object({
    email: z
        .string()
        .regex(/^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, "must be a valid email address"),
    secret: z.string().min(1),
    task: z
        .string()
        .min(1)
        .max(100)
        .regex(/^[a-zA-Z0-9_-]+$/, "may only contain letters, digits, '-' and '_'")
        .refine((task) => !task.startsWith("-") && !task.endsWith("-"), "cannot start or end with a hyphen")
        .refine((task) => !task.includes("__"), "cannot contain consecutive underscores")
        .describe("Unique task identifier, used as the repository name"),
    round: z.number().int().min(1).max(2),
    nonce: z.string().min(1),
    brief: z.string().min(10).max(5000),
    checks: z.array(z.string()).min(1),
    evaluation_url: z.string().url(),
    attachments: z.array(AttachmentSchema).default([]),
})

export type BuildRequest = z.infer<typeof BuildRequestSchema>

/**
 * Everything except the secret, which stays at the request boundary.
 */
export function toBuildJob(request: BuildRequest): BuildJob {
    return Object.freeze({
        email: request.email,
        task: request.task,
        round: request.round,
        nonce: request.nonce,
        brief: request.brief,
        checks: Object.freeze([...request.checks]),
        attachments: Object.freeze(request.attachments.map((attachment) => ({ ...attachment }))),
        evaluationUrl: request.evaluation_url,
    })
}
