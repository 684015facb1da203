import type { Attachment, FileMap } from "./buildTypes.js"
import { decodeAttachments } from "./attachments.js"
import { ContentValidationError } from "./errors.js"
import type { Logger } from "./jobLogger.js"
import { buildCodeGenerationPrompt, buildReadmePrompt } from "./prompts.js"
import { cleanMarkdownResponse, parseFileMapResponse } from "./responseParser.js"
import { retryOrThrow, type RetryPolicy, type Sleep } from "./retry.js"

/**
 * Narrow seam over the language model: prompt in, text out.
 */
export interface GenerativeModel {
    readonly name: string
    generate(prompt: string, signal?: AbortSignal): Promise<string>
}

export interface StepContext {
    logger: Logger
    signal?: AbortSignal
}

export interface ContentGeneratorOptions {
    model: GenerativeModel
    /**
     * Account hosting the sites, used for the demo link in the README.
     */
    account: string
    maxAttempts?: number
    sleep?: Sleep
}

/**
 * Model calls use their own simple schedule: 1s, 2s, 4s... capped at 32s, no jitter.
 */
export function modelRetryPolicy(maxAttempts: number): RetryPolicy {
    return { maxAttempts, initialDelayMs: 1_000, maxDelayMs: 32_000, jitterRatio: 0 }
}

export function pagesUrlFor(account: string, repoName: string): string {
    return `https://${account}.github.io/${repoName}/`
}

export class ContentGenerator {
    private readonly model: GenerativeModel
    private readonly account: string
    private readonly policy: RetryPolicy
    private readonly sleep?: Sleep

    constructor(options: ContentGeneratorOptions) {
        this.model = options.model
        this.account = options.account
        this.policy = modelRetryPolicy(options.maxAttempts ?? 3)
        this.sleep = options.sleep
    }

    async generateAppCode(
        brief: string,
        checks: readonly string[],
        attachments: readonly Attachment[],
        ctx: StepContext,
    ): Promise<FileMap> {
        const logger = ctx.logger.child("model")
        const decoded = decodeAttachments(attachments, logger)
        const prompt = buildCodeGenerationPrompt(brief, checks, decoded)

        const response = await this.invoke(prompt, "generate app code", ctx)
        const files = parseFileMapResponse(response)
        logger.info(`parsed ${Object.keys(files).length} file(s): ${Object.keys(files).join(", ")}`)
        return files
    }

    async generateReadme(
        taskId: string,
        brief: string,
        checks: readonly string[],
        files: FileMap,
        ctx: StepContext,
    ): Promise<string> {
        const prompt = buildReadmePrompt({
            taskId,
            brief,
            checks,
            files: Object.keys(files),
            demoUrl: pagesUrlFor(this.account, taskId),
            modelName: this.model.name,
        })

        const readme = cleanMarkdownResponse(await this.invoke(prompt, "generate README", ctx))
        if (!readme) {
            throw new ContentValidationError("README generation returned empty text")
        }
        ctx.logger.child("model").info(`README generated (${readme.length} chars)`)
        return readme
    }

    private invoke(prompt: string, label: string, ctx: StepContext): Promise<string> {
        return retryOrThrow(
            async () => {
                const text = await this.model.generate(prompt, ctx.signal)
                if (!text.trim()) {
                    throw new Error("model returned an empty response")
                }
                return text
            },
            this.policy,
            {
                label,
                logger: ctx.logger.child("model"),
                isRetryable: () => true,
                sleep: this.sleep,
                signal: ctx.signal,
            },
        )
    }
}
