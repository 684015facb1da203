import { z } from "zod"
import { ConfigError } from "./errors.js"
import type { EnvTarget } from "./loadEnv.js"
import type { RetryPolicy } from "./retry.js"

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`)

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)

const EnvSchema = z.object({
    APP_SECRET: required("APP_SECRET"),
    GITHUB_TOKEN: required("GITHUB_TOKEN"),
    GITHUB_USERNAME: required("GITHUB_USERNAME"),
    GITHUB_API_URL: z.string().url().default("https://api.github.com"),
    LICENSE_AUTHOR: z.string().trim().optional(),
    OPENAI_API_KEY: required("OPENAI_API_KEY"),
    OPENAI_MODEL: z.string().trim().min(1).default("gpt-5.1"),
    MAX_RETRIES: positiveInt(5),
    INITIAL_RETRY_DELAY_MS: nonNegativeInt(1_000),
    MAX_RETRY_DELAY_MS: nonNegativeInt(60_000),
    MODEL_MAX_ATTEMPTS: positiveInt(3),
    PAGES_POLL_ATTEMPTS: nonNegativeInt(10),
    PAGES_POLL_INTERVAL_MS: nonNegativeInt(10_000),
    REPO_SETTLE_DELAY_MS: nonNegativeInt(2_000),
    JOB_TIMEOUT_MS: nonNegativeInt(540_000),
    HOST: z.string().default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
    BUILD_DB_PATH: z.string().trim().min(1).default("./builds.db"),
    BUILD_LOG_DIR: z.string().trim().optional(),
})

export interface AppConfig {
    appSecret: string
    github: {
        token: string
        username: string
        apiUrl: string
        licenseAuthor: string
    }
    openai: {
        apiKey: string
        model: string
        maxAttempts: number
    }
    retry: RetryPolicy
    pages: {
        pollAttempts: number
        pollIntervalMs: number
    }
    repoSettleDelayMs: number
    jobTimeoutMs: number
    server: {
        host: string
        port: number
    }
    buildDbPath: string
    buildLogDir: string | null
}

function emptyToUndefined(env: EnvTarget): EnvTarget {
    const cleaned: EnvTarget = {}
    for (const [key, value] of Object.entries(env)) {
        cleaned[key] = value === undefined || value.trim() === "" ? undefined : value
    }
    return cleaned
}

export function loadConfig(env: EnvTarget = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(emptyToUndefined(env))
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
        )
    }

    const e = parsed.data
    if (e.MAX_RETRY_DELAY_MS < e.INITIAL_RETRY_DELAY_MS) {
        throw new ConfigError(["MAX_RETRY_DELAY_MS: must not be lower than INITIAL_RETRY_DELAY_MS"])
    }

    return Object.freeze({
        appSecret: e.APP_SECRET,
        github: {
            token: e.GITHUB_TOKEN,
            username: e.GITHUB_USERNAME,
            apiUrl: e.GITHUB_API_URL,
            licenseAuthor: e.LICENSE_AUTHOR || e.GITHUB_USERNAME,
        },
        openai: {
            apiKey: e.OPENAI_API_KEY,
            model: e.OPENAI_MODEL,
            maxAttempts: e.MODEL_MAX_ATTEMPTS,
        },
        retry: {
            maxAttempts: e.MAX_RETRIES,
            initialDelayMs: e.INITIAL_RETRY_DELAY_MS,
            maxDelayMs: e.MAX_RETRY_DELAY_MS,
        },
        pages: {
            pollAttempts: e.PAGES_POLL_ATTEMPTS,
            pollIntervalMs: e.PAGES_POLL_INTERVAL_MS,
        },
        repoSettleDelayMs: e.REPO_SETTLE_DELAY_MS,
        jobTimeoutMs: e.JOB_TIMEOUT_MS,
        server: { host: e.HOST, port: e.PORT },
        buildDbPath: e.BUILD_DB_PATH,
        buildLogDir: e.BUILD_LOG_DIR || null,
    })
}
