import type { Server } from "node:http"
import { loadConfig, type AppConfig } from "./config.js"
import { ConfigError } from "./errors.js"
import { createLogger } from "./jobLogger.js"
import { loadEnv } from "./loadEnv.js"
import { createServer } from "./server.js"
import { createServices } from "./services.js"

export async function main() {
    loadEnv()
    const logger = createLogger("siteforge")

    let config: AppConfig
    try {
        config = loadConfig()
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(error.message)
            process.exit(1)
            return
        }
        throw error
    }

    const { orchestrator, store } = createServices(config, logger)
    const app = createServer({ appSecret: config.appSecret, orchestrator, history: store, logger })

    const server: Server = app.listen(config.server.port, config.server.host, () => {
        logger.info(`listening on http://${config.server.host}:${config.server.port}`)
        logger.info(`model ${config.openai.model}, publishing as ${config.github.username}`)
    })

    let stopping = false
    const stop = (signal: NodeJS.Signals) => {
        if (stopping) return
        stopping = true
        logger.info(`${signal} received, shutting down (${orchestrator.activeJobs()} job(s) in flight)`)
        server.close()
        orchestrator
            .shutdown()
            .then(() => {
                store.close()
                logger.info("shutdown complete")
            })
            .catch((error: unknown) => {
                logger.error("shutdown failed", error)
                process.exitCode = 1
            })
    }

    process.on("SIGINT", stop)
    process.on("SIGTERM", stop)
}

main().catch((error) => {
    console.error("siteforge failed to start:", error)
    process.exit(1)
})
