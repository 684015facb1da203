import { Agent, run, setDefaultOpenAIKey } from "@openai/agents"
import type { GenerativeModel } from "./contentGenerator.js"

/**
 * The slice of the SDK's run() this model uses.
 */
export type AgentRunner = (
    agent: Agent,
    input: string,
    options: { maxTurns: number; signal?: AbortSignal },
) => Promise<{ finalOutput?: string }>

export interface OpenAiAgentModelOptions {
    apiKey: string
    model: string
    /**
     * For tests or alternative runners; defaults to the SDK's run().
     */
    runImplementation?: AgentRunner
}

/**
 * GenerativeModel backed by a single-turn agent from the OpenAI Agents SDK.
 */
export class OpenAiAgentModel implements GenerativeModel {
    readonly name: string
    private readonly agent: Agent
    private readonly runImplementation: AgentRunner

    constructor(options: OpenAiAgentModelOptions) {
        setDefaultOpenAIKey(options.apiKey)
        this.name = options.model
        this.runImplementation = options.runImplementation ?? run
        this.agent = new Agent({
            name: "Site Generator",
            model: options.model,
            instructions:
                "You generate static web applications and their documentation. Follow the output format requested in each prompt exactly.",
        })
    }

    async generate(prompt: string, signal?: AbortSignal): Promise<string> {
        const result = await this.runImplementation(this.agent, prompt, { maxTurns: 1, signal })
        const output = result.finalOutput ?? ""
        if (!output.trim()) {
            throw new Error(`${this.name} returned no output`)
        }
        return output
    }
}
