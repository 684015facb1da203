import type { Attachment, DecodedAttachment } from "./buildTypes.js"
import { describeError } from "./errors.js"
import type { Logger } from "./jobLogger.js"

const DEFAULT_MIME_TYPE = "text/plain"

function parseDataUri(url: string): { mimeType: string; content: string } {
    const comma = url.indexOf(",")
    if (comma === -1) {
        throw new Error("data URI has no ',' separator")
    }

    const header = url.slice("data:".length, comma)
    const payload = url.slice(comma + 1)
    const params = header.split(";").map((part) => part.trim())
    const mimeType = params[0] || DEFAULT_MIME_TYPE
    const isBase64 = params.slice(1).some((param) => param.toLowerCase() === "base64")

    if (isBase64) {
        return { mimeType, content: Buffer.from(payload, "base64").toString("utf8") }
    }
    return { mimeType, content: decodePercentEscapes(payload) }
}

// a stray '%' (as in "100% done") is literal text, not an escape
function decodePercentEscapes(payload: string): string {
    try {
        return decodeURIComponent(payload)
    } catch (error) {
        if (error instanceof URIError) return payload
        throw error
    }
}

/**
 * Turn one attachment into prompt-ready text. Never throws: anything that cannot be
 * decoded becomes a placeholder so the build keeps going.
 */
export function decodeAttachment(attachment: Attachment, logger?: Logger): DecodedAttachment {
    const { name, url } = attachment

    if (!url.startsWith("data:")) {
        return { name, content: `[External URL: ${url}]`, mimeType: DEFAULT_MIME_TYPE }
    }

    try {
        const { mimeType, content } = parseDataUri(url)
        logger?.info(`decoded attachment ${name} (${mimeType})`)
        return { name, content, mimeType }
    } catch (error) {
        logger?.warn(`failed to decode attachment ${name}: ${describeError(error)}`)
        return {
            name,
            content: `[Failed to decode: ${describeError(error)}]`,
            mimeType: DEFAULT_MIME_TYPE,
        }
    }
}

export function decodeAttachments(attachments: readonly Attachment[], logger?: Logger): DecodedAttachment[] {
    return attachments.map((attachment) => decodeAttachment(attachment, logger))
}
