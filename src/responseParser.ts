import { z } from "zod"
import { ENTRY_POINT_FILE, type FileMap } from "./buildTypes.js"
import { ContentValidationError } from "./errors.js"

const FileMapSchema = z.record(z.string(), z.string())

const FENCE = "```"
// languages the model tags its answers with; only these are recognised on a one-line fence
const INLINE_FENCE_LANGUAGE = /^(?:json|html|markdown|md)(?![\w-])/i

/**
 * Remove one leading fence marker (with its optional language tag) and one trailing fence.
 */
export function stripCodeFence(text: string): string {
    let cleaned = text.trim()
    if (cleaned.startsWith(FENCE)) {
        const newline = cleaned.indexOf("\n")
        if (newline !== -1 && /^[\w+-]*\s*$/.test(cleaned.slice(FENCE.length, newline))) {
            cleaned = cleaned.slice(newline + 1)
        } else {
            cleaned = cleaned.slice(FENCE.length).replace(INLINE_FENCE_LANGUAGE, "")
        }
    }
    if (cleaned.endsWith(FENCE)) {
        cleaned = cleaned.slice(0, -FENCE.length)
    }
    return cleaned.trim()
}

/**
 * Find an HTML document inside free text: from `<!DOCTYPE html>` (or `<html`) through the last `</html>`.
 */
export function extractHtmlDocument(text: string): string | null {
    const doctype = text.search(/<!DOCTYPE html/i)
    const start = doctype !== -1 ? doctype : text.search(/<html[\s>]/i)
    if (start === -1) return null

    const rest = text.slice(start)
    const end = rest.toLowerCase().lastIndexOf("</html>")
    return end === -1 ? rest.trim() : rest.slice(0, end + "</html>".length)
}

/**
 * Make sure the map has the entry-point file. A single `.html` file under another name is
 * promoted; zero or several candidates make the output unusable.
 */
export function ensureEntryPoint(files: FileMap, entryPoint: string = ENTRY_POINT_FILE): FileMap {
    if (Object.prototype.hasOwnProperty.call(files, entryPoint)) return files

    const candidates = Object.keys(files).filter((name) => name.toLowerCase().endsWith(".html"))
    if (candidates.length !== 1) {
        throw new ContentValidationError(
            candidates.length === 0
                ? `Generated code must include ${entryPoint}`
                : `Generated code must include ${entryPoint}; found ${candidates.length} other HTML files (${candidates.join(", ")})`,
        )
    }

    const [candidate] = candidates
    const promoted: FileMap = {}
    for (const [name, content] of Object.entries(files)) {
        promoted[name === candidate ? entryPoint : name] = content
    }
    return promoted
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
    try {
        return { ok: true, value: JSON.parse(text) }
    } catch (error) {
        return { ok: false, message: error instanceof Error ? error.message : String(error) }
    }
}

/**
 * Model text -> validated FileMap.
 */
export function parseFileMapResponse(response: string): FileMap {
    const cleaned = stripCodeFence(response)
    const parsed = tryParseJson(cleaned)

    if (!parsed.ok) {
        const html = extractHtmlDocument(response)
        if (html) {
            return { [ENTRY_POINT_FILE]: html }
        }
        throw new ContentValidationError(`Failed to parse code from model response: ${parsed.message}`)
    }

    const files = FileMapSchema.safeParse(parsed.value)
    if (!files.success) {
        throw new ContentValidationError(
            "Model response must be a JSON object mapping file paths to string contents",
        )
    }

    return ensureEntryPoint(files.data)
}

export function cleanMarkdownResponse(response: string): string {
    return stripCodeFence(response)
}
