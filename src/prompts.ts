import { ENTRY_POINT_FILE, type DecodedAttachment } from "./buildTypes.js"

function bulletList(items: readonly string[]): string {
    return items.map((item) => `- ${item}`).join("\n")
}

function renderAttachments(attachments: readonly DecodedAttachment[]): string {
    if (attachments.length === 0) {
        return "ATTACHMENTS: none"
    }

    const blocks = attachments.map((att) =>
        [`--- File: ${att.name} (Type: ${att.mimeType}) ---`, att.content, `--- End of ${att.name} ---`].join("\n"),
    )
    return ["ATTACHMENTS PROVIDED:", "", ...blocks].join("\n")
}

export function buildCodeGenerationPrompt(
    brief: string,
    checks: readonly string[],
    attachments: readonly DecodedAttachment[],
): string {
    return [
        "You are an experienced front-end developer. Build a complete static web application for the requirements below.",
        "",
        "PROJECT REQUIREMENTS:",
        brief,
        "",
        "EVALUATION CRITERIA (every one must pass):",
        bulletList(checks),
        "",
        renderAttachments(attachments),
        "",
        "RULES:",
        `1. The entry point MUST be named '${ENTRY_POINT_FILE}'.`,
        "2. Add further files (styles, scripts, JSON data) only when they help.",
        "3. Use the content of every attachment where the requirements refer to it.",
        "4. The site is served as static files from GitHub Pages: no server code, no build step, no npm.",
        "5. Third-party libraries may only be loaded from a CDN.",
        "6. The layout must work on mobile and desktop browsers.",
        "",
        "OUTPUT FORMAT:",
        "Reply with ONE valid JSON object whose keys are relative file paths and whose values are the full file contents, for example:",
        `{ "${ENTRY_POINT_FILE}": "<!DOCTYPE html>\\n<html>...</html>", "style.css": "body { ... }" }`,
        "Escape newlines and quotes properly. Do not write anything outside the JSON object.",
    ].join("\n")
}

export function buildReadmePrompt(params: {
    taskId: string
    brief: string
    checks: readonly string[]
    files: readonly string[]
    demoUrl: string
    modelName: string
}): string {
    const { taskId, brief, checks, files, demoUrl, modelName } = params

    return [
        "Write a professional README.md for the web application described below.",
        "",
        `PROJECT NAME: ${taskId}`,
        "",
        "DESCRIPTION:",
        brief,
        "",
        "FEATURES / REQUIREMENTS:",
        bulletList(checks),
        "",
        `FILES IN PROJECT: ${files.join(", ")}`,
        "",
        "Include these sections:",
        "1. Title and a short description",
        "2. Features",
        `3. Live demo: ${demoUrl}`,
        "4. Running locally (open the entry point in a browser)",
        "5. Usage",
        "6. Technology stack",
        "7. Project structure, listing every file above with one line each",
        "8. License: MIT",
        `9. Attribution: state that the project was generated with AI assistance using ${modelName}`,
        "",
        "Use clean Markdown. Reply with the README content only.",
    ].join("\n")
}
