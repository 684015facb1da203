import assert from "node:assert/strict"
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { test } from "node:test"
import { loadEnv, parseEnvFile, type EnvTarget } from "../src/loadEnv.js"

test("parseEnvFile handles comments, export, quotes and inline comments", () => {
    const content = [
        "# service settings",
        "",
        "APP_SECRET=test-secret",
        "export GITHUB_USERNAME=octo-dev",
        'LICENSE_AUTHOR="Octo Dev"',
        'GREETING="line one\\nline two"',
        "RAW='keep \\n as is'",
        "PORT=8000 # local only",
        "URL=https://example.com/#anchor",
        "=missing-key",
        "1BAD=value",
        "no assignment here",
    ].join("\n")

    assert.deepEqual(parseEnvFile(content), [
        { key: "APP_SECRET", value: "test-secret" },
        { key: "GITHUB_USERNAME", value: "octo-dev" },
        { key: "LICENSE_AUTHOR", value: "Octo Dev" },
        { key: "GREETING", value: "line one\nline two" },
        { key: "RAW", value: "keep \\n as is" },
        { key: "PORT", value: "8000" },
        { key: "URL", value: "https://example.com/#anchor" },
    ])
})

test("loadEnv fills missing keys and leaves existing ones alone", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "siteforge-env-"))
    const envFile = path.join(dir, ".env")
    fs.writeFileSync(envFile, "APP_SECRET=from-file\r\nGITHUB_TOKEN=test-token\r\n")
    const target: EnvTarget = { APP_SECRET: "from-process" }

    try {
        const applied = loadEnv(envFile, target)

        assert.deepEqual(applied, ["GITHUB_TOKEN"])
        assert.deepEqual(target, { APP_SECRET: "from-process", GITHUB_TOKEN: "test-token" })
    } finally {
        fs.rmSync(dir, { recursive: true, force: true })
    }
})

test("loadEnv ignores a missing file", () => {
    const target: EnvTarget = {}

    assert.deepEqual(loadEnv(path.join(os.tmpdir(), "siteforge-no-such-dir", ".env"), target), [])
    assert.deepEqual(target, {})
})
