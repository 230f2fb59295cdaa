import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import { parseCliArgs, parseJsonObject, resolveRawArguments } from "./args.js";
import { CliError } from "./errors.js";

function usageError(message: string) {
    return (error: unknown) => error instanceof CliError
        && error.token === "E_USAGE"
        && error.exitCode === 2
        && error.message === message;
}

test("parseCliArgs consumes leading --debug and --format as global flags", () => {
    const parsed = parseCliArgs(["--debug", "--format", "text", "tools", "list"]);
    assert.deepEqual(parsed, {
        globals: { format: "text", debug: true },
        command: { kind: "tools-list" }
    });
});

test("parseCliArgs does not treat post-command --debug as global", () => {
    assert.throws(
        () => parseCliArgs(["tools", "--debug", "list"]),
        usageError("Unsupported tools subcommand. Use: tools list")
    );
});

test("parseCliArgs rejects an unknown --format value", () => {
    assert.throws(
        () => parseCliArgs(["--format", "yaml", "tools", "list"]),
        usageError("--format must be one of: json, text.")
    );
});

test("parseCliArgs maps empty input and help flags to help", () => {
    assert.equal(parseCliArgs([]).command.kind, "help");
    assert.equal(parseCliArgs(["help"]).command.kind, "help");
    assert.equal(parseCliArgs(["configure", "--help"]).command.kind, "help");
    assert.equal(parseCliArgs(["-h"]).command.kind, "help");
});

test("parseCliArgs maps version and -v to version", () => {
    assert.equal(parseCliArgs(["version"]).command.kind, "version");
    assert.equal(parseCliArgs(["-v"]).command.kind, "version");
});

test("parseCliArgs reads configure with and without --dir", () => {
    assert.deepEqual(parseCliArgs(["configure"]).command, { kind: "configure" });
    assert.deepEqual(parseCliArgs(["configure", "--dir", "/etc/indices"]).command, {
        kind: "configure",
        configDir: "/etc/indices"
    });
});

test("parseCliArgs rejects configure arguments it does not know", () => {
    assert.throws(
        () => parseCliArgs(["configure", "--force"]),
        usageError("Unknown arguments for configure: --force")
    );
    assert.throws(
        () => parseCliArgs(["configure", "--dir"]),
        usageError("Missing value for --dir.")
    );
});

test("parseCliArgs reads tool call argument sources", () => {
    assert.deepEqual(parseCliArgs(["tool", "call", "list_indices"]).command, {
        kind: "tool-call",
        toolName: "list_indices",
        rawArgsMode: { kind: "none" }
    });
    assert.deepEqual(parseCliArgs(["tool", "call", "get_mapping", "--args-json", "{\"index\":\"books\"}"]).command, {
        kind: "tool-call",
        toolName: "get_mapping",
        rawArgsMode: { kind: "json", value: "{\"index\":\"books\"}" }
    });
    assert.deepEqual(parseCliArgs(["tool", "call", "get_mapping", "--args-json", "@-"]).command, {
        kind: "tool-call",
        toolName: "get_mapping",
        rawArgsMode: { kind: "stdin-json" }
    });
    assert.deepEqual(parseCliArgs(["tool", "call", "get_mapping", "--args-file", "args.json"]).command, {
        kind: "tool-call",
        toolName: "get_mapping",
        rawArgsMode: { kind: "file", path: "args.json" }
    });
});

test("parseCliArgs rejects malformed tool calls", () => {
    assert.throws(
        () => parseCliArgs(["tool", "call", "get_mapping", "--args-json", "{}", "--args-file", "a.json"]),
        usageError("Use only one of --args-json or --args-file.")
    );
    assert.throws(
        () => parseCliArgs(["tool", "call", "get_mapping", "--index", "books"]),
        usageError("Unknown arguments for tool call: --index books")
    );
    assert.throws(
        () => parseCliArgs(["tool", "call"]),
        usageError("Missing tool name. Use: tool call <toolName>")
    );
    assert.throws(
        () => parseCliArgs(["tool", "run", "x"]),
        usageError("Unsupported tool subcommand. Use: tool call <toolName>")
    );
    assert.throws(
        () => parseCliArgs(["search"]),
        usageError("Unsupported command 'search'.")
    );
});

test("parseJsonObject only accepts JSON objects", () => {
    assert.deepEqual(parseJsonObject("{\"index\":\"books\"}", "--args-json"), { index: "books" });
    assert.throws(
        () => parseJsonObject("[1,2]", "--args-json"),
        usageError("JSON from --args-json must be an object.")
    );
    assert.throws(
        () => parseJsonObject("{", "--args-file"),
        (error: unknown) => error instanceof CliError && error.message.startsWith("Invalid JSON from --args-file: ")
    );
});

test("resolveRawArguments reads an arguments file", async (t) => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-args-"));
    t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
    const argsPath = path.join(dir, "args.json");
    fs.writeFileSync(argsPath, "{\"index\":\"books\",\"id\":\"1\"}", "utf8");

    const args = await resolveRawArguments({ kind: "file", path: argsPath }, { stdinTimeoutMs: 1000 });
    assert.deepEqual(args, { index: "books", id: "1" });

    await assert.rejects(
        resolveRawArguments({ kind: "file", path: path.join(dir, "missing.json") }, { stdinTimeoutMs: 1000 }),
        usageError(`Arguments file not found: ${path.join(dir, "missing.json")}`)
    );
});

test("resolveRawArguments reads JSON from stdin", async () => {
    const stdin = new PassThrough();
    const pending = resolveRawArguments({ kind: "stdin-json" }, { stdin, stdinTimeoutMs: 1000 });
    stdin.end("{\"index\":\"books\"}");

    assert.deepEqual(await pending, { index: "books" });
});

test("resolveRawArguments rejects empty stdin", async () => {
    const stdin = new PassThrough();
    const pending = resolveRawArguments({ kind: "stdin-json" }, { stdin, stdinTimeoutMs: 1000 });
    stdin.end("  \n");

    await assert.rejects(pending, usageError("stdin was empty for --args-json @-."));
});
