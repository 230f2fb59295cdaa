#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ClusterGateway, OpenSearchGateway } from "opensearch-mcp-core";
import { EnvLookup, createMcpConfig } from "../config.js";
import { ClusterToolHandlers } from "../core/handlers.js";
import { installConsoleToStderrPatch } from "../server/stdio-safety.js";
import { ToolRegistry, createToolRegistry } from "../tools/registry.js";
import { ToolContext, ToolResponse } from "../tools/types.js";
import { parseCliArgs, resolveRawArguments } from "./args.js";
import type { ParsedCommand } from "./args.js";
import { asCliError, CliError } from "./errors.js";
import {
    CliWriters,
    emitError,
    emitJson,
    emitToolResult,
    exitCodeForToolResult,
    firstTextContent,
    parseStructuredEnvelope,
} from "./format.js";

const STDIN_TIMEOUT_MS = 30000;

export interface RunCliOptions {
    writeStdout?: (text: string) => void;
    writeStderr?: (text: string) => void;
    stdin?: NodeJS.ReadableStream;
    env?: EnvLookup;
    gateway?: ClusterGateway;
    registry?: ToolRegistry;
}

function readPackageVersion(): string {
    const currentFile = fileURLToPath(import.meta.url);
    const packagePath = path.resolve(path.dirname(currentFile), "..", "..", "package.json");
    if (!fs.existsSync(packagePath)) {
        return "unknown";
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
        return parsed.version;
    }
    return "unknown";
}

function buildHelpPayload() {
    return {
        usage: "opensearch-mcp-cli <command>",
        commands: [
            "configure [--dir <path>]",
            "tools list",
            "tool call <toolName> --args-json '<json>'",
            "tool call <toolName> --args-json @-",
            "tool call <toolName> --args-file <path>",
            "version"
        ],
        globalFlags: [
            "--format json|text",
            "--debug"
        ],
        exitCodes: {
            0: "ok",
            1: "tool reported an error or a partial result",
            2: "usage error",
            3: "internal failure"
        }
    };
}

function buildToolContext(options: RunCliOptions): ToolContext {
    const config = createMcpConfig(options.env);
    const gateway = options.gateway ?? OpenSearchGateway.fromConfig(config.opensearch);
    return {
        config,
        toolHandlers: new ClusterToolHandlers(gateway, { defaultConfigDir: config.indexConfigDir }),
    };
}

function reportToolFailure(writers: CliWriters, result: ToolResponse): void {
    const envelope = parseStructuredEnvelope(result);
    if (envelope) {
        const reasonPart = envelope.reason ? ` reason=${envelope.reason}` : "";
        emitError(writers, "E_TOOL_ERROR", `status=${envelope.status}${reasonPart}`);
        return;
    }
    emitError(writers, "E_TOOL_ERROR", firstTextContent(result) || "tool call failed");
}

async function invokeTool(
    registry: ToolRegistry,
    toolName: string,
    args: Record<string, unknown>,
    ctx: ToolContext,
    writers: CliWriters,
    format: "json" | "text"
): Promise<number> {
    if (!registry.get(toolName)) {
        throw new CliError("E_UNKNOWN_TOOL", `Unknown tool '${toolName}'. Supported tools: ${registry.names.join(", ")}`, 2);
    }

    const result = await registry.call(toolName, args, ctx);
    emitToolResult(writers, format, result);

    const exitCode = exitCodeForToolResult(result);
    if (exitCode !== 0) {
        reportToolFailure(writers, result);
    }
    return exitCode;
}

async function runCommand(
    command: Exclude<ParsedCommand, { kind: "help" } | { kind: "version" }>,
    format: "json" | "text",
    writers: CliWriters,
    options: RunCliOptions
): Promise<number> {
    const registry = options.registry ?? createToolRegistry();
    const ctx = buildToolContext(options);

    switch (command.kind) {
        case "tools-list":
            emitJson(writers, { tools: registry.toMcpToolList(ctx) });
            return 0;
        case "configure": {
            const args = command.configDir === undefined ? {} : { config_dir: command.configDir };
            return invokeTool(registry, "configure_indices", args, ctx, writers, format);
        }
        case "tool-call": {
            const args = await resolveRawArguments(command.rawArgsMode, {
                stdin: options.stdin,
                stdinTimeoutMs: STDIN_TIMEOUT_MS,
            });
            return invokeTool(registry, command.toolName, args, ctx, writers, format);
        }
    }
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
    const writers: CliWriters = {
        writeStdout: options.writeStdout || ((text: string) => {
            process.stdout.write(text);
        }),
        writeStderr: options.writeStderr || ((text: string) => {
            process.stderr.write(text);
        }),
    };
    let parsedFormat: "json" | "text" = "json";
    let parsedCommandKind: ParsedCommand["kind"] | null = null;
    let restoreConsole: (() => void) | null = null;

    try {
        const parsed = parseCliArgs(argv);
        parsedFormat = parsed.globals.format;
        parsedCommandKind = parsed.command.kind;

        if (parsed.command.kind === "help") {
            emitJson(writers, buildHelpPayload());
            return 0;
        }

        if (parsed.command.kind === "version") {
            emitJson(writers, {
                name: "opensearch-mcp-server",
                cli: "opensearch-mcp-cli",
                version: readPackageVersion(),
            });
            return 0;
        }

        // Stdout carries command results only; diagnostics surface with --debug.
        restoreConsole = installConsoleToStderrPatch({
            writeToStderr: parsed.globals.debug ? writers.writeStderr : () => undefined,
        });

        return await runCommand(parsed.command, parsed.globals.format, writers, options);
    } catch (error) {
        const cliError = asCliError(error);
        if (parsedFormat === "json" && (parsedCommandKind === "tool-call" || parsedCommandKind === "configure")) {
            emitJson(writers, {
                isError: true,
                content: [{
                    type: "text",
                    text: `${cliError.token} ${cliError.message}`
                }],
                _meta: {
                    cliErrorToken: cliError.token,
                    exitCode: cliError.exitCode
                }
            });
        }
        emitError(writers, cliError.token, cliError.message);
        return cliError.exitCode;
    } finally {
        restoreConsole?.();
    }
}

async function main(): Promise<void> {
    const exitCode = await runCli(process.argv.slice(2));
    process.exit(exitCode);
}

function isExecutedDirectly(): boolean {
    return isExecutedDirectlyForPaths(import.meta.url, process.argv[1]);
}

export function isExecutedDirectlyForPaths(moduleUrl: string, entryPath: string | undefined): boolean {
    if (!entryPath) {
        return false;
    }
    const modulePath = path.resolve(fileURLToPath(moduleUrl));
    const invokedPath = path.resolve(entryPath);
    if (fs.existsSync(modulePath) && fs.existsSync(invokedPath)) {
        return fs.realpathSync(modulePath) === fs.realpathSync(invokedPath);
    }
    return modulePath === invokedPath;
}

if (isExecutedDirectly()) {
    void main();
}
