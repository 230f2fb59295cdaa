import fs from "node:fs";
import { CliError } from "./errors.js";

export interface GlobalOptions {
    format: "json" | "text";
    debug: boolean;
}

export type RawArgsMode =
    | { kind: "none" }
    | { kind: "json"; value: string }
    | { kind: "file"; path: string }
    | { kind: "stdin-json" };

export type ParsedCommand =
    | { kind: "help" }
    | { kind: "version" }
    | { kind: "tools-list" }
    | { kind: "configure"; configDir?: string }
    | { kind: "tool-call"; toolName: string; rawArgsMode: RawArgsMode };

export interface ParsedCliInput {
    globals: GlobalOptions;
    command: ParsedCommand;
}

export interface ResolveRawArgsOptions {
    stdin?: NodeJS.ReadableStream;
    stdinTimeoutMs: number;
}

function parseGlobalOptions(argv: string[]): { globals: GlobalOptions; rest: string[] } {
    const globals: GlobalOptions = {
        format: "json",
        debug: false,
    };

    let i = 0;
    while (i < argv.length) {
        const token = argv[i];
        switch (token) {
            case "--format": {
                const next = argv[i + 1];
                if (next !== "json" && next !== "text") {
                    throw new CliError("E_USAGE", "--format must be one of: json, text.", 2);
                }
                globals.format = next;
                i += 2;
                break;
            }
            case "--debug": {
                globals.debug = true;
                i += 1;
                break;
            }
            default: {
                return {
                    globals,
                    rest: argv.slice(i),
                };
            }
        }
    }

    return { globals, rest: [] };
}

function parseRawArgsMode(args: string[]): { rawArgsMode: RawArgsMode; remaining: string[] } {
    let rawArgsMode: RawArgsMode = { kind: "none" };
    const remaining: string[] = [];

    for (let i = 0; i < args.length; i += 1) {
        const token = args[i];
        if (token === "--args-json" || token === "--args-file") {
            if (rawArgsMode.kind !== "none") {
                throw new CliError("E_USAGE", "Use only one of --args-json or --args-file.", 2);
            }
            const next = args[i + 1];
            if (!next) {
                throw new CliError("E_USAGE", `Missing value for ${token}.`, 2);
            }
            if (token === "--args-file") {
                rawArgsMode = { kind: "file", path: next };
            } else {
                rawArgsMode = next === "@-"
                    ? { kind: "stdin-json" }
                    : { kind: "json", value: next };
            }
            i += 1;
            continue;
        }
        remaining.push(token);
    }

    return { rawArgsMode, remaining };
}

function parseConfigureArgs(args: string[]): { configDir?: string } {
    let configDir: string | undefined;
    for (let i = 0; i < args.length; i += 1) {
        const token = args[i];
        if (token !== "--dir") {
            throw new CliError("E_USAGE", `Unknown arguments for configure: ${args.slice(i).join(" ")}`, 2);
        }
        const next = args[i + 1];
        if (!next || next.startsWith("--")) {
            throw new CliError("E_USAGE", "Missing value for --dir.", 2);
        }
        configDir = next;
        i += 1;
    }
    return configDir === undefined ? {} : { configDir };
}

export function parseCliArgs(argv: string[]): ParsedCliInput {
    const { globals, rest } = parseGlobalOptions(argv);
    if (rest.length === 0 || rest[0] === "help" || rest.includes("--help") || rest.includes("-h")) {
        return {
            globals,
            command: { kind: "help" }
        };
    }

    if (rest[0] === "version" || rest.includes("--version") || rest.includes("-v")) {
        return {
            globals,
            command: { kind: "version" }
        };
    }

    if (rest[0] === "tools") {
        if (rest.length === 2 && rest[1] === "list") {
            return {
                globals,
                command: { kind: "tools-list" }
            };
        }
        throw new CliError("E_USAGE", "Unsupported tools subcommand. Use: tools list", 2);
    }

    if (rest[0] === "configure") {
        return {
            globals,
            command: { kind: "configure", ...parseConfigureArgs(rest.slice(1)) }
        };
    }

    if (rest[0] === "tool") {
        if (rest[1] !== "call") {
            throw new CliError("E_USAGE", "Unsupported tool subcommand. Use: tool call <toolName>", 2);
        }
        const toolName = rest[2];
        if (!toolName || toolName.startsWith("--")) {
            throw new CliError("E_USAGE", "Missing tool name. Use: tool call <toolName>", 2);
        }
        const { rawArgsMode, remaining } = parseRawArgsMode(rest.slice(3));
        if (remaining.length > 0) {
            throw new CliError("E_USAGE", `Unknown arguments for tool call: ${remaining.join(" ")}`, 2);
        }
        return {
            globals,
            command: {
                kind: "tool-call",
                toolName,
                rawArgsMode
            }
        };
    }

    throw new CliError("E_USAGE", `Unsupported command '${rest[0]}'.`, 2);
}

function readStdin(stdin: NodeJS.ReadableStream, timeoutMs: number): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: string[] = [];
        let settled = false;

        const timeout = setTimeout(() => {
            if (settled) {
                return;
            }
            settled = true;
            reject(new CliError("E_USAGE", "Timed out while reading stdin JSON for --args-json @-.", 2));
        }, timeoutMs);
        timeout.unref();

        stdin.setEncoding("utf8");
        stdin.on("data", (chunk) => {
            chunks.push(String(chunk));
        });
        stdin.on("error", (error: Error) => {
            if (settled) {
                return;
            }
            settled = true;
            clearTimeout(timeout);
            reject(new CliError("E_USAGE", `Failed to read stdin: ${error.message}`, 2));
        });
        stdin.on("end", () => {
            if (settled) {
                return;
            }
            settled = true;
            clearTimeout(timeout);
            resolve(chunks.join(""));
        });
        stdin.resume();
    });
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonObject(value: string, source: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(value);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new CliError("E_USAGE", `Invalid JSON from ${source}: ${message}`, 2);
    }
    if (!isJsonObject(parsed)) {
        throw new CliError("E_USAGE", `JSON from ${source} must be an object.`, 2);
    }
    return parsed;
}

export async function resolveRawArguments(rawArgsMode: RawArgsMode, options: ResolveRawArgsOptions): Promise<Record<string, unknown>> {
    switch (rawArgsMode.kind) {
        case "none":
            return {};
        case "json":
            return parseJsonObject(rawArgsMode.value, "--args-json");
        case "file": {
            if (!fs.existsSync(rawArgsMode.path)) {
                throw new CliError("E_USAGE", `Arguments file not found: ${rawArgsMode.path}`, 2);
            }
            const content = fs.readFileSync(rawArgsMode.path, "utf8");
            return parseJsonObject(content, "--args-file");
        }
        case "stdin-json": {
            const text = await readStdin(options.stdin || process.stdin, options.stdinTimeoutMs);
            if (text.trim().length === 0) {
                throw new CliError("E_USAGE", "stdin was empty for --args-json @-.", 2);
            }
            return parseJsonObject(text, "--args-json @-");
        }
    }
}
