type ConsoleMethodName = "log" | "info" | "warn" | "error" | "debug";

const PATCHED_METHODS: readonly ConsoleMethodName[] = ["log", "info", "warn", "error", "debug"];

interface ConsolePatchOptions {
    writeToStderr?: (text: string) => void;
}

function toLogString(value: unknown): string {
    if (typeof value === "string") {
        return value;
    }
    if (value instanceof Error) {
        return value.stack || value.message;
    }
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

function ensureTrailingNewline(value: string): string {
    return value.endsWith("\n") ? value : `${value}\n`;
}

/**
 * Route every console method to stderr. Stdout belongs to the protocol
 * (MCP frames for the server, JSON results for the CLI).
 * Returns a function that restores the original methods.
 */
export function installConsoleToStderrPatch(options: ConsolePatchOptions = {}): () => void {
    const writeToStderr = options.writeToStderr || ((text: string) => {
        process.stderr.write(text);
    });
    const original = new Map<ConsoleMethodName, (...args: unknown[]) => void>();

    for (const method of PATCHED_METHODS) {
        original.set(method, console[method]);
        console[method] = (...args: unknown[]) => {
            writeToStderr(ensureTrailingNewline(args.map(toLogString).join(" ")));
        };
    }

    return () => {
        for (const [method, fn] of original) {
            console[method] = fn;
        }
    };
}
