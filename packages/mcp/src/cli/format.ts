import type { ToolResponse } from "../tools/types.js";

export interface CliWriters {
    writeStdout: (text: string) => void;
    writeStderr: (text: string) => void;
}

export interface StructuredEnvelopeSummary {
    status: string;
    reason?: string;
}

export function emitJson(writers: CliWriters, payload: unknown): void {
    writers.writeStdout(`${JSON.stringify(payload, null, 2)}\n`);
}

export function emitError(writers: CliWriters, token: string, message: string): void {
    writers.writeStderr(`${token} ${message}\n`);
}

export function firstTextContent(result: ToolResponse): string | null {
    const firstText = result.content.find((entry) => entry.type === "text");
    return firstText ? firstText.text : null;
}

/**
 * Read `status` and `reason` out of a JSON envelope. Plain-text results
 * (argument validation, unknown tool) have no envelope and yield null.
 */
export function parseStructuredEnvelope(result: ToolResponse): StructuredEnvelopeSummary | null {
    const text = firstTextContent(result);
    if (!text) {
        return null;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    if (typeof parsed !== "object" || parsed === null || !("status" in parsed) || typeof parsed.status !== "string") {
        return null;
    }
    const reason = "reason" in parsed && typeof parsed.reason === "string" ? parsed.reason : undefined;
    return reason === undefined ? { status: parsed.status } : { status: parsed.status, reason };
}

export function emitToolResult(writers: CliWriters, format: "json" | "text", result: ToolResponse): void {
    if (format === "json") {
        emitJson(writers, result);
        return;
    }
    const text = firstTextContent(result) ?? "";
    writers.writeStdout(text.endsWith("\n") ? text : `${text}\n`);
}

/**
 * 0 for a clean result, 1 when the tool reported an error or a partial batch.
 */
export function exitCodeForToolResult(result: ToolResponse): number {
    if (result.isError) {
        return 1;
    }
    const envelope = parseStructuredEnvelope(result);
    if (envelope && envelope.status !== "ok") {
        return 1;
    }
    return 0;
}
