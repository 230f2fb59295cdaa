export type CliErrorToken = "E_USAGE" | "E_UNKNOWN_TOOL" | "E_TOOL_ERROR" | "E_INTERNAL";

export class CliError extends Error {
    public readonly token: CliErrorToken;
    public readonly exitCode: number;

    constructor(token: CliErrorToken, message: string, exitCode: number) {
        super(message);
        this.name = "CliError";
        this.token = token;
        this.exitCode = exitCode;
    }
}

export function asCliError(error: unknown): CliError {
    if (error instanceof CliError) {
        return error;
    }
    if (error instanceof Error) {
        return new CliError("E_INTERNAL", error.message, 3);
    }
    return new CliError("E_INTERNAL", String(error), 3);
}
