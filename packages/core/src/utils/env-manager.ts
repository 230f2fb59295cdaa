import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parse as parseDotenv } from 'dotenv';

export interface EnvManagerOptions {
    env?: NodeJS.ProcessEnv;
    envFilePath?: string;
}

export function defaultEnvFilePath(): string {
    return path.join(os.homedir(), '.opensearch-mcp', '.env');
}

/**
 * Environment lookup with a user-level fallback file.
 *
 * Process environment always wins; `~/.opensearch-mcp/.env` fills in values
 * that are not exported, so the server can be launched from MCP clients that
 * do not forward a shell environment.
 */
export class EnvManager {
    private readonly env: NodeJS.ProcessEnv;
    private readonly envFilePath: string;
    private fileValues: Record<string, string> | null = null;

    constructor(options: EnvManagerOptions = {}) {
        this.env = options.env ?? process.env;
        this.envFilePath = options.envFilePath ?? defaultEnvFilePath();
    }

    get(name: string): string | undefined {
        const fromProcess = this.env[name];
        if (fromProcess !== undefined && fromProcess !== '') {
            return fromProcess;
        }
        const fromFile = this.loadFileValues()[name];
        return fromFile !== undefined && fromFile !== '' ? fromFile : undefined;
    }

    getEnvFilePath(): string {
        return this.envFilePath;
    }

    private loadFileValues(): Record<string, string> {
        if (this.fileValues) {
            return this.fileValues;
        }
        try {
            this.fileValues = parseDotenv(fs.readFileSync(this.envFilePath, 'utf8'));
        } catch (error: unknown) {
            if (!isMissingFileError(error)) {
                const message = error instanceof Error ? error.message : String(error);
                console.warn(`[ENV] Failed to read ${this.envFilePath}: ${message}`);
            }
            this.fileValues = {};
        }
        return this.fileValues;
    }
}

function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'code' in error
        && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export const envManager = new EnvManager();
