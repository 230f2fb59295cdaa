import {
    DEFAULT_INDEX_CONFIG_DIR,
    DEFAULT_MAX_RETRIES,
    DEFAULT_OPENSEARCH_URL,
    DEFAULT_REQUEST_TIMEOUT_MS,
    OpenSearchConnectionConfig,
    envManager,
} from "opensearch-mcp-core";

export interface EnvLookup {
    get(name: string): string | undefined;
}

export interface OpenSearchMcpConfig {
    name: string;
    version: string;
    // Cluster connection
    opensearch: OpenSearchConnectionConfig;
    // Declarative provisioning
    indexConfigDir: string;
}

export const DEFAULT_SERVER_NAME = "OpenSearch MCP Server";
export const DEFAULT_SERVER_VERSION = "1.0.0";

function readPositiveInt(env: EnvLookup, name: string, fallback: number, allowZero = false): number {
    const raw = env.get(name);
    if (!raw) {
        return fallback;
    }
    const parsed = Number(raw.trim());
    const minimum = allowZero ? 0 : 1;
    if (Number.isInteger(parsed) && parsed >= minimum) {
        return parsed;
    }
    console.warn(`[WARN] Invalid ${name} value: ${raw}. Using default ${fallback}.`);
    return fallback;
}

function readBoolean(env: EnvLookup, name: string, fallback: boolean): boolean {
    const raw = env.get(name);
    if (!raw) {
        return fallback;
    }
    const normalized = raw.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) {
        return true;
    }
    if (['false', '0', 'no'].includes(normalized)) {
        return false;
    }
    console.warn(`[WARN] Invalid ${name} value: ${raw}. Using default ${fallback}.`);
    return fallback;
}

function readUrl(env: EnvLookup, name: string, fallback: string): string {
    const raw = env.get(name)?.trim();
    if (!raw) {
        return fallback;
    }
    const protocol = URL.canParse(raw) ? new URL(raw).protocol : null;
    if (protocol === 'http:' || protocol === 'https:') {
        return raw.replace(/\/+$/, '');
    }
    console.warn(`[WARN] Invalid ${name} value: ${raw}. Using default ${fallback}.`);
    return fallback;
}

export function createMcpConfig(env: EnvLookup = envManager): OpenSearchMcpConfig {
    return {
        name: env.get('MCP_SERVER_NAME') || DEFAULT_SERVER_NAME,
        version: env.get('MCP_SERVER_VERSION') || DEFAULT_SERVER_VERSION,
        opensearch: {
            url: readUrl(env, 'OPENSEARCH_URL', DEFAULT_OPENSEARCH_URL),
            username: env.get('OPENSEARCH_USERNAME'),
            password: env.get('OPENSEARCH_PASSWORD'),
            verifyCerts: readBoolean(env, 'OPENSEARCH_VERIFY_CERTS', true),
            requestTimeoutMs: readPositiveInt(env, 'OPENSEARCH_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
            maxRetries: readPositiveInt(env, 'OPENSEARCH_MAX_RETRIES', DEFAULT_MAX_RETRIES, true),
        },
        indexConfigDir: env.get('INDEX_CONFIG_DIR') || DEFAULT_INDEX_CONFIG_DIR,
    };
}

export function logConfigurationSummary(config: OpenSearchMcpConfig): void {
    const { opensearch } = config;
    console.log(`[MCP] Starting ${config.name}`);
    console.log(`[MCP] Configuration Summary:`);
    console.log(`[MCP]   Server: ${config.name} v${config.version}`);
    console.log(`[MCP]   OpenSearch URL: ${opensearch.url}`);
    console.log(`[MCP]   Basic Auth: ${opensearch.username && opensearch.password ? `configured (${opensearch.username})` : 'not configured'}`);
    if (opensearch.url.startsWith('https:')) {
        console.log(`[MCP]   TLS Verification: ${opensearch.verifyCerts ? 'enabled' : 'DISABLED'}`);
    }
    console.log(`[MCP]   Request Timeout: ${opensearch.requestTimeoutMs}ms, Max Retries: ${opensearch.maxRetries}`);
    console.log(`[MCP]   Index Config Dir: ${config.indexConfigDir}`);
}

export function showHelpMessage(): void {
    console.log(`
OpenSearch MCP Server

Usage: opensearch-mcp [options]

Options:
  --help, -h                          Show this help message

Environment Variables:
  MCP_SERVER_NAME                Server name (default: ${DEFAULT_SERVER_NAME})
  MCP_SERVER_VERSION             Server version (default: ${DEFAULT_SERVER_VERSION})

  Cluster Connection:
  OPENSEARCH_URL                 Cluster endpoint (default: ${DEFAULT_OPENSEARCH_URL})
  OPENSEARCH_USERNAME            Basic auth user name
  OPENSEARCH_PASSWORD            Basic auth password
  OPENSEARCH_VERIFY_CERTS        Verify TLS certificates for https endpoints (default: true)
  OPENSEARCH_REQUEST_TIMEOUT_MS  Per-request timeout in milliseconds (default: ${DEFAULT_REQUEST_TIMEOUT_MS})
  OPENSEARCH_MAX_RETRIES         Client retries on connection failures (default: ${DEFAULT_MAX_RETRIES})

  Provisioning:
  INDEX_CONFIG_DIR               Directory of YAML index definitions for configure_indices (default: ${DEFAULT_INDEX_CONFIG_DIR})

Values missing from the environment are also read from ~/.opensearch-mcp/.env.

Examples:
  # Local development cluster without TLS
  OPENSEARCH_URL=http://localhost:9200 opensearch-mcp

  # Secured cluster with a self-signed certificate
  OPENSEARCH_URL=https://search.local:9200 OPENSEARCH_USERNAME=admin OPENSEARCH_PASSWORD=change-me OPENSEARCH_VERIFY_CERTS=false opensearch-mcp
        `);
}
