import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { ClusterGateway, OpenSearchGateway, classifyClusterError } from "opensearch-mcp-core";
import {
    EnvLookup,
    OpenSearchMcpConfig,
    createMcpConfig,
    logConfigurationSummary,
    showHelpMessage,
} from "../config.js";
import { ClusterToolHandlers } from "../core/handlers.js";
import { ToolContext } from "../tools/types.js";
import { ToolRegistry, createToolRegistry } from "../tools/registry.js";

export interface StartMcpServerOptions {
    args?: string[];
    env?: EnvLookup;
}

function describeHealth(health: unknown): string {
    if (typeof health !== "object" || health === null) {
        return "reachable";
    }
    const name = "cluster_name" in health && typeof health.cluster_name === "string" ? `'${health.cluster_name}' ` : "";
    const status = "status" in health && typeof health.status === "string" ? health.status : "unknown";
    return `${name}reachable (status: ${status})`;
}

/**
 * One health probe after the transport is up. Failures are logged, never thrown.
 */
export async function probeClusterOnStartup(gateway: ClusterGateway): Promise<void> {
    try {
        const health = await gateway.clusterHealth();
        console.log(`[STARTUP] Cluster ${describeHealth(health)}`);
    } catch (error) {
        const classified = classifyClusterError(error);
        console.warn(`[STARTUP] Cluster health probe failed (${classified.category}): ${classified.detail}`);
    }
}

export class OpenSearchMcpServer {
    private readonly server: Server;
    private readonly registry: ToolRegistry;
    private readonly gateway: ClusterGateway;
    private readonly toolContext: ToolContext;

    constructor(config: OpenSearchMcpConfig, gateway: ClusterGateway, registry: ToolRegistry) {
        this.server = new Server(
            {
                name: config.name,
                version: config.version,
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.gateway = gateway;
        this.registry = registry;
        this.toolContext = {
            config,
            toolHandlers: new ClusterToolHandlers(gateway, { defaultConfigDir: config.indexConfigDir }),
        };

        this.setupTools();
    }

    private setupTools(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => {
            return {
                tools: this.registry.toMcpToolList(this.toolContext),
            };
        });

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            return this.registry.call(name, args || {}, this.toolContext);
        });
    }

    async start(): Promise<void> {
        console.log("[MCP] Starting OpenSearch MCP server...");

        const transport = new StdioServerTransport();
        await this.server.connect(transport);

        console.log(`[MCP] Server started and listening on stdio with ${this.registry.names.length} tools.`);
        void probeClusterOnStartup(this.gateway);
    }

    async shutdown(): Promise<void> {
        console.log("[MCP] Shutting down OpenSearch MCP server...");
        await this.server.close();
    }
}

function isHelpRequested(args: string[]): boolean {
    return args.includes("--help") || args.includes("-h");
}

export async function startMcpServerFromEnv(options: StartMcpServerOptions = {}): Promise<OpenSearchMcpServer | null> {
    const args = options.args ?? process.argv.slice(2);

    if (isHelpRequested(args)) {
        showHelpMessage();
        return null;
    }

    const config = createMcpConfig(options.env);
    logConfigurationSummary(config);

    const gateway = OpenSearchGateway.fromConfig(config.opensearch);
    const server = new OpenSearchMcpServer(config, gateway, createToolRegistry());
    await server.start();
    return server;
}
