#!/usr/bin/env node

import { installConsoleToStderrPatch } from "./server/stdio-safety.js";
import { OpenSearchMcpServer, startMcpServerFromEnv } from "./server/start-server.js";

// Stdout carries MCP frames only.
installConsoleToStderrPatch();

let activeServer: OpenSearchMcpServer | null = null;
let shuttingDown = false;

async function handleShutdownSignal(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;

    console.error(`Received ${signal}, shutting down gracefully...`);
    try {
        if (activeServer) {
            await activeServer.shutdown();
        }
    } catch (error) {
        console.error('Error during graceful shutdown:', error);
    } finally {
        process.exit(0);
    }
}

process.on('SIGINT', () => {
    void handleShutdownSignal('SIGINT');
});

process.on('SIGTERM', () => {
    void handleShutdownSignal('SIGTERM');
});

startMcpServerFromEnv()
    .then((server) => {
        activeServer = server;
    })
    .catch((error) => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
