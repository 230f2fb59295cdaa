import test from 'node:test';
import assert from 'node:assert/strict';
import { EnvManager } from 'opensearch-mcp-core';
import { InMemoryClusterGateway } from 'opensearch-mcp-core/testing';
import { createMcpConfig } from '../config.js';
import { ClusterToolHandlers } from '../core/handlers.js';
import { ToolRegistry, createToolRegistry, toolList } from './registry.js';
import { ToolContext } from './types.js';

function buildContext(gateway = new InMemoryClusterGateway()): ToolContext {
    const config = createMcpConfig(new EnvManager({ env: {}, envFilePath: '/nonexistent/.env' }));
    return {
        config,
        toolHandlers: new ClusterToolHandlers(gateway, { defaultConfigDir: config.indexConfigDir }),
    };
}

const EXPECTED_TOOLS = [
    'list_indices',
    'get_mapping',
    'get_settings',
    'create_index',
    'delete_index',
    'configure_indices',
    'search_documents',
    'index_document',
    'delete_document',
    'bulk_index_documents',
    'get_cluster_health',
    'get_cluster_stats',
];

test('tool registry exposes every cluster tool in a fixed order', () => {
    assert.deepEqual(createToolRegistry().names, EXPECTED_TOOLS);
});

test('generated ListTools payload carries object schemas without draft metadata', () => {
    const list = createToolRegistry().toMcpToolList(buildContext());

    assert.deepEqual(list.map((tool) => tool.name), EXPECTED_TOOLS);
    for (const tool of list) {
        assert.equal(tool.inputSchema.type, 'object');
        assert.equal(Object.prototype.hasOwnProperty.call(tool.inputSchema, '$schema'), false);
        assert.equal(Object.prototype.hasOwnProperty.call(tool.inputSchema, 'definitions'), false);
    }
});

test('search_documents schema requires index and body', () => {
    const search = createToolRegistry().toMcpToolList(buildContext())
        .find((tool) => tool.name === 'search_documents');

    assert.ok(search);
    assert.deepEqual(search.inputSchema.required, ['index', 'body']);
});

test('bulk_index_documents schema requires a non-empty documents array', () => {
    const bulk = createToolRegistry().toMcpToolList(buildContext())
        .find((tool) => tool.name === 'bulk_index_documents');

    assert.ok(bulk);
    assert.deepEqual(bulk.inputSchema.required, ['index', 'documents']);
    assert.deepEqual(bulk.inputSchema.properties, {
        index: { type: 'string', minLength: 1, description: 'Name of the target index.' },
        documents: {
            type: 'array',
            items: { type: 'object', additionalProperties: {} },
            minItems: 1,
            description: 'Documents to index. A string or numeric "id" field is used as the document id.',
        },
    });
});

test('configure_indices description names the configured default directory', () => {
    const configure = createToolRegistry().toMcpToolList(buildContext())
        .find((tool) => tool.name === 'configure_indices');

    assert.ok(configure);
    assert.match(configure.description, /Default directory: configs\/indices$/);
});

test('calling an unknown tool lists the supported tools', async () => {
    const response = await createToolRegistry().call('drop_everything', {}, buildContext());

    assert.equal(response.isError, true);
    assert.equal(response.content[0]?.text, `Unknown tool: drop_everything. Supported tools: ${EXPECTED_TOOLS.join(', ')}`);
});

test('calling a known tool dispatches to its handler', async () => {
    const gateway = new InMemoryClusterGateway().withIndex('books');

    const response = await createToolRegistry().call('list_indices', {}, buildContext(gateway));

    assert.equal(response.isError, undefined);
    assert.deepEqual(gateway.calls, [{ method: 'listIndices' }]);
});

test('ToolRegistry rejects duplicate tool names', () => {
    assert.throws(() => new ToolRegistry([toolList[0], toolList[0]]), /Duplicate tool name 'list_indices'/);
});
