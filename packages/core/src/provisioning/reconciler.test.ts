import test from 'node:test';
import assert from 'node:assert/strict';
import { errors } from '@opensearch-project/opensearch';
import { InMemoryClusterGateway, clusterResponseError } from '../testing/in-memory-gateway.js';
import { parseIndexDefinition } from './index-definition.js';
import { reconcileIndices } from './reconciler.js';

const alpha = parseIndexDefinition({
    index_name: 'alpha',
    settings: { number_of_shards: 1 },
    mappings: { properties: { title: { type: 'text' } } },
}, 'a.yaml');
const beta = parseIndexDefinition({ index_name: 'beta' }, 'b.yaml');
const gamma = parseIndexDefinition({ index_name: 'gamma' }, 'c.yaml');

test('creates absent indices and leaves existing ones alone', async () => {
    const gateway = new InMemoryClusterGateway().withIndex('beta');

    const results = await reconcileIndices([alpha, beta], gateway);

    assert.deepEqual(results, [
        { file: 'a.yaml', indexName: 'alpha', outcome: 'created' },
        { file: 'b.yaml', indexName: 'beta', outcome: 'already_exists' },
    ]);
    assert.deepEqual(gateway.callsTo('createIndex'), [{ method: 'createIndex', index: 'alpha' }]);
});

test('passes settings and mappings to the cluster verbatim', async () => {
    const gateway = new InMemoryClusterGateway();

    await reconcileIndices([alpha, beta], gateway);

    assert.deepEqual(gateway.indices.get('alpha')?.body, {
        settings: { number_of_shards: 1 },
        mappings: { properties: { title: { type: 'text' } } },
    });
    assert.deepEqual(gateway.indices.get('beta')?.body, {});
});

test('a second run reports every index as already existing', async () => {
    const gateway = new InMemoryClusterGateway();
    await reconcileIndices([alpha, beta], gateway);
    const createsAfterFirstRun = gateway.callsTo('createIndex').length;

    const rerun = await reconcileIndices([alpha, beta], gateway);

    assert.deepEqual(rerun.map((result) => result.outcome), ['already_exists', 'already_exists']);
    assert.equal(gateway.callsTo('createIndex').length, createsAfterFirstRun);
});

test('an unreachable cluster fails every definition as a connectivity error', async () => {
    const gateway = new InMemoryClusterGateway()
        .failOn('indexExists', new errors.ConnectionError('connect ECONNREFUSED 127.0.0.1:9200'));

    const results = await reconcileIndices([alpha, beta], gateway);

    assert.deepEqual(results, [
        {
            file: 'a.yaml',
            indexName: 'alpha',
            outcome: 'failed',
            errorKind: 'cluster_connectivity',
            errorDetail: 'ConnectionError: connect ECONNREFUSED 127.0.0.1:9200',
        },
        {
            file: 'b.yaml',
            indexName: 'beta',
            outcome: 'failed',
            errorKind: 'cluster_connectivity',
            errorDetail: 'ConnectionError: connect ECONNREFUSED 127.0.0.1:9200',
        },
    ]);
});

test('a rejected create fails only that definition and later ones are still created', async () => {
    const gateway = new InMemoryClusterGateway().failOn(
        'createIndex',
        clusterResponseError(400, 'mapper_parsing_exception', 'No handler for type [txt]'),
        'beta'
    );

    const results = await reconcileIndices([alpha, beta, gamma], gateway);

    assert.deepEqual(results.map((result) => result.outcome), ['created', 'failed', 'created']);
    assert.equal(results[1].errorKind, 'index_creation');
    assert.equal(results[1].errorDetail, 'HTTP 400 mapper_parsing_exception: No handler for type [txt]');
    assert.deepEqual([...gateway.indices.keys()], ['alpha', 'gamma']);
});

test('losing a create race to another client counts as already existing', async () => {
    const gateway = new InMemoryClusterGateway().failOn(
        'createIndex',
        clusterResponseError(400, 'resource_already_exists_exception', 'index [alpha/x1] already exists'),
        'alpha'
    );

    const results = await reconcileIndices([alpha], gateway);

    assert.deepEqual(results, [{ file: 'a.yaml', indexName: 'alpha', outcome: 'already_exists' }]);
});

test('nothing is called for an empty definition list', async () => {
    const gateway = new InMemoryClusterGateway();
    assert.deepEqual(await reconcileIndices([], gateway), []);
    assert.deepEqual(gateway.calls, []);
});
