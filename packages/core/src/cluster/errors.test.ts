import test from 'node:test';
import assert from 'node:assert/strict';
import { errors } from '@opensearch-project/opensearch';
import { classifyClusterError, isResourceAlreadyExistsError } from './errors.js';

function responseError(statusCode: number, body: unknown, message = 'Response Error'): Error {
    return Object.assign(new Error(message), { name: 'ResponseError', statusCode, body });
}

test('client connection errors are classified as connectivity failures', () => {
    const classified = classifyClusterError(new errors.ConnectionError('connect ECONNREFUSED 127.0.0.1:9200'));
    assert.equal(classified.category, 'connectivity');
    assert.equal(classified.detail, 'ConnectionError: connect ECONNREFUSED 127.0.0.1:9200');
});

test('raw socket error codes are classified as connectivity failures', () => {
    const socketError = Object.assign(new Error('getaddrinfo ENOTFOUND search.internal'), { code: 'ENOTFOUND' });
    assert.equal(classifyClusterError(socketError).category, 'connectivity');
});

test('response errors report status, exception type and reason', () => {
    const classified = classifyClusterError(responseError(400, {
        error: {
            root_cause: [{ type: 'mapper_parsing_exception', reason: 'No handler for type [txt]' }],
            type: 'mapper_parsing_exception',
            reason: 'Failed to parse mapping: No handler for type [txt]',
        },
        status: 400,
    }));

    assert.deepEqual(classified, {
        category: 'response',
        detail: 'HTTP 400 mapper_parsing_exception: Failed to parse mapping: No handler for type [txt]',
        statusCode: 400,
        errorType: 'mapper_parsing_exception',
    });
});

test('response errors without a structured body fall back to the message', () => {
    const classified = classifyClusterError(responseError(503, 'Service Unavailable', 'cluster busy'));
    assert.equal(classified.detail, 'HTTP 503: cluster busy');
});

test('non-error throwables are described as unexpected', () => {
    assert.deepEqual(classifyClusterError({ reason: 'weird' }), {
        category: 'unexpected',
        detail: '{"reason":"weird"}',
    });
    assert.equal(classifyClusterError(new Error('boom')).detail, 'boom');
});

test('isResourceAlreadyExistsError matches the create-race rejection only', () => {
    const raced = responseError(400, {
        error: { type: 'resource_already_exists_exception', reason: 'index [alpha/abc] already exists' },
    });
    const rejected = responseError(400, {
        error: { type: 'illegal_argument_exception', reason: 'unknown setting' },
    });

    assert.equal(isResourceAlreadyExistsError(raced), true);
    assert.equal(isResourceAlreadyExistsError(rejected), false);
});
