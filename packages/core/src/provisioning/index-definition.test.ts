import test from 'node:test';
import assert from 'node:assert/strict';
import { indexNameViolation, parseIndexDefinition, toCreateIndexBody } from './index-definition.js';

test('indexNameViolation accepts ordinary lowercase names', () => {
    assert.equal(indexNameViolation('books-2024.v1'), null);
});

test('indexNameViolation explains each rejected name', () => {
    assert.equal(indexNameViolation(''), 'index name must not be empty');
    assert.equal(indexNameViolation('..'), "index name must not be '..'");
    assert.equal(indexNameViolation('Books'), 'index name must be lowercase');
    assert.equal(indexNameViolation('_books'), "index name must not start with '-', '_' or '+'");
    assert.equal(indexNameViolation('books:old'), "index name must not contain ':'");
    assert.equal(indexNameViolation('my books'), "index name must not contain ' '");
    assert.equal(indexNameViolation('a'.repeat(256)), 'index name must not exceed 255 bytes');
});

test('parseIndexDefinition keeps settings and mappings verbatim', () => {
    const spec = parseIndexDefinition({
        index_name: 'books',
        settings: { number_of_shards: 2, 'index.refresh_interval': '5s' },
        mappings: {
            dynamic: 'strict',
            properties: {
                title: { type: 'text', fields: { raw: { type: 'keyword' } } },
                year: { type: 'integer' },
            },
        },
    }, 'configs/indices/books.yaml');

    assert.equal(spec.name, 'books');
    assert.equal(spec.sourceFile, 'configs/indices/books.yaml');
    assert.deepEqual(spec.settings, { number_of_shards: 2, 'index.refresh_interval': '5s' });
    assert.deepEqual(spec.mappings, {
        dynamic: 'strict',
        properties: {
            title: { type: 'text', fields: { raw: { type: 'keyword' } } },
            year: { type: 'integer' },
        },
    });
});

test('parseIndexDefinition requires index_name', () => {
    assert.throws(
        () => parseIndexDefinition({ settings: { number_of_shards: 1 } }, 'a.yaml'),
        { message: 'index_name: Required' }
    );
});

test('parseIndexDefinition reports invalid index names by key', () => {
    assert.throws(
        () => parseIndexDefinition({ index_name: 'Books' }, 'a.yaml'),
        { message: 'index_name: index name must be lowercase' }
    );
});

test('parseIndexDefinition rejects documents that are not mappings', () => {
    for (const document of [null, 'books', ['books']]) {
        assert.throws(
            () => parseIndexDefinition(document, 'a.yaml'),
            { message: 'definition must be a mapping with an index_name key' }
        );
    }
});

test('toCreateIndexBody only includes the sections that were declared', () => {
    const bare = parseIndexDefinition({ index_name: 'logs' }, 'logs.yaml');
    assert.deepEqual(toCreateIndexBody(bare), {});

    const mapped = parseIndexDefinition({
        index_name: 'logs',
        mappings: { properties: { message: { type: 'text' } } },
    }, 'logs.yaml');
    assert.deepEqual(toCreateIndexBody(mapped), {
        mappings: { properties: { message: { type: 'text' } } },
    });
});
