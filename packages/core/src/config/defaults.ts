export const DEFAULT_INDEX_CONFIG_DIR = 'configs/indices';

export const INDEX_DEFINITION_EXTENSIONS = ['.yaml', '.yml'];

export const DEFAULT_OPENSEARCH_URL = 'https://localhost:9200';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_RETRIES = 3;

// OpenSearch rejects index names longer than this many UTF-8 bytes.
export const MAX_INDEX_NAME_BYTES = 255;
