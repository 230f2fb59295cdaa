export { EnvManager, envManager, defaultEnvFilePath } from './utils/env-manager.js';
export type { EnvManagerOptions } from './utils/env-manager.js';
export * from './config/defaults.js';

// Cluster boundary
export type {
    JsonObject,
    CreateIndexBody,
    BulkDocument,
    BulkItemFailure,
    BulkIndexSummary,
    ClusterGateway,
} from './cluster/types.js';
export { classifyClusterError, isResourceAlreadyExistsError } from './cluster/errors.js';
export type { ClusterErrorCategory, ClassifiedClusterError } from './cluster/errors.js';
export {
    OpenSearchGateway,
    buildClientOptions,
    buildBulkOperations,
    summarizeBulkResponse,
} from './cluster/opensearch-gateway.js';
export type { OpenSearchConnectionConfig } from './cluster/opensearch-gateway.js';

// Provisioning
export {
    indexNameViolation,
    IndexNameSchema,
    parseIndexDefinition,
    toCreateIndexBody,
} from './provisioning/index-definition.js';
export type { IndexSpec, FieldDefinition } from './provisioning/index-definition.js';
export { ConfigDirectoryError, listDefinitionFiles, loadIndexDefinitions } from './provisioning/loader.js';
export type { DefinitionParseFailure, LoadedDefinitions } from './provisioning/loader.js';
export { reconcileIndices } from './provisioning/reconciler.js';
export type {
    ReconciliationResult,
    ReconciliationOutcome,
    ReconciliationErrorKind,
} from './provisioning/reconciler.js';
export { configureIndices, isProvisioningClean, resolveConfigDir } from './provisioning/configure.js';
export type { ConfigureIndicesOptions, ProvisioningReport } from './provisioning/configure.js';
