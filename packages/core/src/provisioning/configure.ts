import { ClusterGateway } from '../cluster/types.js';
import { DefinitionParseFailure, loadIndexDefinitions } from './loader.js';
import { ReconciliationResult, reconcileIndices } from './reconciler.js';

export interface ConfigureIndicesOptions {
    /** Directory given by the caller; takes precedence over `defaultConfigDir`. */
    configDir?: string;
    defaultConfigDir: string;
    gateway: ClusterGateway;
}

export interface ProvisioningReport {
    configDir: string;
    scanned: number;
    created: number;
    alreadyExists: number;
    /** Reconciliation failures plus definition files that could not be parsed. */
    failed: number;
    results: ReconciliationResult[];
    parseFailures: DefinitionParseFailure[];
    message?: string;
}

export function resolveConfigDir(configDir: string | undefined, defaultConfigDir: string): string {
    const explicit = configDir?.trim();
    return explicit ? explicit : defaultConfigDir;
}

export function isProvisioningClean(report: ProvisioningReport): boolean {
    return report.failed === 0;
}

/**
 * Load the definitions in the resolved directory and create the indices that
 * are missing. Throws `ConfigDirectoryError` when the directory is unusable;
 * every other failure is reported per file.
 */
export async function configureIndices(options: ConfigureIndicesOptions): Promise<ProvisioningReport> {
    const configDir = resolveConfigDir(options.configDir, options.defaultConfigDir);
    console.log(`[PROVISION] Configuring indices from ${configDir}`);

    const loaded = loadIndexDefinitions(configDir);
    if (loaded.scanned.length === 0) {
        const message = `No index configuration files found in '${configDir}'`;
        console.log(`[PROVISION] ${message}`);
        return {
            configDir,
            scanned: 0,
            created: 0,
            alreadyExists: 0,
            failed: 0,
            results: [],
            parseFailures: [],
            message,
        };
    }

    const results = await reconcileIndices(loaded.specs, options.gateway);
    const count = (outcome: ReconciliationResult['outcome']) =>
        results.filter((result) => result.outcome === outcome).length;

    const report: ProvisioningReport = {
        configDir,
        scanned: loaded.scanned.length,
        created: count('created'),
        alreadyExists: count('already_exists'),
        failed: count('failed') + loaded.failures.length,
        results,
        parseFailures: loaded.failures,
    };

    console.log(
        `[PROVISION] Done: ${report.created} created, ${report.alreadyExists} already existed, ${report.failed} failed`
    );
    return report;
}
