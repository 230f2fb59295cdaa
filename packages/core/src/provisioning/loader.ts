import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseDocument } from 'yaml';
import { INDEX_DEFINITION_EXTENSIONS } from '../config/defaults.js';
import { IndexSpec, parseIndexDefinition } from './index-definition.js';

export interface DefinitionParseFailure {
    file: string;
    errorKind: 'file_parse';
    errorDetail: string;
}

export interface LoadedDefinitions {
    configDir: string;
    scanned: string[];
    specs: IndexSpec[];
    failures: DefinitionParseFailure[];
}

export class ConfigDirectoryError extends Error {
    public readonly configDir: string;

    constructor(configDir: string, message: string) {
        super(message);
        this.name = 'ConfigDirectoryError';
        this.configDir = configDir;
    }
}

const compareFileNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function isDefinitionFile(fileName: string): boolean {
    return INDEX_DEFINITION_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

function isDefinitionEntry(configDir: string, entry: fs.Dirent): boolean {
    if (entry.isFile()) {
        return true;
    }
    if (!entry.isSymbolicLink()) {
        return false;
    }
    // Mounted config volumes are symlinks. A dangling one is kept and fails when read.
    const target = fs.statSync(path.join(configDir, entry.name), { throwIfNoEntry: false });
    return target === undefined || target.isFile();
}

export function listDefinitionFiles(configDir: string): string[] {
    let stat: fs.Stats;
    try {
        stat = fs.statSync(configDir);
    } catch {
        throw new ConfigDirectoryError(configDir, `Configuration directory '${configDir}' does not exist`);
    }
    if (!stat.isDirectory()) {
        throw new ConfigDirectoryError(configDir, `Configuration path '${configDir}' is not a directory`);
    }

    return fs.readdirSync(configDir, { withFileTypes: true })
        .filter((entry) => isDefinitionFile(entry.name) && isDefinitionEntry(configDir, entry))
        .map((entry) => entry.name)
        .sort(compareFileNames)
        .map((name) => path.join(configDir, name));
}

export function readIndexDefinition(filePath: string): IndexSpec {
    const source = fs.readFileSync(filePath, 'utf8');
    const document = parseDocument(source, { prettyErrors: false, merge: true });
    if (document.errors.length > 0) {
        throw new Error(`invalid YAML: ${document.errors[0].message}`);
    }
    return parseIndexDefinition(document.toJS(), filePath);
}

/**
 * Read every definition file in `configDir`, in file-name order.
 *
 * A bad file is reported in `failures` and skipped; only an unusable
 * directory aborts the load.
 */
export function loadIndexDefinitions(configDir: string): LoadedDefinitions {
    const files = listDefinitionFiles(configDir);
    const specs: IndexSpec[] = [];
    const failures: DefinitionParseFailure[] = [];
    const claimedBy = new Map<string, string>();

    for (const file of files) {
        let spec: IndexSpec;
        try {
            spec = readIndexDefinition(file);
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            console.error(`[PROVISION] Skipping ${file}: ${detail}`);
            failures.push({ file, errorKind: 'file_parse', errorDetail: detail });
            continue;
        }

        const firstFile = claimedBy.get(spec.name);
        if (firstFile !== undefined) {
            const detail = `index_name '${spec.name}' is already declared in ${path.basename(firstFile)}`;
            console.error(`[PROVISION] Skipping ${file}: ${detail}`);
            failures.push({ file, errorKind: 'file_parse', errorDetail: detail });
            continue;
        }

        claimedBy.set(spec.name, file);
        specs.push(spec);
    }

    console.log(`[PROVISION] Loaded ${specs.length} index definition(s) from ${configDir} (${failures.length} rejected)`);
    return { configDir, scanned: files, specs, failures };
}
