import { z } from 'zod';
import { MAX_INDEX_NAME_BYTES } from '../config/defaults.js';
import { CreateIndexBody, JsonObject } from '../cluster/types.js';

export interface FieldDefinition {
    type?: string;
    properties?: Record<string, FieldDefinition>;
    fields?: Record<string, FieldDefinition>;
    [option: string]: unknown;
}

export interface IndexSpec {
    readonly name: string;
    readonly settings?: Readonly<JsonObject>;
    readonly mappings?: Readonly<JsonObject>;
    readonly sourceFile: string;
}

const FORBIDDEN_INDEX_NAME_CHARS = /[\\/*?"<>|,#: ]/;

/**
 * Returns why `name` is not usable as an OpenSearch index name, or null when it is.
 */
export function indexNameViolation(name: string): string | null {
    if (name.length === 0) {
        return 'index name must not be empty';
    }
    if (name === '.' || name === '..') {
        return `index name must not be '${name}'`;
    }
    if (name !== name.toLowerCase()) {
        return 'index name must be lowercase';
    }
    if (/^[-_+]/.test(name)) {
        return "index name must not start with '-', '_' or '+'";
    }
    const forbidden = FORBIDDEN_INDEX_NAME_CHARS.exec(name);
    if (forbidden) {
        return `index name must not contain '${forbidden[0]}'`;
    }
    if (Buffer.byteLength(name, 'utf8') > MAX_INDEX_NAME_BYTES) {
        return `index name must not exceed ${MAX_INDEX_NAME_BYTES} bytes`;
    }
    return null;
}

export const IndexNameSchema = z.string().superRefine((value, ctx) => {
    const violation = indexNameViolation(value);
    if (violation) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: violation });
    }
});

export const FieldDefinitionSchema: z.ZodType<FieldDefinition, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        type: z.string().min(1).optional(),
        properties: z.record(z.string(), FieldDefinitionSchema).optional(),
        fields: z.record(z.string(), FieldDefinitionSchema).optional(),
    }).passthrough()
);

const MappingsSchema = z.object({
    properties: z.record(z.string(), FieldDefinitionSchema).optional(),
}).passthrough();

export const IndexDefinitionFileSchema = z.object({
    index_name: IndexNameSchema,
    settings: z.record(z.string(), z.unknown()).optional(),
    mappings: MappingsSchema.optional(),
}).passthrough();

export type IndexDefinitionFile = z.infer<typeof IndexDefinitionFileSchema>;

export function formatDefinitionIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const key = issue.path.length > 0 ? issue.path.join('.') : 'document';
            return `${key}: ${issue.message}`;
        })
        .join('; ');
}

/**
 * Validate a parsed definition document. Settings and mappings are carried
 * through untouched: validation only rejects, it never rewrites.
 */
export function parseIndexDefinition(document: unknown, sourceFile: string): IndexSpec {
    if (!isJsonObject(document)) {
        throw new Error('definition must be a mapping with an index_name key');
    }
    const parsed = IndexDefinitionFileSchema.safeParse(document);
    if (!parsed.success) {
        throw new Error(formatDefinitionIssues(parsed.error));
    }

    const { settings, mappings } = document;
    const spec: IndexSpec = {
        name: parsed.data.index_name,
        sourceFile,
        ...(isJsonObject(settings) ? { settings: Object.freeze({ ...settings }) } : {}),
        ...(isJsonObject(mappings) ? { mappings: Object.freeze({ ...mappings }) } : {}),
    };
    return Object.freeze(spec);
}

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toCreateIndexBody(spec: IndexSpec): CreateIndexBody {
    const body: CreateIndexBody = {};
    if (spec.settings) {
        body.settings = { ...spec.settings };
    }
    if (spec.mappings) {
        body.mappings = { ...spec.mappings };
    }
    return body;
}
