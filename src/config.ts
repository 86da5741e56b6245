import { readFileSync } from "fs";
import { Pool } from "pg";

import { ColumnDefinition, columnTypes } from "./projection/schema";
import { SourceRecord } from "./table-source";

export type ProjectorConfig = {
    pgStore?: string | Pool,
    pgSchema?: string,
    relation: string,
    columns: ColumnDefinition[],
    rows?: SourceRecord[],
    statementTimeoutMs?: number,
    idleTimeoutMillis?: number,
    origin?: string | string[]
};

export interface SchemaFile {
    schema?: string;
    relation: string;
    columns: ColumnDefinition[];
    rows?: SourceRecord[];
}

export function validateSqlName(name: string | undefined, what: string, fallback?: string): string {
    if (!name) {
        if (fallback) {
            return fallback;
        }
        throw new Error(`A ${what} name is required.`);
    }

    // https://www.postgresql.org/docs/current/sql-syntax-lexical.html#SQL-SYNTAX-IDENTIFIERS
    if (!/^[a-z_][a-z0-9_$]*$/.test(name)) {
        throw new Error(`Invalid ${what} name: ${name}. ${capitalize(what)} names must start with a lowercase letter or underscore, and contain only lowercase letters, numbers, underscores, and dollar signs.`);
    }

    return name;
}

export function loadSchemaFile(path: string): SchemaFile {
    let document: unknown;
    try {
        document = JSON.parse(readFileSync(path, "utf8"));
    }
    catch (e) {
        throw new Error(`Cannot read schema file ${path}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return parseSchemaFile(document, path);
}

export function parseSchemaFile(document: unknown, path: string): SchemaFile {
    const fail = (problem: string) => new Error(`Invalid schema file ${path}: ${problem}`);

    if (!isObject(document)) {
        throw fail("expected a JSON object.");
    }
    const { schema, relation, columns, rows } = document;
    if (schema !== undefined && typeof schema !== "string") {
        throw fail("\"schema\" must be a string.");
    }
    if (typeof relation !== "string") {
        throw fail("\"relation\" must be a string.");
    }
    if (!Array.isArray(columns)) {
        throw fail("\"columns\" must be an array.");
    }
    const definitions = columns.map((column: unknown, index): ColumnDefinition => {
        if (!isObject(column) || typeof column.name !== "string") {
            throw fail(`column ${index} must have a string "name".`);
        }
        const declared = column.type;
        const type = columnTypes.find(t => t === declared);
        if (!type) {
            throw fail(`column "${column.name}" must have a "type" of ${columnTypes.join(", ")}.`);
        }
        return { name: column.name, type };
    });
    if (rows !== undefined && !(Array.isArray(rows) && rows.every(isObject))) {
        throw fail("\"rows\" must be an array of objects.");
    }
    return { schema, relation, columns: definitions, rows };
}

/**
 * Read the server configuration from environment variables.
 * The schema file is resolved against the working directory.
 */
export function configFromEnvironment(env: NodeJS.ProcessEnv): ProjectorConfig {
    const schemaFile = loadSchemaFile(env.PROJECTOR_SCHEMA_FILE || "config/users.json");
    const origin = env.PROJECTOR_ALLOWED_ORIGIN;
    return {
        pgStore: env.PROJECTOR_POSTGRESQL || undefined,
        pgSchema: schemaFile.schema,
        relation: schemaFile.relation,
        columns: schemaFile.columns,
        rows: schemaFile.rows,
        statementTimeoutMs: parseMillis(env, "PROJECTOR_STATEMENT_TIMEOUT_MS"),
        idleTimeoutMillis: parseMillis(env, "POSTGRES_IDLE_TIMEOUT_MILLIS"),
        origin: origin && origin.includes(",")
            ? origin.split(",").map(o => o.trim())
            : origin
    };
}

function parseMillis(env: NodeJS.ProcessEnv, variable: string): number | undefined {
    const value = env[variable];
    if (value === undefined || value === "") {
        return undefined;
    }
    if (!/^\d+$/.test(value)) {
        throw new Error(`${variable} must be a whole number of milliseconds, but was "${value}".`);
    }
    return parseInt(value);
}

function isObject(value: unknown): value is { [key: string]: unknown } {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function capitalize(text: string) {
    return text.charAt(0).toUpperCase() + text.slice(1);
}
