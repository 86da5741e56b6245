import { DataSourceError, InvalidRequest } from "./errors";

export type ColumnType = "integer" | "number" | "string" | "boolean" | "timestamp";

export const columnTypes: readonly ColumnType[] = ["integer", "number", "string", "boolean", "timestamp"];

export type FieldValue = string | number | boolean | null;

export interface ColumnDefinition {
    name: string;
    type: ColumnType;
}

/**
 * Accessor for one known column, built once when the schema is created.
 * Requests are resolved to bindings by name; nothing outside the schema
 * ever reaches query text.
 */
export interface ColumnBinding {
    readonly name: string;
    readonly type: ColumnType;
    readonly position: number;
    readonly sqlName: string;

    /** Convert a value as stored to the column's semantic type. */
    read(raw: unknown): FieldValue;

    /** Convert a caller-supplied filter value to the column's semantic type. */
    coerce(input: unknown): FieldValue;
}

export interface Schema {
    readonly columns: readonly ColumnDefinition[];
    lookup(name: string): ColumnBinding | undefined;
}

const identifierPattern = /^[A-Za-z_][A-Za-z0-9_]*$/;
// Assigning this key on a plain object replaces its prototype instead of adding a field.
const reservedNames = ["__proto__"];
const integerPattern = /^-?\d+$/;
const numericPattern = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export function createSchema(definitions: readonly ColumnDefinition[]): Schema {
    if (definitions.length === 0) {
        throw new Error("A schema must define at least one column.");
    }

    const bindings = new Map<string, ColumnBinding>();
    definitions.forEach((definition, position) => {
        const { name, type } = definition;
        if (!identifierPattern.test(name)) {
            throw new Error(`Invalid column name: ${JSON.stringify(name)}. Column names must start with a letter or underscore, and contain only letters, numbers, and underscores.`);
        }
        if (reservedNames.includes(name)) {
            throw new Error(`Invalid column name: ${JSON.stringify(name)}. This name is reserved.`);
        }
        if (!columnTypes.includes(type)) {
            throw new Error(`Column '${name}' has unsupported type '${type}'. Supported types are: ${columnTypes.join(", ")}.`);
        }
        if (bindings.has(name)) {
            throw new Error(`Duplicate column name: '${name}'.`);
        }
        bindings.set(name, createBinding(name, type, position));
    });

    const columns = Object.freeze(definitions.map(({ name, type }) => Object.freeze({ name, type })));
    return {
        columns,
        lookup: name => bindings.get(name)
    };
}

export function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

function createBinding(name: string, type: ColumnType, position: number): ColumnBinding {
    return Object.freeze({
        name,
        type,
        position,
        sqlName: quoteIdentifier(name),
        read: (raw: unknown) => readValue(name, type, raw),
        coerce: (input: unknown) => coerceValue(name, type, input)
    });
}

function readValue(name: string, type: ColumnType, raw: unknown): FieldValue {
    if (raw === null || raw === undefined) {
        return null;
    }
    const value = convert(type, raw);
    if (value === undefined) {
        throw new DataSourceError(`Column '${name}' returned a value that is not a valid ${type}.`);
    }
    return value;
}

function coerceValue(name: string, type: ColumnType, input: unknown): FieldValue {
    if (input === null || input === undefined) {
        throw new InvalidRequest(`A filter on '${name}' must have a value.`);
    }
    const value = typeof input === "string" && type === "boolean"
        ? parseBoolean(input)
        : convert(type, input);
    if (value === undefined) {
        throw new InvalidRequest(`The filter value for '${name}' is not a valid ${type}.`);
    }
    return value;
}

// Returns undefined when the value does not fit the type.
function convert(type: ColumnType, value: unknown): FieldValue | undefined {
    switch (type) {
        case "integer":
            if (typeof value === "number") {
                return Number.isSafeInteger(value) ? value : undefined;
            }
            if (typeof value === "string" && integerPattern.test(value)) {
                const parsed = Number(value);
                return Number.isSafeInteger(parsed) ? parsed : undefined;
            }
            return undefined;
        case "number":
            if (typeof value === "number") {
                return Number.isFinite(value) ? value : undefined;
            }
            if (typeof value === "string" && numericPattern.test(value)) {
                const parsed = Number(value);
                return Number.isFinite(parsed) ? parsed : undefined;
            }
            return undefined;
        case "string":
            return typeof value === "string" ? value : undefined;
        case "boolean":
            return typeof value === "boolean" ? value : undefined;
        case "timestamp":
            if (value instanceof Date) {
                return isNaN(value.getTime()) ? undefined : value.toISOString();
            }
            if (typeof value === "string") {
                return parseTimestamp(value);
            }
            return undefined;
    }
}

function parseBoolean(value: string): boolean | undefined {
    if (value === "true") {
        return true;
    }
    if (value === "false") {
        return false;
    }
    return undefined;
}

function parseTimestamp(value: string): string | undefined {
    const date = new Date(value);
    return isNaN(date.getTime()) ? undefined : date.toISOString();
}
