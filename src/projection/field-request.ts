import { InvalidRequest, UnknownField } from "./errors";
import { ColumnBinding, FieldValue, Schema } from "./schema";

export type FieldRequest = readonly string[];

export type FilterInput = { [field: string]: unknown };

/**
 * One result record. Keys follow the order of the distinct requested fields.
 */
export type ProjectedRow = { [field: string]: FieldValue };

export type ResultSet = ProjectedRow[];

export interface Condition {
    column: ColumnBinding;
    value: FieldValue;
}

export interface ValidatedRequest {
    columns: ColumnBinding[];
    conditions: Condition[];
}

/**
 * Resolve a field request and optional filters against the schema.
 * Unknown names from both are reported together in a single UnknownField.
 * Duplicate fields collapse onto their first occurrence.
 */
export function validateRequest(schema: Schema, fields: unknown, filters?: FilterInput): ValidatedRequest {
    const requested = checkFieldList(fields);
    const unknown: string[] = [];

    const columns: ColumnBinding[] = [];
    for (const name of distinctFields(requested)) {
        const column = schema.lookup(name);
        if (column) {
            columns.push(column);
        }
        else {
            unknown.push(name);
        }
    }

    const filterColumns: [ColumnBinding, unknown][] = [];
    for (const [name, value] of Object.entries(filters ?? {})) {
        const column = schema.lookup(name);
        if (column) {
            filterColumns.push([column, value]);
        }
        else if (!unknown.includes(name)) {
            unknown.push(name);
        }
    }

    if (unknown.length > 0) {
        throw new UnknownField(unknown);
    }

    const conditions = filterColumns.map(([column, value]) => ({
        column,
        value: column.coerce(value)
    }));
    return { columns, conditions };
}

export function distinctFields(fields: FieldRequest): string[] {
    return [...new Set(fields)];
}

function checkFieldList(fields: unknown): string[] {
    if (fields === null || fields === undefined) {
        throw new InvalidRequest("A list of fields is required.");
    }
    if (!Array.isArray(fields)) {
        throw new InvalidRequest("Fields must be a list of names.");
    }
    if (fields.length === 0) {
        throw new InvalidRequest("At least one field must be requested.");
    }
    const names: string[] = [];
    for (const field of fields) {
        if (typeof field !== "string") {
            throw new InvalidRequest(`Field names must be strings, but received ${JSON.stringify(field)}.`);
        }
        names.push(field);
    }
    return names;
}

/**
 * Parse the `fields` query parameter. Accepts the comma-separated form,
 * the repeated-parameter form, or a mix of both.
 * Whitespace around each name is trimmed and empty segments are dropped;
 * order and duplicates are kept.
 */
export function parseFieldList(input: unknown): string[] {
    if (input === undefined) {
        return [];
    }
    const values = Array.isArray(input) ? input : [input];
    const fields: string[] = [];
    for (const value of values) {
        if (typeof value !== "string") {
            throw new InvalidRequest("The fields parameter must be a comma-separated list of names.");
        }
        for (const segment of value.split(",")) {
            const name = segment.trim();
            if (name.length > 0) {
                fields.push(name);
            }
        }
    }
    return fields;
}

/**
 * Parse the `filter` query parameter, as Express delivers `filter[age]=30`.
 */
export function parseFilters(input: unknown): FilterInput {
    if (input === undefined) {
        return {};
    }
    if (typeof input !== "object" || input === null || Array.isArray(input)) {
        throw new InvalidRequest("Filters must be given as filter[field]=value.");
    }
    const filters: FilterInput = {};
    for (const [name, value] of Object.entries(input)) {
        if (typeof value !== "string") {
            throw new InvalidRequest(`The filter on ${JSON.stringify(name)} must have a single value.`);
        }
        filters[name] = value;
    }
    return filters;
}
