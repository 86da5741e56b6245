import { Trace } from "jinaga";

import { TableSource } from "../table-source";
import { FilterInput, ProjectedRow, ResultSet, validateRequest } from "./field-request";
import { ColumnDefinition, Schema } from "./schema";

export interface ProjectOptions {
    filters?: FilterInput;
    signal?: AbortSignal;
}

/**
 * Selects caller-requested columns of one relation.
 *
 * Every requested name must be a column of the schema; otherwise the call
 * fails before any query runs. Rows come back in the source's order with
 * keys in the order the fields were first requested.
 */
export class FieldProjector {
    constructor(
        private schema: Schema,
        private source: TableSource
    ) {
    }

    describe(): readonly ColumnDefinition[] {
        return this.schema.columns;
    }

    project(fields: readonly string[], options: ProjectOptions = {}): Promise<ResultSet> {
        return Trace.dependency("project", describeFields(fields), async () => {
            const { columns, conditions } = validateRequest(this.schema, fields, options.filters);
            const records = await this.source.select({ columns, conditions, signal: options.signal });
            return records.map(record => {
                const row: ProjectedRow = {};
                for (const column of columns) {
                    row[column.name] = column.read(record[column.name]);
                }
                return row;
            });
        });
    }
}

function describeFields(fields: unknown): string {
    return Array.isArray(fields) ? fields.join(",") : "";
}
