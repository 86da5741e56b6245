import { FieldValue, quoteIdentifier } from "../projection/schema";
import { SelectRequest } from "../table-source";

export interface ProjectionSqlQuery {
    sql: string;
    parameters: FieldValue[];
}

/**
 * Build the projection query for one relation.
 * Only column bindings from the schema are written into the text;
 * filter values are passed as parameters.
 */
export function projectionSql(schema: string, relation: string, request: Pick<SelectRequest, "columns" | "conditions">): ProjectionSqlQuery {
    if (request.columns.length === 0) {
        throw new Error("A projection must select at least one column.");
    }
    const columns = request.columns
        .map(column => column.sqlName)
        .join(", ");
    const whereClauses = request.conditions
        .map((condition, index) => `${condition.column.sqlName} = $${index + 1}`)
        .join(" AND ");
    const where = whereClauses.length > 0 ? ` WHERE ${whereClauses}` : "";
    const sql = `SELECT ${columns} FROM ${quoteIdentifier(schema)}.${quoteIdentifier(relation)}${where}`;
    return {
        sql,
        parameters: request.conditions.map(condition => condition.value)
    };
}
