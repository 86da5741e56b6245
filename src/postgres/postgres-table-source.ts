import { Trace } from "jinaga";

import { DataSourceError, ProjectionCancelled } from "../projection/errors";
import { SelectRequest, SourceRecord, TableSource } from "../table-source";
import { ConnectionFactory, ConnectionPool } from "./connection";
import { projectionSql } from "./projection-sql";

export class PostgresTableSource implements TableSource {
    private connectionFactory: ConnectionFactory;

    constructor (pool: ConnectionPool, private schema: string, private relation: string) {
        this.connectionFactory = new ConnectionFactory(pool);
    }

    async select(request: SelectRequest): Promise<SourceRecord[]> {
        const { sql, parameters } = projectionSql(this.schema, this.relation, request);
        try {
            return await this.connectionFactory.with(async connection => {
                const { rows } = await connection.query(sql, parameters);
                return rows;
            }, request.signal);
        }
        catch (e) {
            if (e instanceof ProjectionCancelled) {
                Trace.warn(`Projection on ${this.schema}.${this.relation} cancelled`);
                throw e;
            }
            Trace.error(`Postgres error on ${this.schema}.${this.relation}: ${describeError(e)}`);
            throw new DataSourceError(`Failed to read from ${this.schema}.${this.relation}.`, { cause: e });
        }
    }
}

function describeError(e: unknown) {
    if (e instanceof Error) {
        const code = "code" in e ? e.code : undefined;
        return JSON.stringify({ code, message: e.message });
    }
    return JSON.stringify({ message: String(e) });
}
