import { Handler } from "express";
import { Trace } from "jinaga";
import { Pool } from "pg";

import { ProjectorConfig, validateSqlName } from "./config";
import { HttpRouter } from "./http/router";
import { MemoryTableSource } from "./memory/memory-table-source";
import { tracePool } from "./postgres/connection";
import { PostgresTableSource } from "./postgres/postgres-table-source";
import { FieldProjector } from "./projection/field-projector";
import { createSchema } from "./projection/schema";
import { TableSource } from "./table-source";

export type ProjectorServerInstance = {
    handler: Handler,
    projector: FieldProjector,
    close: () => Promise<void>
};

export class ProjectorServer {
    static create(config: ProjectorConfig): ProjectorServerInstance {
        const pools: Pool[] = [];
        const schema = createSchema(config.columns);
        const pgSchema = validateSqlName(config.pgSchema, "schema", "public");
        const relation = validateSqlName(config.relation, "relation");
        const source = createSource(config, pgSchema, relation, pools);
        const projector = new FieldProjector(schema, source);
        const router = new HttpRouter(projector, config.origin || '*');

        async function close() {
            for (const pool of pools) {
                await pool.end();
            }
        }
        return {
            handler: router.handler,
            projector,
            close
        };
    }
}

function createSource(config: ProjectorConfig, pgSchema: string, relation: string, pools: Pool[]): TableSource {
    const pgStore = config.pgStore;
    if (typeof pgStore === 'string' && pgStore) {
        const pool = createPool(pgStore, config);
        pools.push(pool);
        return new PostgresTableSource(pool, pgSchema, relation);
    }
    else if (pgStore && typeof pgStore !== 'string') {
        return new PostgresTableSource(pgStore, pgSchema, relation);
    }
    else {
        Trace.warn(`No Postgres connection configured. Serving ${relation} from memory.`);
        return new MemoryTableSource(config.rows);
    }
}

export function createPool(postgresUri: string, config: Pick<ProjectorConfig, 'statementTimeoutMs' | 'idleTimeoutMillis'>): Pool {
    const postgresPool = new Pool({
        connectionString: postgresUri,
        idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
        statement_timeout: config.statementTimeoutMs
    });

    tracePool(postgresPool);

    return postgresPool;
}
