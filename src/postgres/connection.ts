import { Trace } from "jinaga";
import { Pool } from "pg";

import { ProjectionCancelled } from "../projection/errors";

export type Row = { [column: string]: unknown };

/**
 * The part of a pooled pg client that the projector uses.
 * `release(true)` destroys the connection instead of returning it to the pool.
 */
export interface PooledConnection {
    query(text: string, values: unknown[]): Promise<{ rows: Row[] }>;
    release(destroy?: boolean): void;
}

export interface ConnectionPool {
    connect(): Promise<PooledConnection>;
}

export class ConnectionFactory {
    constructor (private pool: ConnectionPool) {
    }

    /**
     * Run the callback on a client of its own. The client is released when
     * the callback settles. If the signal aborts first, the client is
     * destroyed, which ends the query in progress, and the call fails with
     * ProjectionCancelled.
     */
    async with<T>(callback: (connection: PooledConnection) => Promise<T>, signal?: AbortSignal): Promise<T> {
        if (signal?.aborted) {
            throw new ProjectionCancelled(signal.reason);
        }

        const connection = await this.pool.connect();
        if (signal) {
            return await this.withCancellation(connection, callback, signal);
        }
        try {
            return await callback(connection);
        }
        finally {
            connection.release();
        }
    }

    private async withCancellation<T>(connection: PooledConnection, callback: (connection: PooledConnection) => Promise<T>, signal: AbortSignal): Promise<T> {
        if (signal.aborted) {
            connection.release();
            throw new ProjectionCancelled(signal.reason);
        }

        let destroyed = false;
        let onAbort = () => { };
        const aborted = new Promise<never>((_, reject) => {
            onAbort = () => {
                destroyed = true;
                connection.release(true);
                reject(new ProjectionCancelled(signal.reason));
            };
        });
        signal.addEventListener("abort", onAbort, { once: true });

        try {
            return await Promise.race([callback(connection), aborted]);
        }
        finally {
            signal.removeEventListener("abort", onAbort);
            if (!destroyed) {
                connection.release();
            }
        }
    }
}

export function tracePool(pool: Pool) {
    pool.on('error', (err) => {
        Trace.error(err);
    });
}
