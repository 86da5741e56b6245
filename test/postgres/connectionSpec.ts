import { ConnectionFactory } from "../../src/postgres/connection";
import { ProjectionCancelled } from "../../src/projection/errors";
import { FakePool, never } from "./fakePool";

describe("ConnectionFactory", () => {
    it("should release the client after success", async () => {
        const pool = new FakePool(() => Promise.resolve([{ n: 1 }]));
        const factory = new ConnectionFactory(pool);

        const rows = await factory.with(async connection => {
            const { rows } = await connection.query("SELECT 1 AS n", []);
            return rows;
        });

        expect(rows).toEqual([{ n: 1 }]);
        expect(pool.releases).toEqual([undefined]);
    });

    it("should release the client after failure", async () => {
        const pool = new FakePool(() => Promise.reject(new Error("relation \"users\" does not exist")));
        const factory = new ConnectionFactory(pool);

        await expect(factory.with(connection => connection.query("SELECT 1", [])))
            .rejects.toThrow("relation \"users\" does not exist");
        expect(pool.releases).toEqual([undefined]);
    });

    it("should not retry", async () => {
        const pool = new FakePool(() => Promise.reject(Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" })));
        const factory = new ConnectionFactory(pool);

        await expect(factory.with(connection => connection.query("SELECT 1", [])))
            .rejects.toThrow("connect ECONNREFUSED");
        expect(pool.connections).toBe(1);
        expect(pool.queries).toHaveLength(1);
    });

    it("should not connect when already aborted", async () => {
        const pool = new FakePool(() => Promise.resolve([]));
        const factory = new ConnectionFactory(pool);
        const controller = new AbortController();
        controller.abort();

        await expect(factory.with(connection => connection.query("SELECT 1", []), controller.signal))
            .rejects.toBeInstanceOf(ProjectionCancelled);
        expect(pool.connections).toBe(0);
    });

    it("should destroy the client when aborted during a query", async () => {
        const pool = new FakePool(() => never());
        const factory = new ConnectionFactory(pool);
        const controller = new AbortController();

        const result = factory.with(connection => connection.query("SELECT pg_sleep(60)", []), controller.signal);
        await waitFor(() => pool.queries.length === 1);
        controller.abort();

        await expect(result).rejects.toBeInstanceOf(ProjectionCancelled);
        expect(pool.releases).toEqual([true]);
    });

    it("should release normally when the signal never fires", async () => {
        const pool = new FakePool(() => Promise.resolve([]));
        const factory = new ConnectionFactory(pool);
        const controller = new AbortController();

        await factory.with(connection => connection.query("SELECT 1", []), controller.signal);
        controller.abort();

        expect(pool.releases).toEqual([undefined]);
    });
});

async function waitFor(condition: () => boolean) {
    while (!condition()) {
        await new Promise(resolve => setImmediate(resolve));
    }
}
