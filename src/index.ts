export * from "./config";
export * from "./http/router";
export * from "./memory/memory-table-source";
export * from "./postgres/connection";
export * from "./postgres/postgres-table-source";
export * from "./postgres/projection-sql";
export * from "./projection/errors";
export * from "./projection/field-projector";
export * from "./projection/field-request";
export * from "./projection/schema";
export * from "./projector-server";
export * from "./table-source";
