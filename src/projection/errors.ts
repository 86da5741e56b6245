export type ProjectionErrorKind =
    | "InvalidRequest"
    | "UnknownField"
    | "DataSourceError"
    | "ProjectionCancelled";

export abstract class ProjectionError extends Error {
    abstract readonly kind: ProjectionErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The caller's input is malformed: a missing or empty field list,
 * a field name that is not a string, or a filter value that does not
 * fit its column.
 */
export class InvalidRequest extends ProjectionError {
    readonly kind = "InvalidRequest";
}

/**
 * One or more requested names are not columns of the schema.
 * `fields` holds every unrecognized name, in request order, without repeats.
 */
export class UnknownField extends ProjectionError {
    readonly kind = "UnknownField";

    constructor(readonly fields: string[]) {
        super(`Unknown field${fields.length === 1 ? "" : "s"}: ${fields.map(f => JSON.stringify(f)).join(", ")}`);
    }
}

/**
 * The data source could not answer: it was unreachable, the query failed,
 * or a stored value did not fit its declared column type.
 */
export class DataSourceError extends ProjectionError {
    readonly kind = "DataSourceError";
}

export class ProjectionCancelled extends ProjectionError {
    readonly kind = "ProjectionCancelled";

    constructor(reason?: unknown) {
        super("The projection was cancelled", { cause: reason });
    }
}

export type AnyProjectionError =
    | InvalidRequest
    | UnknownField
    | DataSourceError
    | ProjectionCancelled;

export function isProjectionError(error: unknown): error is AnyProjectionError {
    return error instanceof ProjectionError;
}
