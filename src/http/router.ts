import { Handler, NextFunction, Request, Response, Router } from "express";
import { Trace } from "jinaga";

import { isProjectionError } from "../projection/errors";
import { FieldProjector } from "../projection/field-projector";
import { distinctFields, parseFieldList, parseFilters } from "../projection/field-request";
import { outputRows, RowFormat, rowFormats } from "./output-formatters";

export type AllowedOrigin = string | string[];

function getRows(projector: FieldProjector): Handler {
    return (req, res, next) => {
        const format = negotiateFormat(req);
        if (!format) {
            res.type("text");
            res.status(406).send(`Supported formats are ${rowFormats.join(", ")}.`);
            return;
        }

        // Abort the query if the client goes away before the response is written.
        const controller = new AbortController();
        const onClose = () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        };
        res.on("close", onClose);

        Promise.resolve()
            .then(() => {
                const fields = parseFieldList(req.query["fields"]);
                const filters = parseFilters(req.query["filter"]);
                return projector.project(fields, { filters, signal: controller.signal })
                    .then(rows => ({ fields, rows }));
            })
            .then(({ fields, rows }) => outputRows(rows, distinctFields(fields), res, format))
            .catch(error => {
                if (controller.signal.aborted) {
                    Trace.warn(`Client disconnected before rows were sent (Path: ${req.path})`);
                    return;
                }
                handleError(error, req, res);
            })
            .finally(() => res.off("close", onClose))
            .catch(next);
    };
}

function get<U>(method: () => Promise<U>): Handler {
    return (req, res, next) => {
        method()
            .then(response => {
                res.type("json");
                res.send(JSON.stringify(response));
            })
            .catch(error => {
                handleError(error, req, res);
            })
            .catch(next);
    };
}

function negotiateFormat(req: Request): RowFormat | undefined {
    const acceptHeader = req.get('Accept');
    if (!acceptHeader || acceptHeader === '*/*') {
        return "application/json";
    }
    const preferredType = req.accepts(rowFormats);
    return rowFormats.find(format => format === preferredType);
}

export class HttpRouter {
    handler: Handler;

    constructor(
        private projector: FieldProjector,
        private allowedOrigin: AllowedOrigin
    ) {
        const router = Router();
        const applyAllowOrigin = this.applyAllowOrigin.bind(this);
        router.get('/rows', applyAllowOrigin, getRows(this.projector));
        router.get('/fields', applyAllowOrigin, get(() => this.fields()));

        // Respond to OPTIONS requests to describe the methods and content types
        // that are supported.
        this.setOptions(router, '/rows');
        this.setOptions(router, '/fields');

        this.handler = router;
    }

    private fields() {
        return Promise.resolve(this.projector.describe());
    }

    private setOptions(router: Router, path: string) {
        router.options(path, this.applyAllowOrigin.bind(this), (req: Request, res: Response) => {
            const allowedMethods = ['GET', 'OPTIONS'];
            res.set('Allow', allowedMethods.join(', '));
            res.set('Access-Control-Allow-Methods', allowedMethods.join(', '));
            res.set('Access-Control-Allow-Headers', 'Accept');
            res.status(204).send();
        });
    }

    private applyAllowOrigin(req: Request, res: Response, next: NextFunction) {
        const requestOrigin = req.get('Origin');

        if (typeof this.allowedOrigin === 'string') {
            res.set('Access-Control-Allow-Origin', this.allowedOrigin);
        } else if (requestOrigin && this.allowedOrigin.includes(requestOrigin)) {
            res.set('Access-Control-Allow-Origin', requestOrigin);
            res.vary('Origin');
        }
        next();
    }
}

function handleError(error: unknown, req: Request, res: Response) {
    const requestPath = req.path;
    if (!isProjectionError(error)) {
        Trace.error(`Error: ${error instanceof Error ? error.message : String(error)} (Path: ${requestPath})`);
        res.status(500).json({
            error: "InternalError",
            message: "An unexpected error occurred."
        });
        return;
    }

    switch (error.kind) {
        case "InvalidRequest":
            Trace.warn(`Invalid: ${error.message} (Path: ${requestPath})`);
            res.status(400).json({ error: error.kind, message: error.message });
            break;
        case "UnknownField":
            Trace.warn(`Unknown field: ${error.message} (Path: ${requestPath})`);
            res.status(400).json({ error: error.kind, message: error.message, fields: error.fields });
            break;
        case "DataSourceError":
            Trace.error(`Data source: ${error.message} (Path: ${requestPath})`);
            res.status(502).json({
                error: error.kind,
                message: "The data source could not complete the request."
            });
            break;
        case "ProjectionCancelled":
            Trace.warn(`Cancelled (Path: ${requestPath})`);
            res.status(503).json({ error: error.kind, message: error.message });
            break;
    }
}
