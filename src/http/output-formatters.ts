import { Options, stringify } from 'csv-stringify';
import { Response } from "express";

import { ResultSet } from "../projection/field-request";

export type RowFormat = "application/json" | "application/x-ndjson" | "text/csv";

export const rowFormats: RowFormat[] = ["application/json", "application/x-ndjson", "text/csv"];

/**
 * Write projected rows in the negotiated format.
 * `fields` is the distinct requested field list, used as the CSV header.
 */
export async function outputRows(
    rows: ResultSet,
    fields: string[],
    res: Response,
    format: RowFormat
): Promise<void> {
    switch (format) {
        case "application/x-ndjson":
            sendAsNDJSON(rows, res);
            break;
        case "text/csv":
            await streamAsCSVWithStringify(rows, fields, res);
            break;
        case "application/json":
            res.type("application/json");
            res.send(JSON.stringify(rows));
            break;
    }
}

function sendAsNDJSON(rows: ResultSet, res: Response): void {
    res.type("application/x-ndjson");
    res.send(rows.map(row => JSON.stringify(row) + '\n').join(''));
}

/**
 * Stream rows as CSV, one column per requested field.
 * Nulls become empty cells.
 */
export async function streamAsCSVWithStringify(
    rows: ResultSet,
    fields: string[],
    res: Response
): Promise<void> {
    res.type("text/csv");

    // Helper to await 'finish' or 'error' events on a stream
    function finishedAsync(stream: NodeJS.EventEmitter): Promise<void> {
        return new Promise((resolve, reject) => {
            stream.once('finish', resolve);
            stream.once('error', reject);
        });
    }

    const stringifier = stringify(csvOptions(fields));
    const finished = finishedAsync(stringifier);

    stringifier.pipe(res);
    for (const row of rows) {
        stringifier.write(row);
    }
    stringifier.end();

    await finished;
}

export function csvOptions(fields: string[]): Options {
    return {
        header: true,
        columns: fields,
        cast: {
            boolean: (value) => value ? 'true' : 'false'
        }
    };
}
