import { Condition } from "./projection/field-request";
import { ColumnBinding } from "./projection/schema";

export type SourceRecord = { [column: string]: unknown };

export interface SelectRequest {
    columns: ColumnBinding[];
    conditions: Condition[];
    signal?: AbortSignal;
}

export interface TableSource {
    select(request: SelectRequest): Promise<SourceRecord[]>;
}
