import { ProjectionCancelled } from "../projection/errors";
import { SelectRequest, SourceRecord, TableSource } from "../table-source";

export class MemoryTableSource implements TableSource {
    private records: SourceRecord[];

    constructor(records: SourceRecord[] = []) {
        this.records = records.map(record => ({ ...record }));
    }

    insert(record: SourceRecord): void {
        this.records.push({ ...record });
    }

    select(request: SelectRequest): Promise<SourceRecord[]> {
        if (request.signal?.aborted) {
            return Promise.reject(new ProjectionCancelled(request.signal.reason));
        }
        try {
            const matching = this.records.filter(record =>
                request.conditions.every(condition =>
                    condition.column.read(record[condition.column.name]) === condition.value));
            return Promise.resolve(matching.map(record => {
                const selected: SourceRecord = {};
                for (const column of request.columns) {
                    selected[column.name] = record[column.name];
                }
                return selected;
            }));
        }
        catch (error) {
            return Promise.reject(error);
        }
    }
}
