import { ResultRecord, ResultStore } from '../types/experiment';

/**
 * In-memory result history
 * Stands in for the experiment database, which lives outside this service
 */
export class InMemoryResultStore implements ResultStore {
    private records: ResultRecord[] = [];

    async saveResult(record: ResultRecord): Promise<void> {
        this.records.push(record);
    }

    list(sessionId?: string): ResultRecord[] {
        if (!sessionId) return [...this.records];
        return this.records.filter(record => record.sessionId === sessionId);
    }
}
