import { EventEmitter } from 'events';
import { ExperimentResult, SessionToken, taskKey } from '../types/experiment';

interface Rendezvous {
    result?: ExperimentResult;
    waiters: Array<(result: ExperimentResult) => void>;
}

/**
 * Hands each finished result to the caller that submitted the task, by
 * session token. Deposit and await may happen in either order.
 */
export class ResultDispatcher extends EventEmitter {
    private pending: Map<string, Rendezvous> = new Map();
    private deposited: Set<string> = new Set();

    /**
     * Returns false, and keeps the first result, when the token already has one
     */
    public deposit(token: SessionToken, result: ExperimentResult): boolean {
        const key = taskKey(token);
        if (this.deposited.has(key)) {
            console.warn(`[dispatch] Duplicate result for ${key} ignored (${result.status})`);
            this.emit('result:duplicate', { key, result });
            return false;
        }
        this.deposited.add(key);

        const rendezvous = this.pending.get(key);
        if (rendezvous && rendezvous.waiters.length > 0) {
            this.pending.delete(key);
            rendezvous.waiters.forEach(resolve => resolve(result));
        } else {
            this.pending.set(key, { result, waiters: [] });
        }

        this.emit('result:deposited', { key, result });
        return true;
    }

    public awaitResult(token: SessionToken): Promise<ExperimentResult> {
        const key = taskKey(token);
        const rendezvous = this.pending.get(key);

        if (rendezvous?.result) {
            const { result } = rendezvous;
            this.pending.delete(key);
            return Promise.resolve(result);
        }

        return new Promise(resolve => {
            if (rendezvous) {
                rendezvous.waiters.push(resolve);
            } else {
                this.pending.set(key, { waiters: [resolve] });
            }
        });
    }

    /**
     * Forgets a token once its task has left the store
     */
    public release(token: SessionToken): void {
        const key = taskKey(token);
        this.deposited.delete(key);
        this.pending.delete(key);
    }

    public hasResult(token: SessionToken): boolean {
        return this.deposited.has(taskKey(token));
    }

    public pendingCount(): number {
        return this.pending.size;
    }

    public trackedCount(): number {
        return this.deposited.size;
    }
}
