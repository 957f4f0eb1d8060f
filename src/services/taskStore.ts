import { EventEmitter } from 'events';
import {
    DevicePhase,
    ExperimentTask,
    QueueSnapshot,
    SensorReading,
    TaskStatus,
    TaskStatusEvent,
    TaskStore,
    isTerminal
} from '../types/experiment';

const ALLOWED_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
    [TaskStatus.QUEUED]: [TaskStatus.PROCESSING, TaskStatus.ERRORED],
    [TaskStatus.PROCESSING]: [TaskStatus.COMPLETED, TaskStatus.TIMED_OUT, TaskStatus.ERRORED],
    [TaskStatus.COMPLETED]: [],
    [TaskStatus.TIMED_OUT]: [],
    [TaskStatus.ERRORED]: []
};

/**
 * In-memory task table, FIFO of task keys and the active-task slot.
 *
 * Every method is synchronous: callers on the event loop never observe a
 * half-applied change, which is what serializes the worker, the device
 * router and admission against each other.
 */
export class InMemoryTaskStore extends EventEmitter implements TaskStore {
    private tasks: Map<string, ExperimentTask> = new Map();
    private queue: string[] = [];
    private issuedKeys: Set<string> = new Set();
    private activeKey: string | null = null;

    enqueue(task: ExperimentTask): void {
        if (this.issuedKeys.has(task.key)) {
            throw new Error(`Task key ${task.key} has already been issued`);
        }
        if (task.status !== TaskStatus.QUEUED) {
            throw new Error(`Task ${task.key} must be queued to enter the queue, got ${task.status}`);
        }
        this.issuedKeys.add(task.key);
        this.tasks.set(task.key, task);
        this.queue.push(task.key);
        this.emit('task:queued', task);
    }

    /**
     * Removes the next key from the queue. A key without a task means the
     * table and the queue disagree, which is never recoverable.
     */
    dequeue(): ExperimentTask | null {
        const key = this.queue.shift();
        if (key === undefined) return null;

        const task = this.tasks.get(key);
        if (!task) {
            throw new Error(`Queued task ${key} is missing from the task store`);
        }
        return task;
    }

    get(key: string): ExperimentTask | null {
        return this.tasks.get(key) || null;
    }

    hasIssued(key: string): boolean {
        return this.issuedKeys.has(key);
    }

    transition(key: string, status: TaskStatus): ExperimentTask {
        const task = this.tasks.get(key);
        if (!task) {
            throw new Error(`Task ${key} not found`);
        }
        const previous = task.status;
        if (!ALLOWED_TRANSITIONS[previous].includes(status)) {
            throw new Error(`Illegal transition for task ${key}: ${previous} -> ${status}`);
        }

        task.status = status;
        if (status === TaskStatus.PROCESSING) {
            task.startedAt = new Date();
        } else if (isTerminal(status)) {
            task.finishedAt = new Date();
            task.phase = undefined;
            // A queued task can only end here on shutdown
            this.queue = this.queue.filter(queuedKey => queuedKey !== key);
        }

        const event: TaskStatusEvent = { key, status, previous };
        this.emit('task:status', event);
        return task;
    }

    setPhase(key: string, phase: DevicePhase): void {
        const task = this.requireProcessing(key);
        task.phase = phase;
    }

    recordReading(key: string, reading: SensorReading): void {
        const task = this.requireProcessing(key);
        task.sensorData = reading;
    }

    getActive(): ExperimentTask | null {
        if (this.activeKey === null) return null;
        return this.tasks.get(this.activeKey) || null;
    }

    setActive(key: string): void {
        if (this.activeKey !== null) {
            throw new Error(`Cannot activate ${key}: ${this.activeKey} is still active`);
        }
        this.requireProcessing(key);
        this.activeKey = key;
    }

    clearActive(): void {
        this.activeKey = null;
    }

    /**
     * 1-based position in the queue, 0 when the key is not queued
     */
    position(key: string): number {
        return this.queue.indexOf(key) + 1;
    }

    size(): number {
        return this.queue.length;
    }

    queuedTasks(): ExperimentTask[] {
        return this.queue.map(key => this.tasks.get(key)).filter(
            (task): task is ExperimentTask => task !== undefined
        );
    }

    /**
     * Wells held by tasks that are still in the table
     */
    heldWells(): Set<string> {
        return new Set(Array.from(this.tasks.values()).map(task => task.well));
    }

    remove(key: string): void {
        const task = this.tasks.get(key);
        if (!task) return;
        if (!isTerminal(task.status)) {
            throw new Error(`Cannot remove task ${key} while it is ${task.status}`);
        }
        this.tasks.delete(key);
    }

    /**
     * Resolves with the task's status as soon as it is no longer `status`.
     */
    waitUntilLeaves(key: string, status: TaskStatus): Promise<TaskStatus> {
        const task = this.tasks.get(key);
        if (!task) {
            return Promise.reject(new Error(`Task ${key} not found`));
        }
        if (task.status !== status) {
            return Promise.resolve(task.status);
        }

        return new Promise(resolve => {
            const listener = (event: TaskStatusEvent) => {
                if (event.key === key && event.status !== status) {
                    this.off('task:status', listener);
                    resolve(event.status);
                }
            };
            this.on('task:status', listener);
        });
    }

    snapshot(): QueueSnapshot {
        const active = this.getActive();
        return {
            active: active ? { ...active } : null,
            queued: this.queuedTasks().map(task => ({ ...task }))
        };
    }

    private requireProcessing(key: string): ExperimentTask {
        const task = this.tasks.get(key);
        if (!task || task.status !== TaskStatus.PROCESSING) {
            throw new Error(`Task ${key} is not processing`);
        }
        return task;
    }
}
