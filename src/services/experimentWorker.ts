import { EventEmitter } from 'events';
import { TopicConfig, WorkerConfig } from '../config/lab';
import {
    ExperimentResult,
    ExperimentTask,
    LabMetrics,
    MessagePublisher,
    ResultStore,
    SessionToken,
    TaskStatus,
    TerminalStatus,
    taskKey
} from '../types/experiment';
import { dispenseCommand, timeoutCommand } from './deviceProtocol';
import { ResultDispatcher } from './resultDispatcher';
import { InMemoryTaskStore } from './taskStore';

/**
 * Single consumer of the experiment queue. Owns every status transition out
 * of `queued` and `processing`, so at most one task is ever on the hardware.
 */
export class ExperimentWorker extends EventEmitter {
    private schedulerInterval: NodeJS.Timeout | null = null;
    private completed = 0;
    private timedOut = 0;
    private errored = 0;
    private totalProcessingMs = 0;

    constructor(
        private readonly store: InMemoryTaskStore,
        private readonly dispatcher: ResultDispatcher,
        private readonly publisher: MessagePublisher,
        private readonly topics: TopicConfig,
        private readonly config: WorkerConfig,
        private readonly resultStore?: ResultStore
    ) {
        super();
    }

    public start(): void {
        if (this.schedulerInterval) return;
        this.schedulerInterval = setInterval(() => {
            try {
                this.tick();
            } catch (error) {
                console.error('[worker] Tick failed:', error);
            }
        }, this.config.pollIntervalMs);
        console.log(`[worker] Polling every ${this.config.pollIntervalMs}ms, timeout ${this.config.taskTimeoutMs}ms`);
    }

    /**
     * Stops polling and fails whatever is still open so no caller waits forever
     */
    public stop(): void {
        if (this.schedulerInterval) {
            clearInterval(this.schedulerInterval);
            this.schedulerInterval = null;
        }

        const active = this.store.getActive();
        if (active) {
            this.finalize(active, TaskStatus.ERRORED, 'Worker stopped');
            this.send(this.topics.deviceCommand, timeoutCommand(active), active.key);
        }
        for (const task of this.store.queuedTasks()) {
            this.finalize(task, TaskStatus.ERRORED, 'Worker stopped');
        }
    }

    public isRunning(): boolean {
        return this.schedulerInterval !== null;
    }

    /**
     * One activation cycle. Never awaits the transport, so a stalled broker
     * cannot hold back the timeout check on the next cycle.
     */
    public tick(): void {
        const active = this.store.getActive();
        if (active) {
            if (this.elapsedMs(active) > this.config.taskTimeoutMs) {
                this.timeOut(active);
            }
            return;
        }

        const next = this.store.dequeue();
        if (next) {
            this.begin(next);
        }
    }

    /**
     * Finishes the active task with its stored sensor reading. Returns false
     * when the token does not belong to the active task.
     */
    public completeActive(token: SessionToken): boolean {
        const active = this.store.getActive();
        if (!active || active.sessionId !== token.sessionId || active.experimentId !== token.experimentId) {
            return false;
        }
        this.finalize(active, TaskStatus.COMPLETED);
        return true;
    }

    public getMetrics(): LabMetrics {
        const finished = this.completed + this.timedOut + this.errored;
        return {
            queued: this.store.size(),
            active: this.store.getActive() ? 1 : 0,
            completed: this.completed,
            timedOut: this.timedOut,
            errored: this.errored,
            averageProcessingTime: finished === 0 ? 0 : this.totalProcessingMs / finished
        };
    }

    private begin(task: ExperimentTask): void {
        this.store.transition(task.key, TaskStatus.PROCESSING);
        this.store.setPhase(task.key, 'mixing');
        this.store.setActive(task.key);
        this.emit('task:started', task);
        console.log(`[worker] Started ${task.key} in well ${task.well} (R=${task.volumes.R}, Y=${task.volumes.Y}, B=${task.volumes.B})`);

        this.send(this.topics.deviceCommand, dispenseCommand(task), task.key);
    }

    private timeOut(task: ExperimentTask): void {
        const seconds = Math.round(this.config.taskTimeoutMs / 1000);
        this.finalize(task, TaskStatus.TIMED_OUT, `No response from device within ${seconds}s`);
        this.send(this.topics.deviceCommand, timeoutCommand(task), task.key);
    }

    private finalize(task: ExperimentTask, status: TerminalStatus, error?: string): void {
        const startedAt = task.startedAt;
        this.store.transition(task.key, status);
        if (this.store.getActive()?.key === task.key) {
            this.store.clearActive();
        }

        const result: ExperimentResult = {
            status,
            sessionId: task.sessionId,
            experimentId: task.experimentId,
            well: task.well,
            volumes: { ...task.volumes },
            sensorData: task.sensorData ?? null,
            startedAt: startedAt?.toISOString(),
            finishedAt: (task.finishedAt ?? new Date()).toISOString(),
            error
        };

        this.recordMetrics(status, startedAt);
        this.dispatcher.deposit(task, result);
        this.emit('task:finished', result);

        if (status === TaskStatus.COMPLETED) {
            console.log(`[worker] Completed ${task.key}`);
        } else {
            console.warn(`[worker] ${task.key} finished as ${status}: ${error}`);
        }

        this.persist(result);
    }

    private recordMetrics(status: TerminalStatus, startedAt?: Date): void {
        if (status === TaskStatus.COMPLETED) this.completed++;
        else if (status === TaskStatus.TIMED_OUT) this.timedOut++;
        else this.errored++;

        if (startedAt) {
            this.totalProcessingMs += Date.now() - startedAt.getTime();
        }
    }

    private persist(result: ExperimentResult): void {
        if (!this.resultStore) return;
        this.resultStore
            .saveResult({ ...result, savedAt: new Date().toISOString() })
            .catch(error => {
                console.error(`[worker] Failed to save result for ${taskKey(result)}:`, error);
            });
    }

    private send(topic: string, message: object, key: string): void {
        this.publisher.publish(topic, message).catch(error => {
            console.error(`[worker] Publish to ${topic} for ${key} failed:`, error);
            this.emit('publish:failed', { topic, key, error });
        });
    }

    private elapsedMs(task: ExperimentTask): number {
        if (!task.startedAt) {
            throw new Error(`Processing task ${task.key} has no start time`);
        }
        return Date.now() - task.startedAt.getTime();
    }
}
