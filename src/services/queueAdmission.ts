import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { AdmissionConfig } from '../config/lab';
import {
    ExperimentTask,
    ProgressEvent,
    QuotaService,
    RejectionReason,
    TaskStatus,
    Volumes,
    WellPool,
    taskKey
} from '../types/experiment';
import { ResultDispatcher } from './resultDispatcher';
import { InMemoryTaskStore } from './taskStore';

type Rejection = Extract<ProgressEvent, { type: 'rejected' }>;

type Rejected = { admitted: false; rejection: Rejection };

type Admission = { admitted: true; task: ExperimentTask } | Rejected;

export interface QueueAdmissionOptions {
    generateId?: () => string;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function randomExperimentId(): string {
    return uuidv4().replace(/-/g, '').slice(0, 8);
}

/**
 * Returns an error message, or null when the volumes fit a well
 */
export function validateVolumes(volumes: Volumes, limits: AdmissionConfig): string | null {
    for (const component of ['R', 'Y', 'B'] as const) {
        const volume = volumes[component];
        if (!Number.isFinite(volume) || volume < 0 || volume > limits.maxComponentVolume) {
            return `${component} must be between 0 and ${limits.maxComponentVolume}, got ${volume}`;
        }
    }

    const total = volumes.R + volumes.Y + volumes.B;
    if (total > limits.maxTotalVolume) {
        return `Total volume ${total} exceeds the ${limits.maxTotalVolume} unit cap`;
    }
    return null;
}

/**
 * Entry point for callers: validates a submission, queues it and streams its
 * progress until the result comes back.
 */
export class QueueAdmission extends EventEmitter {
    private admissionLock: Promise<void> = Promise.resolve();
    private activeStreams = 0;
    private slotWaiters: Array<() => void> = [];
    private readonly generateId: () => string;

    constructor(
        private readonly store: InMemoryTaskStore,
        private readonly dispatcher: ResultDispatcher,
        private readonly wellPool: WellPool,
        private readonly quota: QuotaService,
        private readonly config: AdmissionConfig,
        options: QueueAdmissionOptions = {}
    ) {
        super();
        this.generateId = options.generateId || randomExperimentId;
    }

    public async *submit(submitterId: string, volumes: Volumes): AsyncGenerator<ProgressEvent> {
        // Checked before a stream slot is taken so a bad mix never waits on one
        const volumeError = validateVolumes(volumes, this.config);
        if (volumeError) {
            yield this.reject(submitterId, 'volume', volumeError).rejection;
            return;
        }

        await this.acquireStreamSlot();
        let task: ExperimentTask | null = null;
        let delivered = false;

        try {
            const admission = await this.exclusive(() => this.admit(submitterId, volumes));
            if (!admission.admitted) {
                yield admission.rejection;
                return;
            }
            task = admission.task;

            yield {
                type: 'queued',
                experimentId: task.experimentId,
                well: task.well,
                position: this.store.position(task.key),
                queueLength: this.store.size()
            };

            const status = await this.store.waitUntilLeaves(task.key, TaskStatus.QUEUED);
            if (status === TaskStatus.PROCESSING) {
                yield { type: 'running', experimentId: task.experimentId, well: task.well };
            }

            const result = await this.dispatcher.awaitResult(task);
            delivered = true;
            this.store.remove(task.key);
            this.dispatcher.release(task);
            yield { type: result.status, result };
        } finally {
            this.releaseStreamSlot();
            if (task && !delivered) {
                this.detach(task);
            }
        }
    }

    public activeStreamCount(): number {
        return this.activeStreams;
    }

    private async admit(submitterId: string, volumes: Volumes): Promise<Admission> {
        const remaining = await this.quota.getRemainingQuota(submitterId);
        if (remaining <= 0) {
            return this.reject(submitterId, 'quota', `Submitter ${submitterId} has no experiments left`);
        }

        let candidates: string[];
        try {
            candidates = await this.wellPool.findUnusedWells();
        } catch (error) {
            return this.reject(submitterId, 'no_wells', errorMessage(error));
        }
        const held = this.store.heldWells();
        const well = candidates.find(candidate => !held.has(candidate));
        if (!well) {
            return this.reject(submitterId, 'no_wells', 'No empty wells found');
        }

        const experimentId = this.nextExperimentId(submitterId);
        try {
            await this.quota.decrement(submitterId);
        } catch (error) {
            return this.reject(submitterId, 'quota', errorMessage(error));
        }
        try {
            await this.wellPool.markUsed([well]);
        } catch (error) {
            await this.quota.refund(submitterId);
            return this.reject(submitterId, 'no_wells', errorMessage(error));
        }

        const task: ExperimentTask = {
            key: taskKey({ sessionId: submitterId, experimentId }),
            sessionId: submitterId,
            experimentId,
            volumes: { ...volumes },
            well,
            status: TaskStatus.QUEUED,
            createdAt: new Date()
        };
        this.store.enqueue(task);

        console.log(`[admission] Queued ${task.key} in well ${well} at position ${this.store.position(task.key)}`);
        this.emit('submission:queued', task);
        return { admitted: true, task };
    }

    private reject(submitterId: string, reason: RejectionReason, message: string): Rejected {
        console.log(`[admission] Rejected submission from ${submitterId} (${reason}): ${message}`);
        const rejection: Rejection = { type: 'rejected', reason, message };
        this.emit('submission:rejected', { submitterId, ...rejection });
        return { admitted: false, rejection };
    }

    private nextExperimentId(submitterId: string): string {
        let experimentId = this.generateId();
        while (this.store.hasIssued(taskKey({ sessionId: submitterId, experimentId }))) {
            experimentId = this.generateId();
        }
        return experimentId;
    }

    /**
     * Runs admissions one at a time so concurrent callers never reserve the
     * same well or spend the same quota.
     */
    private exclusive<T>(work: () => Promise<T>): Promise<T> {
        const run = this.admissionLock.then(work);
        this.admissionLock = run.then(() => undefined, () => undefined);
        return run;
    }

    private async acquireStreamSlot(): Promise<void> {
        if (this.activeStreams < this.config.maxConcurrentStreams) {
            this.activeStreams++;
            return;
        }
        await new Promise<void>(resolve => this.slotWaiters.push(resolve));
    }

    private releaseStreamSlot(): void {
        const next = this.slotWaiters.shift();
        if (next) {
            // Slot passes straight to the next caller
            next();
        } else {
            this.activeStreams--;
        }
    }

    /**
     * The caller stopped listening; the task still runs and is cleaned up
     * once its result arrives.
     */
    private detach(task: ExperimentTask): void {
        console.log(`[admission] Caller for ${task.key} stopped listening`);
        this.dispatcher
            .awaitResult(task)
            .then(() => {
                this.store.remove(task.key);
                this.dispatcher.release(task);
            })
            .catch(error => {
                console.error(`[admission] Cleanup of ${task.key} failed:`, error);
            });
    }
}
