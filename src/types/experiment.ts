/**
 * Core types for the experiment queue and device correlation layer
 */

export interface Volumes {
    R: number;
    Y: number;
    B: number;
}

/**
 * Pair echoed by the device in every event; the only correlation the
 * protocol offers.
 */
export interface SessionToken {
    sessionId: string;
    experimentId: string;
}

export enum TaskStatus {
    QUEUED = 'queued',
    PROCESSING = 'processing',
    COMPLETED = 'completed',
    TIMED_OUT = 'timed_out',
    ERRORED = 'errored'
}

export type TerminalStatus = TaskStatus.COMPLETED | TaskStatus.TIMED_OUT | TaskStatus.ERRORED;

/** Handshake step of the task currently on the hardware */
export type DevicePhase = 'mixing' | 'reading' | 'confirming';

export type SensorReading = Record<string, unknown>;

export interface ExperimentTask extends SessionToken {
    key: string;
    volumes: Volumes;
    well: string;
    status: TaskStatus;
    phase?: DevicePhase;
    sensorData?: SensorReading;
    createdAt: Date;
    startedAt?: Date;
    finishedAt?: Date;
}

export interface ExperimentResult extends SessionToken {
    status: TerminalStatus;
    well: string;
    volumes: Volumes;
    sensorData: SensorReading | null;
    startedAt?: string;
    finishedAt: string;
    error?: string;
}

export type RejectionReason = 'volume' | 'quota' | 'no_wells';

export type ProgressEvent =
    | { type: 'rejected'; reason: RejectionReason; message: string }
    | { type: 'queued'; experimentId: string; well: string; position: number; queueLength: number }
    | { type: 'running'; experimentId: string; well: string }
    | { type: TerminalStatus; result: ExperimentResult };

export interface TaskStatusEvent {
    key: string;
    status: TaskStatus;
    previous: TaskStatus;
}

export interface QueueSnapshot {
    active: ExperimentTask | null;
    queued: ExperimentTask[];
}

export interface TaskStore {
    enqueue(task: ExperimentTask): void;
    dequeue(): ExperimentTask | null;
    get(key: string): ExperimentTask | null;
    transition(key: string, status: TaskStatus): ExperimentTask;
    getActive(): ExperimentTask | null;
    setActive(key: string): void;
    clearActive(): void;
    position(key: string): number;
    size(): number;
    snapshot(): QueueSnapshot;
}

export interface MessagePublisher {
    publish(topic: string, message: object): Promise<void>;
}

export type MessageHandler = (topic: string, payload: Buffer) => void;

export interface MessageBus extends MessagePublisher {
    subscribe(topics: string[], handler: MessageHandler): Promise<void>;
}

export interface WellPool {
    /** Unused wells in plate order; throws when none are left */
    findUnusedWells(): Promise<string[]>;
    markUsed(wells: string[]): Promise<void>;
}

export interface QuotaService {
    getRemainingQuota(submitterId: string): Promise<number>;
    decrement(submitterId: string): Promise<void>;
    /** Gives back a unit spent on a submission that was not queued */
    refund(submitterId: string): Promise<void>;
}

export interface ResultRecord extends ExperimentResult {
    savedAt: string;
}

export interface ResultStore {
    saveResult(record: ResultRecord): Promise<void>;
}

export interface LabMetrics {
    queued: number;
    active: number;
    completed: number;
    timedOut: number;
    errored: number;
    averageProcessingTime: number;
}

export function taskKey(token: SessionToken): string {
    return `${token.sessionId}/${token.experimentId}`;
}

export function isTerminal(status: TaskStatus): status is TerminalStatus {
    return status === TaskStatus.COMPLETED
        || status === TaskStatus.TIMED_OUT
        || status === TaskStatus.ERRORED;
}
