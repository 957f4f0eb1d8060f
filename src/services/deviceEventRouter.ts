import { EventEmitter } from 'events';
import { TopicConfig } from '../config/lab';
import { ExperimentTask, MessagePublisher } from '../types/experiment';
import {
    DeviceStatus,
    DeviceStatusMessage,
    SensorDataMessage,
    confirmReadCommand,
    dispenseCommand,
    isDeviceStatusMessage,
    isSensorDataMessage,
    matchesToken,
    parsePayload,
    tokenOf
} from './deviceProtocol';
import { ExperimentWorker } from './experimentWorker';
import { InMemoryTaskStore } from './taskStore';

export type DeviceEventKind = 'status' | 'sensor';

export interface DroppedEvent {
    topic: string;
    reason: string;
    sessionId?: string;
    experimentId?: string;
}

/**
 * Routes inbound device traffic to the active task. Anything that cannot be
 * tied to the active task and its current handshake step is dropped.
 */
export class DeviceEventRouter extends EventEmitter {
    constructor(
        private readonly store: InMemoryTaskStore,
        private readonly worker: ExperimentWorker,
        private readonly publisher: MessagePublisher,
        private readonly topics: TopicConfig
    ) {
        super();
    }

    public subscriptions(): string[] {
        return [this.topics.deviceStatus, this.topics.sensorData];
    }

    public classify(topic: string): DeviceEventKind | null {
        if (topic === this.topics.deviceStatus) return 'status';
        if (topic === this.topics.sensorData) return 'sensor';
        return null;
    }

    public handle(topic: string, payload: Buffer | string): void {
        const kind = this.classify(topic);
        if (!kind) {
            this.drop({ topic, reason: 'unknown topic' });
            return;
        }

        const message = parsePayload(payload);
        if (kind === 'status') {
            if (!isDeviceStatusMessage(message)) {
                this.drop({ topic, reason: 'malformed device status' });
                return;
            }
            const active = this.correlate(topic, message);
            if (active) this.handleStatus(topic, active, message);
        } else {
            if (!isSensorDataMessage(message)) {
                this.drop({ topic, reason: 'malformed sensor data' });
                return;
            }
            const active = this.correlate(topic, message);
            if (active) this.handleSensorData(topic, active, message);
        }
    }

    private correlate(topic: string, message: DeviceStatusMessage | SensorDataMessage): ExperimentTask | null {
        const token = tokenOf(message);
        const active = this.store.getActive();
        if (!active) {
            this.drop({ topic, reason: 'no active task', ...token });
            return null;
        }
        if (!matchesToken(message, active)) {
            this.drop({ topic, reason: `does not match active task ${active.key}`, ...token });
            return null;
        }
        return active;
    }

    private handleStatus(topic: string, task: ExperimentTask, message: DeviceStatusMessage): void {
        const status = message.status.sensor_status;

        if (status === DeviceStatus.IN_PLACE && task.phase === 'mixing') {
            this.store.setPhase(task.key, 'reading');
            this.emit('device:in_place', task);
            this.send(this.topics.sensorCommand, dispenseCommand(task), task.key);
            return;
        }

        // The device reports charging on its own clock; it ends the task in
        // any phase, with whatever reading has arrived so far
        if (status === DeviceStatus.CHARGING) {
            this.emit('device:charging', task);
            this.worker.completeActive(task);
            return;
        }

        this.drop({
            topic,
            reason: `status "${status}" unexpected while ${task.phase ?? 'idle'}`,
            ...tokenOf(message)
        });
    }

    private handleSensorData(topic: string, task: ExperimentTask, message: SensorDataMessage): void {
        if (task.phase !== 'reading') {
            this.drop({ topic, reason: `sensor data unexpected while ${task.phase ?? 'idle'}`, ...tokenOf(message) });
            return;
        }

        this.store.recordReading(task.key, message.sensor_data);
        this.store.setPhase(task.key, 'confirming');
        this.emit('sensor:data', { key: task.key, reading: message.sensor_data });
        this.send(this.topics.deviceCommand, confirmReadCommand(task), task.key);
    }

    private drop(event: DroppedEvent): void {
        const ids = event.sessionId ? ` (${event.sessionId}/${event.experimentId})` : '';
        console.warn(`[router] Dropped message on ${event.topic}${ids}: ${event.reason}`);
        this.emit('event:dropped', event);
    }

    private send(topic: string, message: object, key: string): void {
        this.publisher.publish(topic, message).catch(error => {
            console.error(`[router] Publish to ${topic} for ${key} failed:`, error);
            this.emit('publish:failed', { topic, key, error });
        });
    }
}
