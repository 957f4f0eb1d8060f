import { EventEmitter } from 'events';
import { TopicConfig } from '../config/lab';
import { MessageBus, SensorReading, SessionToken } from '../types/experiment';
import {
    DeviceStatus,
    DeviceStatusValue,
    SensorCommand,
    isDispenseCommand,
    isSensorStatusCommand,
    parsePayload,
    tokenOf
} from './deviceProtocol';

export interface SimulatorTimings {
    // Pipetting and moving the plate under the sensor
    moveMs: number;
    readMs: number;
    chargeMs: number;
}

export const DEFAULT_TIMINGS: SimulatorTimings = {
    moveMs: 5000,
    readMs: 2000,
    chargeMs: 1000
};

// AS7341 channel counts reported for every read
export const SIMULATED_READING: SensorReading = {
    ch410: 100,
    ch440: 200,
    ch470: 300,
    ch510: 400,
    ch550: 500,
    ch583: 600,
    ch620: 700,
    ch670: 800
};

/**
 * Plays the robot and sensor side of the protocol so the service can run
 * without hardware.
 */
export class SimulatedDevice extends EventEmitter {
    private timers: Set<NodeJS.Timeout> = new Set();

    constructor(
        private readonly bus: MessageBus,
        private readonly topics: TopicConfig,
        private readonly timings: SimulatorTimings = DEFAULT_TIMINGS
    ) {
        super();
    }

    async start(): Promise<void> {
        await this.bus.subscribe(
            [this.topics.deviceCommand, this.topics.sensorCommand],
            (topic, payload) => this.handle(topic, payload)
        );
        console.log('[simulator] Listening for device commands');
    }

    stop(): void {
        this.timers.forEach(timer => clearTimeout(timer));
        this.timers.clear();
    }

    private handle(topic: string, payload: Buffer): void {
        const message = parsePayload(payload);

        if (topic === this.topics.sensorCommand && isDispenseCommand(message)) {
            this.later(this.timings.readMs, () => this.sendReading(tokenOf(message)));
            return;
        }

        if (topic !== this.topics.deviceCommand) return;

        if (isDispenseCommand(message)) {
            const { R, Y, B, well } = message.command;
            console.log(`[simulator] Dispensing R=${R} Y=${Y} B=${B} into ${well}`);
            this.later(this.timings.moveMs, () => this.sendStatus(DeviceStatus.IN_PLACE, tokenOf(message)));
        } else if (isSensorStatusCommand(message)) {
            if (message.command.sensor_status === SensorCommand.READ) {
                this.later(this.timings.chargeMs, () => this.sendStatus(DeviceStatus.CHARGING, tokenOf(message)));
            } else if (message.command.sensor_status === SensorCommand.TIMEOUT) {
                console.warn(`[simulator] Timeout received for ${message.session_id}/${message.experiment_id}, resetting`);
                this.stop();
                this.emit('reset', tokenOf(message));
            }
        }
    }

    private sendStatus(status: DeviceStatusValue, token: SessionToken): Promise<void> {
        return this.bus.publish(this.topics.deviceStatus, {
            status: { sensor_status: status },
            experiment_id: token.experimentId,
            session_id: token.sessionId,
            timestamp: Date.now() / 1000
        });
    }

    private sendReading(token: SessionToken): Promise<void> {
        return this.bus.publish(this.topics.sensorData, {
            sensor_data: { ...SIMULATED_READING },
            experiment_id: token.experimentId,
            session_id: token.sessionId,
            timestamp: Date.now() / 1000
        });
    }

    private later(delayMs: number, action: () => Promise<void>): void {
        const timer = setTimeout(() => {
            this.timers.delete(timer);
            action().catch(error => {
                console.error('[simulator] Publish failed:', error);
            });
        }, delayMs);
        this.timers.add(timer);
    }
}
