import { ExperimentTask, SensorReading, SessionToken } from '../types/experiment';

export const DeviceStatus = {
    IN_PLACE: 'in_place',
    CHARGING: 'charging'
} as const;

export type DeviceStatusValue = typeof DeviceStatus[keyof typeof DeviceStatus];

export const SensorCommand = {
    READ: 'read',
    TIMEOUT: 'sensor_timeout'
} as const;

interface Correlated {
    experiment_id: string;
    session_id: string;
}

export interface DispenseCommand extends Correlated {
    command: { R: number; Y: number; B: number; well: string };
}

export interface SensorStatusCommand extends Correlated {
    command: { sensor_status: typeof SensorCommand[keyof typeof SensorCommand] };
}

export interface DeviceStatusMessage extends Correlated {
    status: { sensor_status: string };
}

export interface SensorDataMessage extends Correlated {
    sensor_data: SensorReading;
}

function correlation(token: SessionToken): Correlated {
    return {
        experiment_id: token.experimentId,
        session_id: token.sessionId
    };
}

/**
 * Body of both the mix command and the sensor-read command
 */
export function dispenseCommand(task: ExperimentTask): DispenseCommand {
    return {
        command: {
            R: task.volumes.R,
            Y: task.volumes.Y,
            B: task.volumes.B,
            well: task.well
        },
        ...correlation(task)
    };
}

export function confirmReadCommand(token: SessionToken): SensorStatusCommand {
    return { command: { sensor_status: SensorCommand.READ }, ...correlation(token) };
}

export function timeoutCommand(token: SessionToken): SensorStatusCommand {
    return { command: { sensor_status: SensorCommand.TIMEOUT }, ...correlation(token) };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCorrelated(value: Record<string, unknown>): boolean {
    return typeof value.experiment_id === 'string' && typeof value.session_id === 'string';
}

export function parsePayload(payload: Buffer | string): unknown {
    const text = typeof payload === 'string' ? payload : payload.toString('utf8');
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

export function isDeviceStatusMessage(value: unknown): value is DeviceStatusMessage {
    return isRecord(value)
        && isCorrelated(value)
        && isRecord(value.status)
        && typeof value.status.sensor_status === 'string';
}

export function isSensorDataMessage(value: unknown): value is SensorDataMessage {
    return isRecord(value) && isCorrelated(value) && isRecord(value.sensor_data);
}

export function isDispenseCommand(value: unknown): value is DispenseCommand {
    return isRecord(value)
        && isCorrelated(value)
        && isRecord(value.command)
        && typeof value.command.well === 'string';
}

export function isSensorStatusCommand(value: unknown): value is SensorStatusCommand {
    return isRecord(value)
        && isCorrelated(value)
        && isRecord(value.command)
        && typeof value.command.sensor_status === 'string';
}

export function matchesToken(message: Correlated, token: SessionToken): boolean {
    return message.session_id === token.sessionId && message.experiment_id === token.experimentId;
}

export function tokenOf(message: Correlated): SessionToken {
    return { sessionId: message.session_id, experimentId: message.experiment_id };
}
