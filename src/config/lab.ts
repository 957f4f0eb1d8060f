/**
 * Lab configuration. Defaults match the single OT-2 plus colour sensor bench;
 * every value can be overridden from the environment.
 */

function numberFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
    }
    return value;
}

export interface TopicConfig {
    // Outbound mix, confirm-read and timeout commands
    deviceCommand: string;
    sensorCommand: string;
    deviceStatus: string;
    sensorData: string;
}

export interface BrokerConfig {
    url: string;
    username?: string;
    password?: string;
    clientId: string;
    reconnectPeriodMs: number;
}

export interface WorkerConfig {
    pollIntervalMs: number;
    taskTimeoutMs: number;
}

export interface AdmissionConfig {
    maxTotalVolume: number;
    maxComponentVolume: number;
    maxConcurrentStreams: number;
}

export interface LabConfig {
    port: number;
    broker: BrokerConfig;
    topics: TopicConfig;
    worker: WorkerConfig;
    admission: AdmissionConfig;
    defaultQuota: number;
}

export function loadLabConfig(): LabConfig {
    return {
        port: numberFromEnv('PORT', 3000),

        broker: {
            url: process.env.MQTT_URL || 'mqtts://localhost:8883',
            username: process.env.MQTT_USERNAME,
            password: process.env.MQTT_PASSWORD,
            clientId: process.env.MQTT_CLIENT_ID || `pipette-lab-${process.pid}`,
            // Delay between reconnect attempts after the broker drops us
            reconnectPeriodMs: numberFromEnv('MQTT_RECONNECT_MS', 5000)
        },

        topics: {
            deviceCommand: process.env.TOPIC_DEVICE_COMMAND || 'command/ot2/pipette',
            sensorCommand: process.env.TOPIC_SENSOR_COMMAND || 'command/picow/as7341/read',
            deviceStatus: process.env.TOPIC_DEVICE_STATUS || 'status/ot2/complete',
            sensorData: process.env.TOPIC_SENSOR_DATA || 'color-mixing/picow/as7341'
        },

        worker: {
            pollIntervalMs: numberFromEnv('LAB_POLL_INTERVAL_MS', 1000),
            // Hardware response deadline per task
            taskTimeoutMs: numberFromEnv('LAB_TASK_TIMEOUT_MS', 165_000)
        },

        admission: {
            // Unit volume cap of a well
            maxTotalVolume: 300,
            maxComponentVolume: 300,
            maxConcurrentStreams: numberFromEnv('LAB_MAX_STREAMS', 3)
        },

        defaultQuota: numberFromEnv('LAB_DEFAULT_QUOTA', 10)
    };
}
