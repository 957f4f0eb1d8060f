import { LabConfig, TopicConfig } from '../config/lab';
import { ExperimentTask, TaskStatus, Volumes, taskKey } from '../types/experiment';

export const TOPICS: TopicConfig = {
    deviceCommand: 'command/ot2/pipette',
    sensorCommand: 'command/picow/as7341/read',
    deviceStatus: 'status/ot2/complete',
    sensorData: 'color-mixing/picow/as7341'
};

export function testConfig(): LabConfig {
    return {
        port: 0,
        broker: {
            url: 'mqtts://broker.test:8883',
            username: 'lab',
            password: 'test-secret',
            clientId: 'lab-test',
            reconnectPeriodMs: 1000
        },
        topics: { ...TOPICS },
        worker: {
            pollIntervalMs: 1000,
            taskTimeoutMs: 165_000
        },
        admission: {
            maxTotalVolume: 300,
            maxComponentVolume: 300,
            maxConcurrentStreams: 3
        },
        defaultQuota: 5
    };
}

interface TaskOverrides {
    sessionId?: string;
    experimentId?: string;
    volumes?: Volumes;
    well?: string;
}

export function makeTask(overrides: TaskOverrides = {}): ExperimentTask {
    const sessionId = overrides.sessionId ?? 's1';
    const experimentId = overrides.experimentId ?? 'abcd1234';
    return {
        key: taskKey({ sessionId, experimentId }),
        sessionId,
        experimentId,
        volumes: overrides.volumes ?? { R: 100, Y: 100, B: 100 },
        well: overrides.well ?? 'A1',
        status: TaskStatus.QUEUED,
        createdAt: new Date()
    };
}

/**
 * Sequential ids: exp00001, exp00002, ...
 */
export function sequentialIds(): () => string {
    let next = 0;
    return () => {
        next++;
        return `exp${String(next).padStart(5, '0')}`;
    };
}
