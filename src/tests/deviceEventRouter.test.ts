import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DeviceEventRouter, DroppedEvent } from '../services/deviceEventRouter';
import { ExperimentWorker } from '../services/experimentWorker';
import { ResultDispatcher } from '../services/resultDispatcher';
import { InMemoryTaskStore } from '../services/taskStore';
import { TaskStatus } from '../types/experiment';
import { LoopbackBus } from './__mocks__/loopbackBus';
import { TOPICS, makeTask } from './fixtures';

const s1 = { experiment_id: 'abcd1234', session_id: 's1' };

function status(sensorStatus: string, ids: { experiment_id: string; session_id: string } = s1): object {
    return { status: { sensor_status: sensorStatus }, ...ids };
}

describe('DeviceEventRouter', () => {
    let store: InMemoryTaskStore;
    let dispatcher: ResultDispatcher;
    let bus: LoopbackBus;
    let worker: ExperimentWorker;
    let router: DeviceEventRouter;
    let dropped: DroppedEvent[];

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});

        store = new InMemoryTaskStore();
        dispatcher = new ResultDispatcher();
        bus = new LoopbackBus();
        worker = new ExperimentWorker(store, dispatcher, bus, TOPICS, { pollIntervalMs: 1000, taskTimeoutMs: 165_000 });
        router = new DeviceEventRouter(store, worker, bus, TOPICS);
        dropped = [];
        router.on('event:dropped', (event: DroppedEvent) => dropped.push(event));
        await bus.subscribe(router.subscriptions(), (topic, payload) => router.handle(topic, payload));
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    function startTask(): void {
        store.enqueue(makeTask());
        worker.tick();
        bus.clear();
    }

    it('should subscribe to device status and sensor data', () => {
        expect(router.subscriptions()).toEqual(['status/ot2/complete', 'color-mixing/picow/as7341']);
        expect(router.classify('status/ot2/complete')).toBe('status');
        expect(router.classify('color-mixing/picow/as7341')).toBe('sensor');
        expect(router.classify('other/topic')).toBeNull();
    });

    it('should drive the task through the full handshake', async () => {
        startTask();
        const waiting = dispatcher.awaitResult({ sessionId: 's1', experimentId: 'abcd1234' });

        bus.inject(TOPICS.deviceStatus, status('in_place'));
        expect(store.getActive()?.phase).toBe('reading');
        expect(bus.messagesOn(TOPICS.sensorCommand)).toEqual([
            { command: { R: 100, Y: 100, B: 100, well: 'A1' }, ...s1 }
        ]);

        bus.inject(TOPICS.sensorData, { sensor_data: { ch410: 120, ch440: 240 }, ...s1 });
        expect(store.getActive()?.phase).toBe('confirming');
        expect(bus.messagesOn(TOPICS.deviceCommand)).toEqual([
            { command: { sensor_status: 'read' }, ...s1 }
        ]);

        bus.inject(TOPICS.deviceStatus, status('charging'));

        expect(store.getActive()).toBeNull();
        expect(store.get('s1/abcd1234')?.status).toBe(TaskStatus.COMPLETED);
        await expect(waiting).resolves.toMatchObject({
            status: TaskStatus.COMPLETED,
            well: 'A1',
            sensorData: { ch410: 120, ch440: 240 }
        });
        expect(dropped).toEqual([]);
    });

    it('should drop events for a different experiment without touching the active task', () => {
        startTask();

        bus.inject(TOPICS.deviceStatus, status('in_place', { experiment_id: 'ffffffff', session_id: 's1' }));

        expect(store.getActive()?.phase).toBe('mixing');
        expect(store.getActive()?.status).toBe(TaskStatus.PROCESSING);
        expect(bus.published).toEqual([]);
        expect(dropped).toEqual([{
            topic: TOPICS.deviceStatus,
            reason: 'does not match active task s1/abcd1234',
            sessionId: 's1',
            experimentId: 'ffffffff'
        }]);
        expect(console.warn).toHaveBeenCalledWith(
            '[router] Dropped message on status/ot2/complete (s1/ffffffff): does not match active task s1/abcd1234'
        );
    });

    it('should drop events from another session carrying the same experiment id', () => {
        startTask();

        bus.inject(TOPICS.sensorData, { sensor_data: { ch410: 1 }, experiment_id: 'abcd1234', session_id: 's2' });

        expect(store.getActive()?.sensorData).toBeUndefined();
        expect(dropped).toHaveLength(1);
    });

    it('should leave state unchanged however often a foreign event repeats', () => {
        startTask();
        const foreign = status('charging', { experiment_id: 'ffffffff', session_id: 's9' });

        bus.inject(TOPICS.deviceStatus, foreign);
        bus.inject(TOPICS.deviceStatus, foreign);
        bus.inject(TOPICS.deviceStatus, foreign);

        expect(store.getActive()?.key).toBe('s1/abcd1234');
        expect(store.getActive()?.phase).toBe('mixing');
        expect(dropped).toHaveLength(3);
    });

    it('should drop events while no task is active', () => {
        bus.inject(TOPICS.deviceStatus, status('in_place'));

        expect(dropped).toEqual([{
            topic: TOPICS.deviceStatus,
            reason: 'no active task',
            sessionId: 's1',
            experimentId: 'abcd1234'
        }]);
    });

    it('should drop malformed payloads', () => {
        startTask();

        bus.inject(TOPICS.deviceStatus, 'not json');
        bus.inject(TOPICS.sensorData, { sensor_data: 'oops', ...s1 });
        bus.inject(TOPICS.deviceStatus, { status: { sensor_status: 'in_place' } });

        expect(dropped.map(event => event.reason)).toEqual([
            'malformed device status',
            'malformed sensor data',
            'malformed device status'
        ]);
        expect(store.getActive()?.phase).toBe('mixing');
    });

    it('should drop messages on topics it does not route', () => {
        router.handle('some/other/topic', Buffer.from('{}'));

        expect(dropped).toEqual([{ topic: 'some/other/topic', reason: 'unknown topic' }]);
    });

    describe('out-of-phase events', () => {
        it('should ignore sensor data before the well is in place', () => {
            startTask();

            bus.inject(TOPICS.sensorData, { sensor_data: { ch410: 1 }, ...s1 });

            expect(store.getActive()?.sensorData).toBeUndefined();
            expect(dropped[0].reason).toBe('sensor data unexpected while mixing');
        });

        it('should complete without a reading when charging arrives first', async () => {
            vi.useFakeTimers();
            try {
                startTask();
                const waiting = dispatcher.awaitResult({ sessionId: 's1', experimentId: 'abcd1234' });
                bus.inject(TOPICS.deviceStatus, status('in_place'));
                vi.advanceTimersByTime(5000);

                bus.inject(TOPICS.deviceStatus, status('charging'));
                vi.advanceTimersByTime(161_000);
                worker.tick();

                expect(store.get('s1/abcd1234')?.status).toBe(TaskStatus.COMPLETED);
                expect(store.getActive()).toBeNull();
                await expect(waiting).resolves.toMatchObject({ status: TaskStatus.COMPLETED, sensorData: null });
                const timeouts = bus.messagesOn(TOPICS.deviceCommand)
                    .filter(message => JSON.stringify(message).includes('sensor_timeout'));
                expect(timeouts).toEqual([]);
                expect(dropped).toEqual([]);
            } finally {
                vi.useRealTimers();
            }
        });

        it('should complete on a charging status while still mixing', () => {
            startTask();

            bus.inject(TOPICS.deviceStatus, status('charging'));

            expect(store.get('s1/abcd1234')?.status).toBe(TaskStatus.COMPLETED);
            expect(dropped).toEqual([]);
        });

        it('should ignore a repeated in_place status', () => {
            startTask();
            bus.inject(TOPICS.deviceStatus, status('in_place'));

            bus.inject(TOPICS.deviceStatus, status('in_place'));

            expect(bus.messagesOn(TOPICS.sensorCommand)).toHaveLength(1);
            expect(dropped[0].reason).toBe('status "in_place" unexpected while reading');
        });

        it('should keep the first reading when a second one arrives', () => {
            startTask();
            bus.inject(TOPICS.deviceStatus, status('in_place'));
            bus.inject(TOPICS.sensorData, { sensor_data: { ch410: 1 }, ...s1 });

            bus.inject(TOPICS.sensorData, { sensor_data: { ch410: 2 }, ...s1 });

            expect(store.getActive()?.sensorData).toEqual({ ch410: 1 });
            expect(dropped[0].reason).toBe('sensor data unexpected while confirming');
        });
    });

    it('should drop a late status for a task that already timed out', () => {
        vi.useFakeTimers();
        try {
            startTask();
            vi.advanceTimersByTime(165_001);
            worker.tick();

            bus.inject(TOPICS.deviceStatus, status('in_place'));

            expect(store.get('s1/abcd1234')?.status).toBe(TaskStatus.TIMED_OUT);
            expect(dropped[0].reason).toBe('no active task');
        } finally {
            vi.useRealTimers();
        }
    });
});
