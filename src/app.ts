import express from 'express';
import { isRecord } from './services/deviceProtocol';
import { ExperimentWorker } from './services/experimentWorker';
import { ProgressStreamManager } from './services/progressStreams';
import { QueueAdmission } from './services/queueAdmission';
import { InMemoryTaskStore } from './services/taskStore';
import { Volumes, taskKey } from './types/experiment';

export interface LabServices {
    admission: QueueAdmission;
    store: InMemoryTaskStore;
    worker: ExperimentWorker;
    streams: ProgressStreamManager;
}

interface Submission {
    submitterId: string;
    volumes: Volumes;
}

export function parseSubmission(body: unknown): Submission | { error: string } {
    if (!isRecord(body)) {
        return { error: 'Request body must be a JSON object' };
    }

    if (typeof body.submitterId !== 'string' || body.submitterId.trim() === '') {
        return { error: 'submitterId is required' };
    }
    for (const component of ['R', 'Y', 'B']) {
        if (typeof body[component] !== 'number') {
            return { error: `${component} must be a number` };
        }
    }

    return {
        submitterId: body.submitterId,
        volumes: { R: Number(body.R), Y: Number(body.Y), B: Number(body.B) }
    };
}

export function createApp(services: LabServices): express.Express {
    const { admission, store, worker, streams } = services;
    const app = express();
    app.use(express.json());

    app.use((req, res, next) => {
        console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
        next();
    });

    const publishQueue = () => streams.broadcast('queue', 'queue:update', store.snapshot());
    store.on('task:queued', publishQueue);
    store.on('task:status', publishQueue);

    // Health check endpoint
    app.get('/health', (req, res) => {
        res.json({ status: 'ok' });
    });

    // Submission endpoint, answers with a progress event stream
    app.post('/experiments', async (req, res) => {
        const submission = parseSubmission(req.body);
        if ('error' in submission) {
            res.status(400).json({ success: false, error: submission.error });
            return;
        }

        const clientId = streams.connect(res);
        try {
            for await (const event of admission.submit(submission.submitterId, submission.volumes)) {
                if (!streams.isConnected(clientId)) break;
                streams.sendEvent(clientId, event.type, event);
            }
        } catch (error) {
            console.error(`[api] Submission from ${submission.submitterId} failed:`, error);
            streams.sendEvent(clientId, 'error', {
                message: error instanceof Error ? error.message : 'Unknown error'
            });
        } finally {
            streams.disconnect(clientId);
        }
    });

    // Experiment status endpoint
    app.get('/experiments/:sessionId/:experimentId', (req, res) => {
        const task = store.get(taskKey({
            sessionId: req.params.sessionId,
            experimentId: req.params.experimentId
        }));
        if (!task) {
            res.status(404).json({ success: false, error: 'Experiment not found' });
            return;
        }
        res.json(task);
    });

    app.get('/queue', (req, res) => {
        res.json(store.snapshot());
    });

    // Dashboard feed of queue changes
    app.get('/queue/events', (req, res) => {
        const clientId = streams.connect(res, ['queue']);
        streams.sendEvent(clientId, 'queue:update', store.snapshot());
    });

    app.get('/metrics', (req, res) => {
        res.json(worker.getMetrics());
    });

    return app;
}
