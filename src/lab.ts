import { LabServices } from './app';
import { LabConfig } from './config/lab';
import { DeviceEventRouter } from './services/deviceEventRouter';
import { ExperimentWorker } from './services/experimentWorker';
import { ProgressStreamManager } from './services/progressStreams';
import { QueueAdmission, QueueAdmissionOptions } from './services/queueAdmission';
import { InMemoryQuotaService } from './services/quotaService';
import { ResultDispatcher } from './services/resultDispatcher';
import { InMemoryResultStore } from './services/resultStore';
import { InMemoryTaskStore } from './services/taskStore';
import { InMemoryWellPool } from './services/wellPool';
import { MessageBus, QuotaService, ResultStore, WellPool } from './types/experiment';

export interface LabCollaborators {
    wellPool?: WellPool;
    quota?: QuotaService;
    resultStore?: ResultStore;
}

export interface Lab extends LabServices {
    dispatcher: ResultDispatcher;
    router: DeviceEventRouter;
}

/**
 * Wires the queue, worker and device router onto a message bus. The worker
 * is left stopped.
 */
export async function createLab(
    config: LabConfig,
    bus: MessageBus,
    collaborators: LabCollaborators = {},
    options: QueueAdmissionOptions = {}
): Promise<Lab> {
    const store = new InMemoryTaskStore();
    const dispatcher = new ResultDispatcher();
    const worker = new ExperimentWorker(
        store,
        dispatcher,
        bus,
        config.topics,
        config.worker,
        collaborators.resultStore || new InMemoryResultStore()
    );
    const router = new DeviceEventRouter(store, worker, bus, config.topics);
    const admission = new QueueAdmission(
        store,
        dispatcher,
        collaborators.wellPool || new InMemoryWellPool(),
        collaborators.quota || new InMemoryQuotaService(config.defaultQuota),
        config.admission,
        options
    );

    await bus.subscribe(router.subscriptions(), (topic, payload) => router.handle(topic, payload));

    return {
        admission,
        store,
        worker,
        streams: new ProgressStreamManager(),
        dispatcher,
        router
    };
}
