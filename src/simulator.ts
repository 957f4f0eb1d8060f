import { DEFAULT_TIMINGS, SimulatedDevice } from './services/deviceSimulator';
import { loadLabConfig } from './config/lab';
import { MessagingGateway } from './services/messagingGateway';

async function main(): Promise<void> {
    const config = loadLabConfig();
    const gateway = new MessagingGateway({
        ...config.broker,
        clientId: `${config.broker.clientId}-simulator`
    });
    gateway.connect();

    const device = new SimulatedDevice(gateway, config.topics, DEFAULT_TIMINGS);
    await device.start();

    process.once('SIGINT', () => {
        device.stop();
        gateway.close().catch(error => console.error('Failed to close broker connection:', error));
    });
}

main().catch(error => {
    console.error('Simulator failed to start:', error);
    process.exit(1);
});
