import { createApp } from './app';
import { loadLabConfig } from './config/lab';
import { createLab } from './lab';
import { MessagingGateway } from './services/messagingGateway';

async function main(): Promise<void> {
    const config = loadLabConfig();

    const gateway = new MessagingGateway(config.broker);
    gateway.connect();

    const lab = await createLab(config, gateway);
    lab.worker.start();

    const app = createApp(lab);
    const server = app.listen(config.port, () => {
        console.log(`Pipette lab queue running on port ${config.port}`);
    });

    const shutdown = () => {
        console.log('Shutting down');
        lab.worker.stop();
        lab.streams.close();
        server.close();
        gateway.close().catch(error => console.error('Failed to close broker connection:', error));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch(error => {
    console.error('Failed to start:', error);
    process.exit(1);
});
