import { EventEmitter } from 'events';
import { connect, IClientOptions, MqttClient } from 'mqtt';
import { BrokerConfig } from '../config/lab';
import { MessageBus, MessageHandler } from '../types/experiment';

interface GatewayMetrics {
    connected: boolean;
    reconnects: number;
    messagesPublished: number;
    messagesReceived: number;
}

/**
 * Secure publish/subscribe connection to the lab broker. Reconnects are left
 * to the MQTT client; every (re)connect resubscribes the registered topics.
 */
export class MessagingGateway extends EventEmitter implements MessageBus {
    private client: MqttClient | null = null;
    private handlers: Map<string, MessageHandler[]> = new Map();
    private metrics: GatewayMetrics = {
        connected: false,
        reconnects: 0,
        messagesPublished: 0,
        messagesReceived: 0
    };

    constructor(private readonly config: BrokerConfig) {
        super();
    }

    connect(): void {
        if (this.client) return;

        const options: IClientOptions = {
            clientId: this.config.clientId,
            username: this.config.username,
            password: this.config.password,
            reconnectPeriod: this.config.reconnectPeriodMs,
            resubscribe: false
        };
        const client = connect(this.config.url, options);
        this.client = client;

        client.on('connect', () => {
            this.metrics.connected = true;
            console.log(`[gateway] Connected to ${this.config.url}`);
            this.resubscribe(client);
            this.emit('connected');
        });

        client.on('reconnect', () => {
            this.metrics.reconnects++;
            console.warn(`[gateway] Reconnecting to ${this.config.url} (attempt ${this.metrics.reconnects})`);
        });

        client.on('offline', () => {
            this.metrics.connected = false;
            console.warn('[gateway] Broker connection lost');
            this.emit('disconnected');
        });

        client.on('error', (error: Error) => {
            console.error('[gateway] Transport error:', error.message);
            this.emit('transport:error', error);
        });

        client.on('message', (topic: string, payload: Buffer) => {
            this.metrics.messagesReceived++;
            this.deliver(topic, payload);
        });
    }

    async publish(topic: string, message: object): Promise<void> {
        const client = this.requireClient();
        const body = JSON.stringify(message);

        await new Promise<void>((resolve, reject) => {
            client.publish(topic, body, { qos: 1 }, (error?: Error) => {
                if (error) {
                    reject(error);
                } else {
                    this.metrics.messagesPublished++;
                    resolve();
                }
            });
        });
    }

    async subscribe(topics: string[], handler: MessageHandler): Promise<void> {
        const client = this.requireClient();
        topics.forEach(topic => {
            const existing = this.handlers.get(topic) || [];
            this.handlers.set(topic, [...existing, handler]);
        });

        if (client.connected) {
            await this.subscribeTopics(client, topics);
        }
    }

    async close(): Promise<void> {
        const client = this.client;
        if (!client) return;

        await new Promise<void>(resolve => {
            client.end(false, () => resolve());
        });
        this.client = null;
        this.metrics.connected = false;
    }

    getMetrics(): GatewayMetrics {
        return { ...this.metrics };
    }

    private deliver(topic: string, payload: Buffer): void {
        const handlers = this.handlers.get(topic);
        if (!handlers) {
            this.emit('unknownMessage', { topic, payload });
            return;
        }

        handlers.forEach(handler => {
            try {
                handler(topic, payload);
            } catch (error) {
                console.error(`[gateway] Handler for ${topic} threw:`, error);
            }
        });
    }

    private resubscribe(client: MqttClient): void {
        const topics = Array.from(this.handlers.keys());
        if (topics.length === 0) return;

        this.subscribeTopics(client, topics).catch(error => {
            console.error('[gateway] Resubscribe failed:', error);
            this.emit('transport:error', error);
        });
    }

    private subscribeTopics(client: MqttClient, topics: string[]): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            client.subscribe(topics, { qos: 1 }, (error: Error | null) => {
                if (error) {
                    reject(error);
                } else {
                    console.log(`[gateway] Subscribed to ${topics.join(', ')}`);
                    resolve();
                }
            });
        });
    }

    private requireClient(): MqttClient {
        if (!this.client) {
            throw new Error('Messaging gateway is not connected');
        }
        return this.client;
    }
}
