import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';

/**
 * The part of an express Response an event stream writes to
 */
export interface StreamResponse {
    writeHead(statusCode: number, headers: Record<string, string>): unknown;
    write(chunk: string): unknown;
    end(): unknown;
    on(event: 'close', listener: () => void): unknown;
}

interface StreamClient {
    id: string;
    response: StreamResponse;
    topics: string[];
}

/**
 * Server-Sent Events for submission progress and queue dashboards
 */
export class ProgressStreamManager extends EventEmitter {
    private clients: Map<string, StreamClient> = new Map();
    private retryInterval: number = 3000;

    /**
     * Opens an event stream on the response. The close listener sits on the
     * response because a request with a body reports 'close' once it is read.
     */
    public connect(res: StreamResponse, topics: string[] = []): string {
        const clientId = uuidv4();

        res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            'Connection': 'keep-alive',
            'X-Accel-Buffering': 'no' // Disable Nginx buffering
        });
        res.write(`retry: ${this.retryInterval}\n\n`);

        this.clients.set(clientId, {
            id: clientId,
            response: res,
            topics
        });

        res.on('close', () => this.disconnect(clientId));

        return clientId;
    }

    public disconnect(clientId: string): void {
        const client = this.clients.get(clientId);
        if (client) {
            this.clients.delete(clientId);
            client.response.end();
            this.emit('client:disconnected', clientId);
        }
    }

    public isConnected(clientId: string): boolean {
        return this.clients.has(clientId);
    }

    /**
     * Sends to every client subscribed to the topic
     */
    public broadcast(topic: string, event: string, data: unknown): void {
        this.clients.forEach(client => {
            if (client.topics.includes(topic)) {
                this.sendEvent(client.id, event, data);
            }
        });
    }

    public sendEvent(clientId: string, event: string, data: unknown): void {
        const client = this.clients.get(clientId);
        if (!client) return;

        client.response.write(formatSSEMessage(event, data));
    }

    public getClients(): Map<string, StreamClient> {
        return new Map(this.clients);
    }

    public close(): void {
        Array.from(this.clients.keys()).forEach(clientId => this.disconnect(clientId));
    }
}

export function formatSSEMessage(event: string, data: unknown): string {
    let message = `event: ${event}\n`;

    if (typeof data === 'string') {
        message += `data: ${data}\n`;
    } else {
        message += `data: ${JSON.stringify(data)}\n`;
    }

    return message + '\n';
}
