import axios from 'axios';
import { Readable } from 'stream';

export interface StreamEvent {
    event: string;
    data: unknown;
}

export interface SubmissionRequest {
    submitterId: string;
    R: number;
    Y: number;
    B: number;
}

function parseFrame(frame: string): StreamEvent | null {
    let event: string | null = null;
    const dataLines: string[] = [];

    for (const line of frame.split('\n')) {
        if (line.startsWith('event: ')) {
            event = line.slice('event: '.length);
        } else if (line.startsWith('data: ')) {
            dataLines.push(line.slice('data: '.length));
        }
    }
    if (event === null) return null;

    const text = dataLines.join('\n');
    try {
        return { event, data: JSON.parse(text) };
    } catch {
        return { event, data: text };
    }
}

/**
 * Splits buffered SSE text into complete events and the unfinished tail
 */
export function parseEventStream(buffer: string): { events: StreamEvent[]; rest: string } {
    const frames = buffer.split('\n\n');
    const rest = frames.pop() ?? '';
    const events = frames
        .map(parseFrame)
        .filter((event): event is StreamEvent => event !== null);
    return { events, rest };
}

/**
 * Submits an experiment and follows its progress stream to the end
 */
export async function submitExperiment(
    baseUrl: string,
    submission: SubmissionRequest,
    onEvent?: (event: StreamEvent) => void
): Promise<StreamEvent[]> {
    const response = await axios.post<Readable>(`${baseUrl}/experiments`, submission, {
        responseType: 'stream'
    });

    const received: StreamEvent[] = [];
    let buffer = '';
    for await (const chunk of response.data) {
        buffer += Buffer.isBuffer(chunk) ? chunk.toString('utf8') : String(chunk);
        const { events, rest } = parseEventStream(buffer);
        buffer = rest;
        events.forEach(event => {
            received.push(event);
            onEvent?.(event);
        });
    }
    return received;
}
