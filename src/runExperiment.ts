import axios from 'axios';
import { submitExperiment } from './labClient';

async function runExperiment() {
    const [submitterId, r, y, b] = process.argv.slice(2);
    const baseUrl = process.env.LAB_URL || 'http://localhost:3000';

    if (!submitterId || r === undefined || y === undefined || b === undefined) {
        console.error('Usage: runExperiment <submitterId> <R> <Y> <B>');
        process.exitCode = 1;
        return;
    }

    try {
        const events = await submitExperiment(
            baseUrl,
            { submitterId, R: Number(r), Y: Number(y), B: Number(b) },
            event => console.log(`${event.event}: ${JSON.stringify(event.data)}`)
        );
        const last = events[events.length - 1];
        if (!last || last.event !== 'completed') {
            process.exitCode = 1;
        }
    } catch (error) {
        if (axios.isAxiosError(error)) {
            if (error.response) {
                console.error(`Error: HTTP Status ${error.response.status}`);
            } else {
                console.error(`Error: No response from ${baseUrl}. Is the lab service running?`);
            }
        } else {
            console.error('An unexpected error occurred:', error);
        }
        process.exitCode = 1;
    }
}

runExperiment().catch(error => {
    console.error('An unexpected error occurred:', error);
    process.exitCode = 1;
});
