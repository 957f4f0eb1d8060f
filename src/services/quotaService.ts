import { QuotaService } from '../types/experiment';

/**
 * In-memory experiment allowance per submitter
 */
export class InMemoryQuotaService implements QuotaService {
    private remaining: Map<string, number> = new Map();

    constructor(private readonly defaultQuota: number) {}

    async getRemainingQuota(submitterId: string): Promise<number> {
        return this.remaining.get(submitterId) ?? this.defaultQuota;
    }

    async decrement(submitterId: string): Promise<void> {
        const current = await this.getRemainingQuota(submitterId);
        if (current <= 0) {
            throw new Error(`Submitter ${submitterId} has no experiments left`);
        }
        this.remaining.set(submitterId, current - 1);
    }

    async refund(submitterId: string): Promise<void> {
        const current = await this.getRemainingQuota(submitterId);
        this.remaining.set(submitterId, current + 1);
    }

    setQuota(submitterId: string, quota: number): void {
        this.remaining.set(submitterId, quota);
    }
}
