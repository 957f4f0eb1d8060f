import { WellPool } from '../types/experiment';

const PLATE_ROWS = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H'];
const PLATE_COLUMNS = 12;

export function plateWells(): string[] {
    return PLATE_ROWS.flatMap(row =>
        Array.from({ length: PLATE_COLUMNS }, (_, index) => `${row}${index + 1}`)
    );
}

/**
 * Row letter first, then numeric column, so A2 sorts before A10
 */
export function compareWells(a: string, b: string): number {
    const row = a[0].localeCompare(b[0]);
    if (row !== 0) return row;
    return Number(a.slice(1)) - Number(b.slice(1));
}

/**
 * In-memory 96-well plate. Wells are consumed, never handed back.
 */
export class InMemoryWellPool implements WellPool {
    private unused: Set<string>;

    constructor(wells: string[] = plateWells()) {
        this.unused = new Set(wells);
    }

    async findUnusedWells(): Promise<string[]> {
        if (this.unused.size === 0) {
            throw new Error('No empty wells found');
        }
        return Array.from(this.unused).sort(compareWells);
    }

    async markUsed(wells: string[]): Promise<void> {
        wells.forEach(well => this.unused.delete(well));
    }

    remaining(): number {
        return this.unused.size;
    }
}
