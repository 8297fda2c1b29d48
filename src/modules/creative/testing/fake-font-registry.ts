import { FontRegistryService } from '../fonts/font-registry.service';

/**
 * Records registrations instead of touching the process-wide font table.
 * Accepts every file unless told otherwise.
 */
export class FakeFontRegistry extends FontRegistryService {
    readonly calls: Array<{ filePath: string; alias: string }> = [];
    private readonly outcomes: boolean[] = [];

    /** Queues answers for the next registrations; afterwards files are accepted */
    answer(...outcomes: boolean[]): this {
        this.outcomes.push(...outcomes);
        return this;
    }

    register(filePath: string, alias: string): boolean {
        this.calls.push({ filePath, alias });
        return this.outcomes.shift() ?? true;
    }
}
