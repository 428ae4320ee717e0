import type { TokenUsage } from './provider.js';

export type CostSnapshot = {
    totalCost: number;
    attempts: number;
    billedAttempts: number;
    promptTokens: number;
    completionTokens: number;
};

/**
 * Per-run cost accumulator handed to every gateway call. add() finishes in
 * one synchronous step, so workers sharing a meter never lose an update.
 */
export class CostMeter {
    private state: CostSnapshot = { totalCost: 0, attempts: 0, billedAttempts: 0, promptTokens: 0, completionTokens: 0 };

    add(cost: number, usage?: TokenUsage): void {
        this.state = {
            totalCost: this.state.totalCost + cost,
            attempts: this.state.attempts + 1,
            billedAttempts: this.state.billedAttempts + (usage ? 1 : 0),
            promptTokens: this.state.promptTokens + (usage?.promptTokens ?? 0),
            completionTokens: this.state.completionTokens + (usage?.completionTokens ?? 0)
        };
    }

    snapshot(): CostSnapshot {
        return { ...this.state };
    }

    get total(): number {
        return this.state.totalCost;
    }
}
