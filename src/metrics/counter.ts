export interface RunCounters {
    received: number;
    validated: number;
    clamped: number;
    scored: number;
    dropped_invalid: number;
}

function zeroCounters(): RunCounters {
    return {
        received: 0,
        validated: 0,
        clamped: 0,
        scored: 0,
        dropped_invalid: 0,
    };
}

export class Metrics {
    private counters = zeroCounters();

    incrementReceived(): void {
        this.counters.received++;
    }

    incrementValidated(): void {
        this.counters.validated++;
    }

    incrementClamped(): void {
        this.counters.clamped++;
    }

    incrementScored(by = 1): void {
        this.counters.scored += by;
    }

    incrementDroppedInvalid(): void {
        this.counters.dropped_invalid++;
    }

    getCounters(): RunCounters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = zeroCounters();
    }
}
