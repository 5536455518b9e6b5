import { logger } from "../logger";
import { BreakerOpenError, CancelledError, errorMessage } from "../errors";
import { toIso } from "../utils/time";

export type BreakerState = "closed" | "open" | "half-open";

/** How a rejected call counts towards the breaker. */
export type OutcomeKind = "failure" | "success" | "ignore";

export type BreakerTransition = {
    name: string;
    from: BreakerState;
    to: BreakerState;
    at: number;
};

export type CircuitBreakerConfig = {
    name: string;
    /** Requests needed in the window before the breaker may trip */
    minimumRequests: number;
    failureRatio: number;
    cooldownMs: number;
    windowMs: number;
    classify?: (err: unknown) => OutcomeKind;
    onStateChange?: (transition: BreakerTransition) => void;
};

export interface CircuitState {
    name: string;
    state: BreakerState;
    requests: number;
    failures: number;
    openUntil: number | null;
    lastTransitionAt: number;
}

type Outcome = { at: number; failed: boolean };

function defaultClassify(err: unknown): OutcomeKind {
    return err instanceof CancelledError ? "ignore" : "failure";
}

export class CircuitBreaker {
    private state: BreakerState = "closed";
    private outcomes: Outcome[] = [];
    private openUntil = 0;
    private probeInFlight = false;
    private lastTransitionAt = Date.now();
    /** Bumped on every transition; outcomes from an older generation are dropped. */
    private generation = 0;

    constructor(private readonly config: CircuitBreakerConfig) {}

    get name(): string {
        return this.config.name;
    }

    currentState(): BreakerState {
        if (this.state === "open" && Date.now() >= this.openUntil) {
            this.transition("half-open");
        }
        return this.state;
    }

    isOpen(): boolean {
        return this.currentState() === "open";
    }

    /**
     * Admits or rejects a call. In half-open state only the first caller
     * gets through as the probe.
     */
    guard(): boolean {
        const state = this.currentState();

        if (state === "closed") return true;

        if (state === "half-open" && !this.probeInFlight) {
            this.probeInFlight = true;
            logger.info({ name: this.config.name }, "Circuit breaker admitting probe request");
            return true;
        }

        logger.warn(
            {
                name: this.config.name,
                state,
                openUntil: toIso(this.openUntil),
            },
            "Circuit breaker open, skipping external call"
        );
        return false;
    }

    success(): void {
        if (this.state === "open") return;

        if (this.state === "half-open") {
            this.probeInFlight = false;
            this.outcomes = [];
            this.transition("closed");
            logger.info({ name: this.config.name }, "Circuit breaker reset after successful probe");
            return;
        }
        this.record(false);
    }

    failure(err?: unknown): void {
        if (this.state === "open") {
            logger.debug({ name: this.config.name, error: errorMessage(err) }, "Ignoring failure while open");
            return;
        }

        if (this.state === "half-open") {
            this.probeInFlight = false;
            this.trip(err);
            return;
        }

        this.record(true);

        const { requests, failures } = this.counts();
        const ratio = failures / requests;

        if (requests >= this.config.minimumRequests && ratio >= this.config.failureRatio) {
            this.trip(err);
        } else {
            logger.warn(
                {
                    name: this.config.name,
                    requests,
                    failures,
                    error: errorMessage(err),
                },
                "External call failed"
            );
        }
    }

    /** Frees the probe slot without counting the call either way. */
    release(): void {
        this.probeInFlight = false;
    }

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (!this.guard()) {
            throw new BreakerOpenError(this.config.name, this.openUntil);
        }

        const generation = this.generation;

        let result: T;
        try {
            result = await fn();
        } catch (err) {
            if (generation !== this.generation) throw err;

            const kind = (this.config.classify ?? defaultClassify)(err);
            if (kind === "failure") this.failure(err);
            else if (kind === "success") this.success();
            else this.release();
            throw err;
        }

        if (generation === this.generation) this.success();
        return result;
    }

    snapshot(): CircuitState {
        const state = this.currentState();
        const { requests, failures } = this.counts();
        return {
            name: this.config.name,
            state,
            requests,
            failures,
            openUntil: state === "open" ? this.openUntil : null,
            lastTransitionAt: this.lastTransitionAt,
        };
    }

    private trip(err: unknown): void {
        this.openUntil = Date.now() + this.config.cooldownMs;
        this.outcomes = [];
        this.transition("open");

        logger.error(
            {
                name: this.config.name,
                cooldownMs: this.config.cooldownMs,
                openUntil: toIso(this.openUntil),
                error: errorMessage(err),
            },
            "Circuit breaker opened"
        );
    }

    private record(failed: boolean): void {
        const now = Date.now();
        this.outcomes.push({ at: now, failed });
        this.prune(now);
    }

    private prune(now: number): void {
        const horizon = now - this.config.windowMs;
        this.outcomes = this.outcomes.filter((outcome) => outcome.at > horizon);
    }

    private counts(): { requests: number; failures: number } {
        this.prune(Date.now());
        return {
            requests: this.outcomes.length,
            failures: this.outcomes.filter((outcome) => outcome.failed).length,
        };
    }

    private transition(to: BreakerState): void {
        const from = this.state;
        if (from === to) return;

        this.state = to;
        this.generation++;
        this.lastTransitionAt = Date.now();

        logger.info({ name: this.config.name, from, to }, "Circuit breaker state changed");
        this.config.onStateChange?.({ name: this.config.name, from, to, at: this.lastTransitionAt });
    }
}
