import { healthServerStart, type HealthServerOptions } from "../health/healthServer.js";
import { getLogger } from "../log.js";
import type { SupervisorState } from "./lifecycleTypes.js";

export const DEFAULT_MAX_RESTARTS = 3;
export const DEFAULT_RESTART_DELAY_MS = 5000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

/** One run of the relay as seen by the supervisor. */
export interface SupervisedRuntime {
    run(onReady?: () => void): Promise<void>;
    stop(reason: string): Promise<void>;
}

export type LifecycleSupervisorOptions = {
    runtimeCreate: () => SupervisedRuntime;
    maxRestarts?: number;
    restartDelayMs?: number;
    shutdownTimeoutMs?: number;
    health?: Omit<HealthServerOptions, "getState" | "signal"> | null;
    handleSignals?: boolean;
};

type RunOutcome =
    | { kind: "completed" }
    | { kind: "failed"; error: unknown }
    | { kind: "shutdown"; reason: string };

const logger = getLogger("lifecycle");

/**
 * Owns the process lifetime: health probe, signal handling, graceful stop and a bounded
 * number of failed runs. `run()` resolves with the process exit code.
 */
export class LifecycleSupervisor {
    private options: LifecycleSupervisorOptions;
    private maxRestarts: number;
    private restartDelayMs: number;
    private shutdownTimeoutMs: number;
    private currentState: SupervisorState = "starting";
    private shutdownReason: string | null = null;
    private shutdownRequested: Promise<RunOutcome>;
    private resolveShutdown: (outcome: RunOutcome) => void = () => {};
    private healthAbort: AbortController | null = null;
    private failures = 0;

    constructor(options: LifecycleSupervisorOptions) {
        this.options = options;
        this.maxRestarts = options.maxRestarts ?? DEFAULT_MAX_RESTARTS;
        this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
        this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
        if (!Number.isInteger(this.maxRestarts) || this.maxRestarts < 1) {
            throw new Error(`maxRestarts must be a positive integer, got ${this.maxRestarts}`);
        }
        this.shutdownRequested = new Promise((resolve) => {
            this.resolveShutdown = resolve;
        });
    }

    get state(): SupervisorState {
        return this.currentState;
    }

    requestShutdown(reason: string = "shutdown"): void {
        if (this.shutdownReason !== null) {
            return;
        }
        this.shutdownReason = reason;
        logger.info(`event: Shutdown requested reason=${reason}`);
        this.healthAbort?.abort();
        this.resolveShutdown({ kind: "shutdown", reason });
    }

    async run(): Promise<number> {
        const detachSignals = this.options.handleSignals === false ? () => {} : this.signalsAttach();
        try {
            return await this.loop();
        } finally {
            detachSignals();
        }
    }

    private async loop(): Promise<number> {
        while (true) {
            this.stateSet("starting");
            const healthAbort = new AbortController();
            this.healthAbort = healthAbort;
            const healthStart = this.options.health
                ? healthServerStart({
                      ...this.options.health,
                      getState: () => this.currentState,
                      signal: healthAbort.signal
                  })
                : Promise.resolve(null);

            const outcome = await this.runOnce();
            this.stateSet("shutting_down");
            healthAbort.abort();
            this.healthAbort = null;
            const health = await healthStart;
            await health?.close();
            if (outcome.runtime) {
                await this.runtimeStop(outcome.runtime, outcome.result.kind === "shutdown" ? outcome.result.reason : "failure");
            }

            if (outcome.result.kind !== "failed") {
                this.stateSet("stopped");
                logger.info("stop: Relay stopped");
                return 0;
            }

            if (this.shutdownReason !== null) {
                this.stateSet("stopped");
                logger.warn({ error: outcome.result.error }, "error: Relay run failed during shutdown");
                return 0;
            }

            this.failures += 1;
            logger.error(
                { error: outcome.result.error },
                `error: Relay run failed failures=${this.failures}/${this.maxRestarts}`
            );
            if (this.failures >= this.maxRestarts) {
                this.stateSet("stopped");
                logger.fatal(`error: Restart budget exhausted after ${this.failures} consecutive failed runs`);
                return 1;
            }

            this.stateSet("restarting");
            logger.info(`event: Restarting in ${this.restartDelayMs}ms`);
            const interrupted = await this.restartWait();
            if (interrupted) {
                this.stateSet("stopped");
                return 0;
            }
        }
    }

    private async runOnce(): Promise<{ runtime: SupervisedRuntime | null; result: RunOutcome }> {
        if (this.shutdownReason !== null) {
            return { runtime: null, result: { kind: "shutdown", reason: this.shutdownReason } };
        }
        let runtime: SupervisedRuntime;
        try {
            runtime = this.options.runtimeCreate();
        } catch (error) {
            return { runtime: null, result: { kind: "failed", error } };
        }
        const completion = runtime.run(() => this.runReady()).then(
            (): RunOutcome => ({ kind: "completed" }),
            (error: unknown): RunOutcome => ({ kind: "failed", error })
        );
        const result = await Promise.race([completion, this.shutdownRequested]);
        return { runtime, result };
    }

    private runReady(): void {
        // A run that reached running resets the budget of consecutive failures.
        this.failures = 0;
        this.stateSet("running");
    }

    private async runtimeStop(runtime: SupervisedRuntime, reason: string): Promise<void> {
        const timeout = timeoutCreate(this.shutdownTimeoutMs, false);
        const stopped = runtime.stop(reason).then(
            () => true,
            (error: unknown) => {
                logger.warn({ error }, "error: Runtime stop failed");
                return true;
            }
        );
        try {
            const finished = await Promise.race([stopped, timeout.promise]);
            if (!finished) {
                logger.warn(`event: Runtime stop abandoned after ${this.shutdownTimeoutMs}ms`);
            }
        } finally {
            timeout.cancel();
        }
    }

    private async restartWait(): Promise<boolean> {
        const elapsed = timeoutCreate(this.restartDelayMs, false);
        try {
            return await Promise.race([elapsed.promise, this.shutdownRequested.then(() => true)]);
        } finally {
            elapsed.cancel();
        }
    }

    private signalsAttach(): () => void {
        const handler = (signal: NodeJS.Signals) => {
            this.requestShutdown(signal);
        };
        process.once("SIGINT", handler);
        process.once("SIGTERM", handler);
        return () => {
            process.off("SIGINT", handler);
            process.off("SIGTERM", handler);
        };
    }

    private stateSet(state: SupervisorState): void {
        if (this.currentState === state) {
            return;
        }
        logger.debug(`event: State ${this.currentState} -> ${state}`);
        this.currentState = state;
    }
}

function timeoutCreate<T>(ms: number, value: T): { promise: Promise<T>; cancel: () => void } {
    let timer: NodeJS.Timeout | undefined;
    const promise = new Promise<T>((resolve) => {
        timer = setTimeout(() => resolve(value), ms);
    });
    return {
        promise,
        cancel: () => clearTimeout(timer)
    };
}
