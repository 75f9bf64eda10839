/**
 * ShutdownCoordinator
 *
 * Turns SIGINT/SIGTERM into an aborted AbortSignal plus an ordered teardown.
 * Teardown steps run in registration order, each at most once and each
 * bounded by the grace period. A second signal while shutting down exits
 * immediately with code 1.
 */

import { toError } from "../errors/app.errors";
import { silentLogger, type Logger } from "../utils/logger.util";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

/** The slice of `process` the coordinator touches */
export interface ProcessLike {
  on(event: ShutdownSignal, listener: () => void): unknown;
  exit(code: number): void;
}

export type TeardownStep = () => Promise<void> | void;

export interface ShutdownCoordinatorOptions {
  process?: ProcessLike;
  logger?: Logger;
  /** Upper bound for a single teardown step */
  stepTimeoutMs?: number;
}

const DEFAULT_STEP_TIMEOUT_MS = 5_000;

export class ShutdownCoordinator {
  private readonly controller = new AbortController();
  private readonly proc: ProcessLike;
  private readonly logger: Logger;
  private readonly stepTimeoutMs: number;
  private readonly steps: { name: string; run: TeardownStep }[] = [];
  private shutdown: Promise<void> | null = null;
  private installed = false;

  constructor(options: ShutdownCoordinatorOptions = {}) {
    this.proc = options.process ?? process;
    this.logger = options.logger ?? silentLogger;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.shutdown !== null;
  }

  register(name: string, run: TeardownStep): void {
    this.steps.push({ name, run });
  }

  install(): this {
    if (this.installed) return this;
    this.installed = true;
    for (const sig of ["SIGINT", "SIGTERM"] as const) {
      this.proc.on(sig, () => this.onSignal(sig));
    }
    return this;
  }

  /**
   * Abort and tear down. Repeated calls share the first call's promise.
   */
  trigger(reason: string): Promise<void> {
    if (!this.shutdown) {
      this.logger.info(`Shutting down (${reason})`);
      this.controller.abort();
      this.shutdown = this.runSteps();
    }
    return this.shutdown;
  }

  private onSignal(sig: ShutdownSignal): void {
    if (this.shutdown) {
      this.logger.warn(`Received ${sig} again, exiting now`);
      this.proc.exit(1);
      return;
    }
    this.trigger(sig).catch((err: unknown) => {
      this.logger.error("Teardown failed", toError(err));
    });
  }

  private async runSteps(): Promise<void> {
    for (const step of this.steps) {
      try {
        await this.withTimeout(step);
        this.logger.debug(`Teardown step done: ${step.name}`);
      } catch (err) {
        this.logger.error(`Teardown step "${step.name}" failed`, toError(err));
      }
    }
  }

  private withTimeout(step: { name: string; run: TeardownStep }): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`timed out after ${this.stepTimeoutMs}ms`));
      }, this.stepTimeoutMs);

      Promise.resolve()
        .then(() => step.run())
        .then(
          () => {
            clearTimeout(timer);
            resolve();
          },
          (err: unknown) => {
            clearTimeout(timer);
            reject(toError(err));
          },
        );
    });
  }
}
