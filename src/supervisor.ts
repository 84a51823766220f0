import type { Logger } from "./logger.js";

export interface WorkerExit {
  id: number;
  pid?: number;
  code: number | null;
  signal: string | null;
  exitedAfterDisconnect: boolean;
}

export interface SupervisorOptions {
  logger: Logger;
  fork: () => void;
  exit: (code: number) => void;
  maxRestarts?: number;
  windowMs?: number;
  now?: () => number;
}

/**
 * Replaces workers that die while serving. A worker that dies before it
 * ever listened, or too many crashes inside `windowMs`, stops the primary
 * with exit code 1.
 */
export class WorkerSupervisor {
  private readonly listening = new Set<number>();
  private restarts: number[] = [];
  private stopped = false;
  private readonly maxRestarts: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(private readonly options: SupervisorOptions) {
    this.maxRestarts = options.maxRestarts ?? 5;
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  start(workers: number): void {
    for (let i = 0; i < workers; i++) {
      this.options.fork();
    }
  }

  onListening(id: number): void {
    this.listening.add(id);
  }

  onExit(worker: WorkerExit): void {
    const { logger } = this.options;
    const wasListening = this.listening.delete(worker.id);
    const reason = worker.signal ?? worker.code;

    if (this.stopped) {
      return;
    }

    if (worker.exitedAfterDisconnect) {
      logger.info(`Worker ${worker.pid} stopped (${reason})`);
      return;
    }

    if (!wasListening) {
      logger.error(
        `Worker ${worker.pid} failed during startup (${reason}), shutting down`
      );
      this.stop();
      return;
    }

    const now = this.now();
    this.restarts = this.restarts.filter((at) => now - at < this.windowMs);
    if (this.restarts.length >= this.maxRestarts) {
      const crashes = this.restarts.length + 1;
      logger.error(
        `Workers crashed ${crashes} times in ${this.windowMs}ms, shutting down`
      );
      this.stop();
      return;
    }

    this.restarts.push(now);
    logger.warn(
      `Worker ${worker.pid} exited (${reason}), starting a replacement`
    );
    this.options.fork();
  }

  private stop(): void {
    this.stopped = true;
    this.options.exit(1);
  }
}
