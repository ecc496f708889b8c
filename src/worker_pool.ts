// src/worker_pool.ts

import * as os from 'os';
import { consoleLogger } from './logger';
import { describeError, Logger } from './types';

// A deferred unit of work. Tasks handle their own failures; the pool only
// logs what leaks out so one bad task cannot take a worker down.
export type Task = () => void | Promise<void>;

export interface WorkerPoolOptions {
    workerCount?: number;
    logger?: Logger;
}

export function defaultWorkerCount(): number {
    return Math.max(1, os.availableParallelism());
}

// A fixed set of long-lived async workers pulling tasks from one FIFO queue.
// Each worker runs one task to completion before taking the next, so at most
// `size` tasks are in flight. Queue access happens on the single JS thread,
// so a task can only ever be taken by one worker.
export class WorkerPool {
    private readonly queue: Task[] = [];
    private readonly idleWorkers: Array<() => void> = [];
    private readonly workers: Promise<void>[] = [];
    private readonly logger: Logger;
    private running = true;
    private stopped: Promise<void> | null = null;

    constructor(options: WorkerPoolOptions = {}) {
        const workerCount = options.workerCount ?? defaultWorkerCount();
        if (!Number.isInteger(workerCount) || workerCount < 1) {
            throw new RangeError(`Worker count must be a positive integer, got ${workerCount}`);
        }
        this.logger = options.logger ?? consoleLogger;

        for (let i = 0; i < workerCount; i++) {
            this.workers.push(this.workerLoop(i));
        }
    }

    get size(): number {
        return this.workers.length;
    }

    // Tasks waiting for a worker; does not count the ones already running.
    get pending(): number {
        return this.queue.length;
    }

    submit(task: Task): void {
        if (!this.running) {
            throw new Error('Pool is shutting down, cannot submit');
        }
        this.queue.push(task);
        this.idleWorkers.shift()?.();
    }

    // Stops intake, lets the workers drain the queue and waits for all of them.
    shutdown(): Promise<void> {
        if (this.stopped === null) {
            this.running = false;
            for (const wake of this.idleWorkers.splice(0)) {
                wake();
            }
            this.stopped = Promise.all(this.workers).then(() => undefined);
        }
        return this.stopped;
    }

    private waitForWork(): Promise<void> {
        return new Promise((resolve) => this.idleWorkers.push(resolve));
    }

    private async workerLoop(workerId: number): Promise<void> {
        while (true) {
            const task = this.queue.shift();
            if (task === undefined) {
                if (!this.running) {
                    return;
                }
                await this.waitForWork();
                continue;
            }

            try {
                await task();
            } catch (e) {
                this.logger.error(`[pool] task on worker ${workerId} failed: ${describeError(e)}`);
            }
        }
    }
}
