/**
 * Fire-and-forget statement queue.
 *
 * A single async worker runs queued statements one at a time in FIFO
 * order. Callers get no result: execution errors are logged and dropped.
 */

import {QueueError} from "./errors.js";
import {createConsoleLogger, type Logger} from "./logger.js";
import {DEFAULT_QUEUE_INTERVAL} from "./options.js";
import type {SQLValue} from "./values.js";

export interface QueueItem {
	sql: string;
	params: SQLValue[];
}

export type QueueExecutor = (item: QueueItem) => Promise<unknown>;

export interface QueueOptions {
	/** Poll interval in milliseconds while the queue is empty (default: 2000) */
	interval?: number;
	logger?: Logger;
}

export interface StopOptions {
	/**
	 * Run the statements still pending before exiting (default: true).
	 * With false they are dropped.
	 */
	drain?: boolean;
}

export class ExecutionQueue {
	#items: QueueItem[] = [];
	#executor: QueueExecutor;
	#interval: number;
	#logger: Logger;

	#worker: Promise<void> | undefined;
	#wake: (() => void) | undefined;
	#stopping = false;
	#quited = false;

	constructor(executor: QueueExecutor, options: QueueOptions = {}) {
		this.#executor = executor;
		this.#interval = options.interval ?? DEFAULT_QUEUE_INTERVAL;
		this.#logger = options.logger ?? createConsoleLogger();
	}

	/** Number of statements waiting to run */
	get size(): number {
		return this.#items.length;
	}

	get running(): boolean {
		return this.#worker !== undefined && !this.#quited;
	}

	/** True once the worker has exited after stop() */
	get quited(): boolean {
		return this.#quited;
	}

	/**
	 * Start the worker. Calling start() on a running queue does nothing.
	 */
	start(): void {
		if (this.#worker || this.#stopping) return;
		this.#worker = this.#run();
	}

	/**
	 * @throws QueueError after stop() was called
	 */
	push(item: QueueItem): void {
		if (this.#stopping) {
			throw new QueueError("cannot push to a stopped queue");
		}
		this.#items.push(item);
		this.#wake?.();
	}

	/**
	 * Stop the worker. Resolves once the statement in flight has settled
	 * and, when draining, every pending statement has run.
	 */
	async stop(options: StopOptions = {}): Promise<void> {
		this.#stopping = true;
		if (!(options.drain ?? true) && this.#items.length > 0) {
			this.#logger.warn("Dropping queued statements", {
				count: this.#items.length,
			});
			this.#items = [];
		}

		if (!this.#worker) {
			this.#quited = true;
			return;
		}

		this.#wake?.();
		await this.#worker;
	}

	async #run(): Promise<void> {
		while (true) {
			const item = this.#items.shift();
			if (item) {
				try {
					await this.#executor(item);
				} catch (error) {
					this.#logger.warn("Queued statement failed", {sql: item.sql, error});
				}
				continue;
			}

			if (this.#stopping) break;
			await this.#sleep();
		}

		this.#quited = true;
	}

	/**
	 * Wait one poll interval, or less if push() or stop() wakes the worker.
	 */
	#sleep(): Promise<void> {
		return new Promise((resolve) => {
			const done = (): void => {
				clearTimeout(timer);
				this.#wake = undefined;
				resolve();
			};
			const timer = setTimeout(done, this.#interval);
			// An idle queue does not keep the process alive
			timer.unref();
			this.#wake = done;
		});
	}
}
