/**
 * Periodic Task
 * =============
 *
 * Cancellable replacement for `setInterval` loops.
 *
 * - Each tick is awaited before the next delay starts, so a slow tick delays
 *   the following one instead of overlapping with it.
 * - The interval is re-read before every delay, so a live setting takes effect
 *   on the next tick.
 * - `stop()` interrupts the pending delay and waits for an in-flight tick to
 *   finish before resolving.
 *
 * Events:
 * - 'tick' (count): emitted after every completed run
 */

import { EventEmitter } from 'events';
import type { Logger } from '../logging/agent-logger';
import { sleep } from './sleep';

export interface PeriodicTaskOptions {
	name: string;
	/** Milliseconds between ticks, or a reader evaluated before each delay */
	intervalMs: number | (() => number);
	run: () => Promise<void> | void;
	logger: Logger;
	/** Run once right after start() instead of waiting one interval first */
	runImmediately?: boolean;
}

export class PeriodicTask extends EventEmitter {
	private controller?: AbortController;
	private loop?: Promise<void>;
	private tickCount = 0;

	constructor(private readonly options: PeriodicTaskOptions) {
		super();
	}

	public start(): void {
		if (this.loop) {
			return;
		}

		this.controller = new AbortController();
		this.loop = this.runLoop(this.controller.signal);
		this.options.logger.debug(`Started ${this.options.name}`, { task: this.options.name });
	}

	public async stop(): Promise<void> {
		if (!this.loop) {
			return;
		}

		this.controller?.abort();
		await this.loop;
		this.loop = undefined;
		this.options.logger.debug(`Stopped ${this.options.name}`, { task: this.options.name, ticks: this.tickCount });
	}

	public isRunning(): boolean {
		return this.loop !== undefined && this.controller?.signal.aborted === false;
	}

	public getTickCount(): number {
		return this.tickCount;
	}

	private async runLoop(signal: AbortSignal): Promise<void> {
		if (this.options.runImmediately) {
			await this.tick();
		}

		while (!signal.aborted) {
			const elapsed = await sleep(this.currentInterval(), signal);
			if (!elapsed) {
				break;
			}
			await this.tick();
		}
	}

	private currentInterval(): number {
		const { intervalMs } = this.options;
		return typeof intervalMs === 'function' ? intervalMs() : intervalMs;
	}

	private async tick(): Promise<void> {
		try {
			await this.options.run();
		} catch (error) {
			this.options.logger.error(`${this.options.name} tick failed`, error, { task: this.options.name });
		}
		this.tickCount++;
		this.emit('tick', this.tickCount);
	}
}
