import { Cron } from "croner";
import type { MaintenanceRunState, MaintenanceSchedule, MaintenanceTask } from "./types.js";
import { MaintenanceRunStateSchema } from "./types.js";

const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface MaintenanceRun {
	at: number;
	status: "ok" | "error";
	error: string | null;
}

export interface MaintenanceServiceOptions {
	schedule: MaintenanceSchedule;
	task: MaintenanceTask;
	onRun?: (state: MaintenanceRunState) => void;
	logger?: {
		warn: (msg: string, meta?: Record<string, unknown>) => void;
	};
}

/**
 * Runs a maintenance task on a fixed schedule. The first run happens one
 * interval after `start()`; a failing run is recorded and the schedule
 * keeps going.
 */
export class MaintenanceService {
	private readonly schedule: MaintenanceSchedule;
	private readonly task: MaintenanceTask;
	private readonly onRun?: (state: MaintenanceRunState) => void;
	private readonly logger?: MaintenanceServiceOptions["logger"];
	private timer: ReturnType<typeof setTimeout> | null = null;
	private running = false;
	private state: MaintenanceRunState = MaintenanceRunStateSchema.parse({});

	constructor(options: MaintenanceServiceOptions) {
		this.schedule = options.schedule;
		this.task = options.task;
		this.onRun = options.onRun;
		this.logger = options.logger;
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.armTimer();
	}

	stop(): void {
		this.running = false;
		if (this.timer !== null) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		this.state = { ...this.state, nextRunAt: null };
	}

	isRunning(): boolean {
		return this.running;
	}

	getState(): MaintenanceRunState {
		return { ...this.state };
	}

	/** Outcome of the most recent run, or `null` before the first one. */
	lastRun(): MaintenanceRun | null {
		const { lastRunAt, lastStatus, lastError } = this.state;
		if (lastRunAt === null || lastStatus === null) {
			return null;
		}
		return { at: lastRunAt, status: lastStatus, error: lastError };
	}

	computeNextRun(): number | null {
		const schedule = this.schedule;
		switch (schedule.kind) {
			case "cron": {
				try {
					const cron = new Cron(schedule.cronExpr, {
						timezone: schedule.timezone,
					});
					const next = cron.nextRun();
					return next !== null ? next.getTime() : null;
				} catch {
					return null;
				}
			}
			case "every":
				return Date.now() + schedule.everySeconds * 1000;
		}
	}

	async runNow(): Promise<MaintenanceRunState> {
		try {
			await this.task();
			this.state = { ...this.state, lastRunAt: Date.now(), lastStatus: "ok", lastError: null };
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			this.state = {
				...this.state,
				lastRunAt: Date.now(),
				lastStatus: "error",
				lastError: message,
			};
			this.logger?.warn("Maintenance task failed", { error: message });
		}
		const snapshot = this.getState();
		this.onRun?.(snapshot);
		return snapshot;
	}

	private armTimer(): void {
		if (this.timer !== null) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (!this.running) {
			return;
		}

		const nextRunAt = this.computeNextRun();
		this.state = { ...this.state, nextRunAt };
		if (nextRunAt === null) {
			this.logger?.warn("No upcoming maintenance run; schedule is idle", {
				schedule: this.schedule,
			});
			return;
		}

		this.waitUntil(nextRunAt);
	}

	// setTimeout fires after 1 ms for delays above MAX_TIMER_DELAY_MS, so
	// long waits are split into capped hops.
	private waitUntil(nextRunAt: number): void {
		const delay = Math.min(MAX_TIMER_DELAY_MS, Math.max(0, nextRunAt - Date.now()));
		this.timer = setTimeout(() => {
			void this.onTimer(nextRunAt);
		}, delay);
	}

	private async onTimer(nextRunAt: number): Promise<void> {
		this.timer = null;
		if (!this.running) {
			return;
		}
		if (Date.now() < nextRunAt) {
			this.waitUntil(nextRunAt);
			return;
		}
		await this.runNow();
		this.armTimer();
	}
}
