import { EventEmitter } from "node:events";
import type {
	DiagnosticEvent,
	DiagnosticHandler,
	DiagnosticLogger,
	DiagnosticSink,
} from "./types.js";

export interface DiagnosticBusOptions {
	logger?: DiagnosticLogger;
}

/**
 * Synchronous fan-out of diagnostic events. Handlers run in subscription
 * order; a throwing handler is logged and never reaches the reporter.
 */
export class DiagnosticBus implements DiagnosticSink {
	private readonly emitter = new EventEmitter();
	private readonly logger?: DiagnosticLogger;

	constructor(options?: DiagnosticBusOptions) {
		this.logger = options?.logger;
	}

	subscribe(handler: DiagnosticHandler): void {
		this.emitter.on("fs:failure", handler);
	}

	unsubscribe(handler: DiagnosticHandler): void {
		this.emitter.removeListener("fs:failure", handler);
	}

	report(event: DiagnosticEvent): void {
		const handlers = this.emitter.listeners(event.type) as DiagnosticHandler[];
		for (const handler of handlers) {
			try {
				handler(event);
			} catch (err) {
				this.logger?.warn("Error in diagnostic handler (swallowed)", {
					error: err instanceof Error ? err.message : String(err),
				});
			}
		}
	}

	close(): void {
		this.emitter.removeAllListeners();
	}
}
