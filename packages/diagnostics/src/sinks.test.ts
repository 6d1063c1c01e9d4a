import { describe, expect, it, vi } from "vitest";
import { createFailureEvent, createLoggerSink, noopSink } from "./sinks.js";

describe("createLoggerSink", () => {
	it("forwards failures to the logger", () => {
		const warn = vi.fn();
		const sink = createLoggerSink({ warn });
		const event = createFailureEvent({
			ok: false,
			path: "/scratch/a.txt",
			operation: "copy",
			message: "file already exists",
			code: "EEXIST",
		});

		sink.report(event);

		expect(warn).toHaveBeenCalledWith("copy failed: /scratch/a.txt", {
			message: "file already exists",
			code: "EEXIST",
			timestamp: event.timestamp.toISOString(),
		});
	});
});

describe("createFailureEvent", () => {
	it("wraps the failure with a type and timestamp", () => {
		const failure = {
			ok: false as const,
			path: "/scratch",
			operation: "list" as const,
			message: "no such file or directory",
		};
		const event = createFailureEvent(failure);

		expect(event.type).toBe("fs:failure");
		expect(event.failure).toBe(failure);
		expect(event.timestamp).toBeInstanceOf(Date);
	});
});

describe("noopSink", () => {
	it("accepts events without side effects", () => {
		expect(() =>
			noopSink.report(
				createFailureEvent({ ok: false, path: "/x", operation: "rm", message: "nope" }),
			),
		).not.toThrow();
	});
});
