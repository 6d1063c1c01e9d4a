import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DiagnosticSink } from "@scratchkeeper/diagnostics";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { fsFailure, reportFailure } from "./result.js";
import { copyDirectory } from "./tree-copier.js";
import { clearDirectory } from "./tree-clearer.js";

const throwingSink: DiagnosticSink = {
	report: () => {
		throw new Error("sink down");
	},
};

describe("reportFailure", () => {
	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("returns the failure even when the sink throws", () => {
		const failure = fsFailure("/scratch/a.txt", "delete", new Error("busy"));

		expect(reportFailure(throwingSink, failure)).toBe(failure);
		expect(console.warn).toHaveBeenCalledWith("[scratchkeeper] Error in diagnostic sink (swallowed)", {
			error: "sink down",
		});
	});

	describe("with operations that must not throw", () => {
		let base: string;

		beforeEach(async () => {
			base = await mkdtemp(join(tmpdir(), "report-failure-test-"));
		});

		afterEach(async () => {
			await rm(base, { recursive: true, force: true });
		});

		it("keeps clearDirectory from throwing", () => {
			const result = clearDirectory(join(base, "missing"), false, [], { sink: throwingSink });

			expect(result.failures.map((f) => f.operation)).toEqual(["list"]);
		});

		it("keeps copyDirectory from throwing", () => {
			const result = copyDirectory(join(base, "missing"), join(base, "target"), {
				sink: throwingSink,
			});

			expect(result.ok).toBe(false);
		});
	});
});
