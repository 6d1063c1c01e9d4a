import { describe, expect, it } from "vitest";
import { MaintenanceRunStateSchema, MaintenanceScheduleSchema } from "./types.js";

describe("MaintenanceScheduleSchema", () => {
	it("validates cron kind", () => {
		const result = MaintenanceScheduleSchema.safeParse({
			kind: "cron",
			cronExpr: "0 3 * * *",
		});
		expect(result.success).toBe(true);
		if (result.success && result.data.kind === "cron") {
			expect(result.data.cronExpr).toBe("0 3 * * *");
		}
	});

	it("validates cron kind with timezone", () => {
		const result = MaintenanceScheduleSchema.safeParse({
			kind: "cron",
			cronExpr: "0 3 * * *",
			timezone: "Europe/Berlin",
		});
		expect(result.success).toBe(true);
	});

	it("rejects cron kind without cronExpr", () => {
		const result = MaintenanceScheduleSchema.safeParse({ kind: "cron" });
		expect(result.success).toBe(false);
	});

	it("validates every kind", () => {
		const result = MaintenanceScheduleSchema.safeParse({ kind: "every", everySeconds: 3600 });
		expect(result.success).toBe(true);
		if (result.success && result.data.kind === "every") {
			expect(result.data.everySeconds).toBe(3600);
		}
	});

	it("rejects non-positive intervals", () => {
		expect(MaintenanceScheduleSchema.safeParse({ kind: "every", everySeconds: 0 }).success).toBe(
			false,
		);
		expect(MaintenanceScheduleSchema.safeParse({ kind: "every", everySeconds: 1.5 }).success).toBe(
			false,
		);
	});

	it("rejects unknown kinds", () => {
		const result = MaintenanceScheduleSchema.safeParse({ kind: "at", at: "2026-01-01" });
		expect(result.success).toBe(false);
	});
});

describe("MaintenanceRunStateSchema", () => {
	it("defaults every field to null", () => {
		expect(MaintenanceRunStateSchema.parse({})).toEqual({
			nextRunAt: null,
			lastRunAt: null,
			lastStatus: null,
			lastError: null,
		});
	});

	it("rejects unknown statuses", () => {
		expect(MaintenanceRunStateSchema.safeParse({ lastStatus: "pending" }).success).toBe(false);
	});
});
