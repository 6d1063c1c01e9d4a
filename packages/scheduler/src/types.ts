import { z } from "zod";

export const MaintenanceScheduleSchema = z.discriminatedUnion("kind", [
	z.object({
		kind: z.literal("cron"),
		cronExpr: z.string(),
		timezone: z.string().optional(),
	}),
	z.object({
		kind: z.literal("every"),
		everySeconds: z.coerce.number().int().positive(),
	}),
]);

export const MaintenanceRunStateSchema = z.object({
	nextRunAt: z.number().nullable().default(null),
	lastRunAt: z.number().nullable().default(null),
	lastStatus: z.enum(["ok", "error"]).nullable().default(null),
	lastError: z.string().nullable().default(null),
});

export type MaintenanceSchedule = z.infer<typeof MaintenanceScheduleSchema>;
export type MaintenanceRunState = z.infer<typeof MaintenanceRunStateSchema>;

export type MaintenanceTask = () => void | Promise<void>;
