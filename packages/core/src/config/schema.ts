import { MaintenanceScheduleSchema } from "@scratchkeeper/scheduler";
import { z } from "zod";

export const TenantConfigSchema = z.object({
	path: z.string().default("App_Data/Tenants/Default"),
});

// Environment overrides arrive as strings.
const flag = z.preprocess(
	(value) => (value === "true" ? true : value === "false" ? false : value),
	z.boolean(),
);

export const MaintenanceConfigSchema = z.object({
	enabled: flag.default(true),
	schedule: MaintenanceScheduleSchema.default({ kind: "every", everySeconds: 3600 }),
});

export const ScratchKeeperConfigSchema = z.object({
	appRoot: z.string().default("."),
	tempDirectory: z.string().default("App_Data/_temp"),
	tenant: TenantConfigSchema.default({}),
	maintenance: MaintenanceConfigSchema.default({}),
});

export type TenantConfig = z.infer<typeof TenantConfigSchema>;
export type MaintenanceConfig = z.infer<typeof MaintenanceConfigSchema>;
export type ScratchKeeperConfig = z.infer<typeof ScratchKeeperConfigSchema>;
