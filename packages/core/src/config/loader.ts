import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, resolve } from "node:path";
import { type ScratchKeeperConfig, ScratchKeeperConfigSchema } from "./schema.js";

const DEFAULT_CONFIG_PATH = resolve(homedir(), ".scratchkeeper", "config.json");
const CONFIG_PATH_VAR = "SCRATCHKEEPER_CONFIG";
const ENV_PREFIX = "SCRATCHKEEPER_";
const ENV_DELIMITER = "__";

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads the JSON config file. A missing or malformed file yields `{}`.
 * A relative `appRoot` is taken relative to the file's directory.
 */
function readConfigFile(path: string): ConfigTree {
	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, "utf-8"));
	} catch {
		return {};
	}
	if (!isTree(parsed)) return {};

	const { appRoot } = parsed;
	if (typeof appRoot === "string" && !appRoot.startsWith("~") && !isAbsolute(appRoot)) {
		return { ...parsed, appRoot: resolve(dirname(path), appRoot) };
	}
	return parsed;
}

/**
 * `SCRATCHKEEPER_tenant__path=x` becomes `{ tenant: { path: "x" } }`.
 * Values stay strings; the schema coerces the fields that are not.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): ConfigTree {
	const overrides: ConfigTree = {};
	for (const [key, value] of Object.entries(env)) {
		if (!key.startsWith(ENV_PREFIX) || key === CONFIG_PATH_VAR || value === undefined) continue;

		const segments = key.slice(ENV_PREFIX.length).split(ENV_DELIMITER);
		const leaf = segments.pop();
		if (leaf === undefined || leaf === "") continue;

		let node = overrides;
		for (const segment of segments) {
			const child = node[segment];
			if (isTree(child)) {
				node = child;
			} else {
				const created: ConfigTree = {};
				node[segment] = created;
				node = created;
			}
		}
		node[leaf] = value;
	}
	return overrides;
}

function merge(base: ConfigTree, overrides: ConfigTree): ConfigTree {
	const merged: ConfigTree = { ...base };
	for (const [key, value] of Object.entries(overrides)) {
		const current = merged[key];
		merged[key] = isTree(current) && isTree(value) ? merge(current, value) : value;
	}
	return merged;
}

/**
 * Loads config from `configPath`, `$SCRATCHKEEPER_CONFIG` or
 * `~/.scratchkeeper/config.json`, with environment overrides on top.
 * Top-level sections that fail validation fall back to their defaults;
 * the valid ones are kept.
 */
export function loadConfig(
	configPath?: string,
	env: NodeJS.ProcessEnv = process.env,
): ScratchKeeperConfig {
	const filePath = configPath ?? env[CONFIG_PATH_VAR] ?? DEFAULT_CONFIG_PATH;
	const raw = merge(readConfigFile(filePath), readEnvOverrides(env));

	const first = ScratchKeeperConfigSchema.safeParse(raw);
	if (first.success) {
		return first.data;
	}

	const invalid = new Set(first.error.issues.map((issue) => String(issue.path[0] ?? "")));
	const kept = Object.fromEntries(Object.entries(raw).filter(([key]) => !invalid.has(key)));
	console.warn(
		`[scratchkeeper] Invalid config, using defaults for: ${[...invalid].join(", ")}`,
		first.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
	);

	const second = ScratchKeeperConfigSchema.safeParse(kept);
	return second.success ? second.data : ScratchKeeperConfigSchema.parse({});
}
