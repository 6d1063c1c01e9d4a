import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import type { ScratchKeeperConfig } from "../config/schema.js";

export type ScratchRootKind = "global" | "tenant";

export interface ScratchRootConfig {
	globalTempDir: string;
	tenantTempDir: string;
}

/** Supplies the current tenant's base path at call time. */
export interface TenantContext {
	tenantPath(): string;
}

const TENANT_TEMP_DIR = "_temp";

function expandTilde(p: string): string {
	return p.startsWith("~") ? p.replace("~", homedir()) : p;
}

export function resolveAppPath(inputPath: string, appRoot: string): string {
	const expanded = expandTilde(inputPath);
	if (isAbsolute(expanded)) {
		return resolve(expanded);
	}
	return resolve(expandTilde(appRoot), expanded);
}

export function toScratchRootConfig(config: ScratchKeeperConfig): ScratchRootConfig {
	return {
		globalTempDir: resolveAppPath(config.tempDirectory, config.appRoot),
		tenantTempDir: join(resolveAppPath(config.tenant.path, config.appRoot), TENANT_TEMP_DIR),
	};
}

export class ScratchPathResolver {
	private readonly roots: ScratchRootConfig;
	private readonly tenant?: TenantContext;

	constructor(roots: ScratchRootConfig, tenant?: TenantContext) {
		this.roots = roots;
		this.tenant = tenant;
	}

	/** Physical path of a scratch root, without touching the filesystem. */
	rootPath(kind: ScratchRootKind): string {
		if (kind === "global") {
			return this.roots.globalTempDir;
		}
		if (this.tenant !== undefined) {
			return join(this.tenant.tenantPath(), TENANT_TEMP_DIR);
		}
		return this.roots.tenantTempDir;
	}

	/**
	 * Returns the scratch root (or `subdirectory` beneath it), creating
	 * directories as needed. Creation errors propagate.
	 */
	resolveScratchRoot(kind: ScratchRootKind, subdirectory?: string): string {
		const root = this.rootPath(kind);
		mkdirSync(root, { recursive: true });

		if (subdirectory === undefined || subdirectory === "") {
			return root;
		}

		const nested = join(root, subdirectory);
		mkdirSync(nested, { recursive: true });
		return nested;
	}
}
