import type { DiagnosticSink } from "@scratchkeeper/diagnostics";
import type { ScratchKeeperConfig } from "../config/schema.js";
import type { FsResult } from "../fs/result.js";
import { resolveSink } from "../fs/result.js";
import { countFiles, copyFile, deleteFile, truncateFile } from "../fs/safe-file-ops.js";
import { type ClearResult, clearDirectory } from "../fs/tree-clearer.js";
import { type TreeCopyResult, copyDirectory } from "../fs/tree-copier.js";
import { allocateUniqueName } from "./name-allocator.js";
import {
	type ScratchRootConfig,
	ScratchPathResolver,
	type TenantContext,
	toScratchRootConfig,
} from "./path-resolver.js";
import { type SweepResult, sweepStaleFiles } from "./stale-sweeper.js";

interface ScratchSpaceBaseOptions {
	tenant?: TenantContext;
	sink?: DiagnosticSink;
}

export type ScratchSpaceOptions = ScratchSpaceBaseOptions &
	({ roots: ScratchRootConfig } | { config: ScratchKeeperConfig });

/**
 * One handle on the application's scratch roots. Every operation except
 * `tempDir`/`tenantTempDir` reports failures to the sink instead of
 * throwing (`deleteFile` still refuses directories).
 */
export class ScratchSpace {
	readonly resolver: ScratchPathResolver;
	private readonly sink: DiagnosticSink;

	constructor(options: ScratchSpaceOptions) {
		const roots = "roots" in options ? options.roots : toScratchRootConfig(options.config);
		this.resolver = new ScratchPathResolver(roots, options.tenant);
		this.sink = resolveSink(options);
	}

	static fromConfig(
		config: ScratchKeeperConfig,
		options: ScratchSpaceBaseOptions = {},
	): ScratchSpace {
		return new ScratchSpace({ ...options, config });
	}

	tempDir(subdirectory?: string): string {
		return this.resolver.resolveScratchRoot("global", subdirectory);
	}

	tenantTempDir(subdirectory?: string): string {
		return this.resolver.resolveScratchRoot("tenant", subdirectory);
	}

	sweepStaleTempFiles(now?: number): SweepResult {
		const roots = [this.resolver.rootPath("global"), this.resolver.rootPath("tenant")];
		return sweepStaleFiles(roots, { sink: this.sink, now });
	}

	clearDirectory(path: string, removeSelf: boolean, exceptNames?: readonly string[]): ClearResult {
		return clearDirectory(path, removeSelf, exceptNames, { sink: this.sink });
	}

	copyDirectory(source: string, target: string, overwrite = true): TreeCopyResult {
		return copyDirectory(source, target, { overwrite, sink: this.sink });
	}

	deleteFile(path: string): FsResult {
		return deleteFile(path, { sink: this.sink });
	}

	copyFile(source: string, destination: string, overwrite = true, deleteSource = false): FsResult {
		return copyFile(source, destination, { overwrite, deleteSource, sink: this.sink });
	}

	truncateFile(path: string): void {
		truncateFile(path, { sink: this.sink });
	}

	countFiles(directoryPath: string): number {
		return countFiles(directoryPath, { sink: this.sink });
	}

	allocateUniqueName(parentDirectory: string, desiredName?: string): string {
		return allocateUniqueName(parentDirectory, desiredName);
	}
}
