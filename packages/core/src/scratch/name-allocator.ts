import { randomUUID } from "node:crypto";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { directoryExists } from "../fs/stat.js";

const MAX_SUFFIX = 999_999;

/**
 * Returns a name not yet taken under `parentDirectory`: the desired name,
 * or the first of `name1`, `name2`, ... that is free. Without a desired
 * name a random UUID is used. Gives up after 999,998 suffixes and returns
 * the last one tried.
 */
export function allocateUniqueName(parentDirectory: string, desiredName?: string): string {
	const baseName = desiredName !== undefined && desiredName !== "" ? desiredName : randomUUID();

	if (parentDirectory === "" || !directoryExists(parentDirectory)) {
		return baseName;
	}

	let name = baseName;
	for (let i = 1; i < MAX_SUFFIX && existsSync(join(parentDirectory, name)); i++) {
		name = `${baseName}${i}`;
	}
	return name;
}
