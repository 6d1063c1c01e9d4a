import { existsSync, statSync } from "node:fs";

export function directoryExists(path: string): boolean {
	return existsSync(path) && statSync(path).isDirectory();
}
