export class UnauthorizedAccessError extends Error {
	readonly code = "EACCES_DIRECTORY_DELETE";
	readonly path: string;

	constructor(path: string) {
		super(`Deleting folders not possible due to security reasons: ${path}`);
		this.name = "UnauthorizedAccessError";
		this.path = path;
	}
}
