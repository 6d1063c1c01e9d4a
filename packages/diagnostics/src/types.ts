export type FsOperation =
	| "delete"
	| "copy"
	| "truncate"
	| "list"
	| "stat"
	| "chmod"
	| "rmdir"
	| "rm"
	| "mkdir";

export interface FsFailure {
	ok: false;
	path: string;
	operation: FsOperation;
	message: string;
	code?: string;
}

export interface FsFailureEvent {
	type: "fs:failure";
	failure: FsFailure;
	timestamp: Date;
}

export type DiagnosticEvent = FsFailureEvent;

export type DiagnosticEventType = DiagnosticEvent["type"];

export type DiagnosticHandler = (event: DiagnosticEvent) => void;

export interface DiagnosticSink {
	report(event: DiagnosticEvent): void;
}

export interface DiagnosticLogger {
	warn: (msg: string, meta?: Record<string, unknown>) => void;
}
