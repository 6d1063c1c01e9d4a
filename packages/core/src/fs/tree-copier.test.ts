import { existsSync, mkdirSync, readFileSync, symlinkSync, writeFileSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DiagnosticSink } from "@scratchkeeper/diagnostics";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { copyDirectory, isSelfCopy } from "./tree-copier.js";

describe("copyDirectory", () => {
	let root: string;
	let source: string;
	let report: ReturnType<typeof vi.fn>;
	let sink: DiagnosticSink;

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), "tree-copier-test-"));
		source = join(root, "source");
		mkdirSync(join(source, "sub", "deep"), { recursive: true });
		writeFileSync(join(source, "a.txt"), "a");
		writeFileSync(join(source, "sub", "b.txt"), "b");
		writeFileSync(join(source, "sub", "deep", "c.txt"), "c");
		report = vi.fn();
		sink = { report };
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("copies the whole tree into a new target", () => {
		const target = join(root, "target");

		const result = copyDirectory(source, target, { sink });

		expect(result).toEqual({ ok: true, copied: 3, failures: [] });
		expect(readFileSync(join(target, "a.txt"), "utf-8")).toBe("a");
		expect(readFileSync(join(target, "sub", "b.txt"), "utf-8")).toBe("b");
		expect(readFileSync(join(target, "sub", "deep", "c.txt"), "utf-8")).toBe("c");
		expect(report).not.toHaveBeenCalled();
	});

	it("copies empty subdirectories", () => {
		mkdirSync(join(source, "empty"));
		const target = join(root, "target");

		copyDirectory(source, target, { sink });

		expect(existsSync(join(target, "empty"))).toBe(true);
	});

	it("refuses to copy into its own subtree without touching the disk", () => {
		const target = join(source, "backup");

		const result = copyDirectory(source, target, { sink });

		expect(result.ok).toBe(false);
		expect(result.copied).toBe(0);
		expect(result.failures[0]?.operation).toBe("copy");
		expect(existsSync(target)).toBe(false);
		expect(report).not.toHaveBeenCalled();
	});

	it("refuses to copy a directory onto itself", () => {
		expect(copyDirectory(source, source, { sink }).ok).toBe(false);
	});

	it("keeps partial success when a file cannot be read", () => {
		symlinkSync(join(root, "does-not-exist"), join(source, "broken.txt"));
		const target = join(root, "target");

		const result = copyDirectory(source, target, { sink });

		expect(result.ok).toBe(false);
		expect(result.copied).toBe(3);
		expect(result.failures).toHaveLength(1);
		expect(result.failures[0]?.path).toBe(join(source, "broken.txt"));
		expect(result.failures[0]?.code).toBe("ENOENT");
		expect(existsSync(join(target, "a.txt"))).toBe(true);
		expect(existsSync(join(target, "sub", "b.txt"))).toBe(true);
		expect(existsSync(join(target, "sub", "deep", "c.txt"))).toBe(true);
		expect(report).toHaveBeenCalledOnce();
	});

	it("keeps existing files when overwrite is off", () => {
		const target = join(root, "target");
		mkdirSync(target);
		writeFileSync(join(target, "a.txt"), "original");

		const result = copyDirectory(source, target, { overwrite: false, sink });

		expect(result.ok).toBe(false);
		expect(result.copied).toBe(2);
		expect(result.failures[0]?.code).toBe("EEXIST");
		expect(readFileSync(join(target, "a.txt"), "utf-8")).toBe("original");
		expect(readFileSync(join(target, "sub", "b.txt"), "utf-8")).toBe("b");
	});

	it("reports a missing source", () => {
		const result = copyDirectory(join(root, "missing"), join(root, "target"), { sink });

		expect(result.ok).toBe(false);
		expect(result.failures[0]?.operation).toBe("list");
		expect(existsSync(join(root, "target"))).toBe(false);
		expect(report).toHaveBeenCalledOnce();
	});
});

describe("isSelfCopy", () => {
	it("matches a nested target", () => {
		expect(isSelfCopy("/data/foo", "/data/foo/bar")).toBe(true);
	});

	it("matches a sibling that shares the prefix", () => {
		expect(isSelfCopy("/data/foo", "/data/foobar")).toBe(true);
	});

	it("does not match an unrelated target", () => {
		expect(isSelfCopy("/data/foo", "/backup/foo-copy")).toBe(false);
	});
});
