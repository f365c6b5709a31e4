/**
 * Temp-file-then-rename writes.
 *
 * `stageFile` creates an exclusive temp file beside the target and hands
 * back `commit` (atomic rename over the target) and `release` (remove the
 * temp file unless committed). Callers pair them as
 *
 *   const staged = stageFile(target, { mode: 0o600 });
 *   try {
 *     staged.write(data);
 *     staged.commit();
 *   } finally {
 *     staged.release();
 *   }
 *
 * so a reader never observes a partially written target, and a failure
 * before `commit` leaves no temp file behind.
 */

import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { storageError } from "../errors.js";

export interface StagedFile {
	readonly targetPath: string;
	readonly tempPath: string;
	readonly committed: boolean;
	/** Write all of `data` and fsync. May be called once. */
	write(data: string | Uint8Array): void;
	/** Rename over the target. Disarms `release`. */
	commit(): void;
	/** Remove the temp file if not committed. Idempotent. */
	release(): void;
}

export interface StageFileOptions {
	mode: number;
	/** Suffix appended after the random component. Defaults to ".tmp". */
	suffix?: string;
}

export function stageFile(targetPath: string, options: StageFileOptions): StagedFile {
	const dir = path.dirname(targetPath);
	const tempPath = path.join(
		dir,
		`${path.basename(targetPath)}.${randomBytes(6).toString("hex")}${options.suffix ?? ".tmp"}`,
	);

	let fd: number | null;
	try {
		fd = fs.openSync(tempPath, "wx", options.mode);
	} catch (err) {
		throw storageError("failed to create temporary file", tempPath, err, { target: targetPath });
	}

	let written = false;
	let committed = false;
	let released = false;

	const closeFd = () => {
		if (fd === null) return;
		const current = fd;
		fd = null;
		fs.closeSync(current);
	};

	return {
		targetPath,
		tempPath,
		get committed() {
			return committed;
		},

		write(data) {
			if (fd === null || written) {
				throw storageError("staged file is no longer writable", tempPath);
			}
			written = true;
			try {
				fs.writeFileSync(fd, data);
				fs.fsyncSync(fd);
				// The umask may have narrowed the mode at creation; never widened.
				fs.fchmodSync(fd, options.mode);
			} catch (err) {
				throw storageError("failed to write temporary file", tempPath, err, {
					target: targetPath,
				});
			}
		},

		commit() {
			if (committed) return;
			if (released) {
				throw storageError("staged file was already released", tempPath);
			}
			try {
				closeFd();
				fs.renameSync(tempPath, targetPath);
			} catch (err) {
				throw storageError("failed to replace file", targetPath, err, { tempPath });
			}
			committed = true;
		},

		release() {
			if (released || committed) return;
			released = true;
			try {
				closeFd();
			} catch {
				// The fd is gone either way; removal below is what matters.
			}
			fs.rmSync(tempPath, { force: true });
		},
	};
}
