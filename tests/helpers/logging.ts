import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { setLoggerOverride } from "../../src/logging.js";

export const TEST_LOG_FILE = path.join(os.tmpdir(), `credswitch-test-${process.pid}.log`);

/** Silent logging to a per-process temp file. */
export function useTestLogging(): void {
	setLoggerOverride({ level: "silent", file: TEST_LOG_FILE });
}

/**
 * Point logging at a path whose parent is a regular file, so opening the
 * log fails with ENOTDIR.
 */
export function useUnwritableLogging(dir: string): string {
	const blocker = path.join(dir, "not-a-dir");
	fs.writeFileSync(blocker, "");
	const file = path.join(blocker, "logs", "credswitch.log");
	setLoggerOverride({ level: "info", file });
	return file;
}
