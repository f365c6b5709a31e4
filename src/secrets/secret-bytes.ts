/**
 * Zeroizable holder for decrypted secret bytes.
 *
 * `clear()` overwrites every byte with zero and `close()` additionally drops
 * the reference; both are idempotent. Strings produced by `toString()` are
 * ordinary JS strings and cannot be wiped, so prefer `view()` and keep any
 * string copy as short-lived as possible.
 */

export interface SecretBytesHandle {
	readonly closed: boolean;
	readonly length: number;
	toString(): string;
	view(): Buffer;
	/** Zeroize and detach. Safe to call more than once. */
	release(): void;
}

const EMPTY = Buffer.alloc(0);

export class SecretBytes implements SecretBytesHandle {
	private data: Buffer | null;

	constructor(data: Buffer) {
		this.data = data;
	}

	get closed(): boolean {
		return this.data === null;
	}

	get length(): number {
		return this.data?.length ?? 0;
	}

	/** The underlying buffer (not a copy). Empty once closed. */
	view(): Buffer {
		return this.data ?? EMPTY;
	}

	toString(): string {
		return this.data ? this.data.toString("utf-8") : "";
	}

	clear(): void {
		this.data?.fill(0);
	}

	close(): void {
		this.clear();
		this.data = null;
	}

	release(): void {
		this.close();
	}
}

/**
 * Run `fn` with `secret` and close it on every exit path.
 */
export function useSecret<T>(secret: SecretBytes, fn: (secret: SecretBytes) => T): T {
	try {
		return fn(secret);
	} finally {
		secret.close();
	}
}
