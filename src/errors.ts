/**
 * Error kinds for the secret lifecycle.
 *
 * Every failure carries a kind the CLI layer can switch on, an optional
 * narrower reason, and a flat string context (paths, hints). Messages and
 * context values never include secret material.
 */

export type CredentialErrorKind =
	| "storage"
	| "format"
	| "crypto"
	| "validation"
	| "recovery-required";

export type StorageReason = "not-found" | "permission-denied" | "io";
export type FormatReason = "empty" | "missing-recipient" | "corrupted" | "mismatch";
export type CryptoReason =
	| "truncated"
	| "authentication-failed"
	| "key-agreement-failed"
	| "phrase-mismatch";

export type CredentialErrorReason = StorageReason | FormatReason | CryptoReason;

export type ErrorContext = Record<string, string>;

export class CredentialError extends Error {
	readonly kind: CredentialErrorKind;
	readonly reason?: CredentialErrorReason;
	readonly context: ErrorContext;

	constructor(
		kind: CredentialErrorKind,
		message: string,
		options: { reason?: CredentialErrorReason; context?: ErrorContext; cause?: unknown } = {},
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = "CredentialError";
		this.kind = kind;
		this.reason = options.reason;
		this.context = { ...options.context };
	}

	get hint(): string | undefined {
		return this.context.hint;
	}
}

function errnoCode(err: unknown): string | undefined {
	if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
		return err.code;
	}
	return undefined;
}

function storageReason(cause: unknown): StorageReason {
	switch (errnoCode(cause)) {
		case "ENOENT":
			return "not-found";
		case "EACCES":
		case "EPERM":
			return "permission-denied";
		default:
			return "io";
	}
}

/**
 * Filesystem failure. The reason is derived from the errno code of `cause`
 * unless given explicitly.
 */
export function storageError(
	message: string,
	path: string,
	cause?: unknown,
	extra: ErrorContext = {},
): CredentialError {
	const code = errnoCode(cause);
	return new CredentialError("storage", message, {
		reason: storageReason(cause),
		context: { path, ...(code ? { code } : {}), ...extra },
		cause,
	});
}

export function formatError(
	message: string,
	reason: FormatReason,
	context: ErrorContext = {},
	cause?: unknown,
): CredentialError {
	return new CredentialError("format", message, { reason, context, cause });
}

export function cryptoError(
	message: string,
	reason: CryptoReason,
	context: ErrorContext = {},
	cause?: unknown,
): CredentialError {
	return new CredentialError("crypto", message, { reason, context, cause });
}

export function validationError(message: string, context: ErrorContext = {}): CredentialError {
	return new CredentialError("validation", message, { context });
}

/**
 * Rollback itself failed. The backup named in the context is the only copy
 * of the key that still matches the secrets file.
 */
export function recoveryRequiredError(
	message: string,
	backupPath: string,
	cause?: unknown,
	extra: ErrorContext = {},
): CredentialError {
	return new CredentialError("recovery-required", message, {
		context: {
			backupPath,
			hint: `Manual recovery required: copy ${backupPath} over your key file before running any other command`,
			...extra,
		},
		cause,
	});
}

export function isCredentialError(err: unknown): err is CredentialError {
	return err instanceof CredentialError;
}

export function isNotFound(err: unknown): boolean {
	return isCredentialError(err) && err.kind === "storage" && err.reason === "not-found";
}

/** Attach a hint without losing the original kind and reason. */
export function withHint(err: CredentialError, hint: string): CredentialError {
	if (err.context.hint) return err;
	return new CredentialError(err.kind, err.message, {
		reason: err.reason,
		context: { ...err.context, hint },
		cause: err.cause,
	});
}

/**
 * Render an error for terminal output: "<kind>: <message> (k=v, ...)".
 * The hint is returned separately so callers can print it on its own line.
 */
export function describeError(err: unknown): { summary: string; hint?: string } {
	if (!isCredentialError(err)) {
		return { summary: err instanceof Error ? err.message : String(err) };
	}
	const details = Object.entries(err.context)
		.filter(([key]) => key !== "hint")
		.map(([key, value]) => `${key}=${value}`);
	const suffix = details.length > 0 ? ` (${details.join(", ")})` : "";
	return { summary: `${err.kind}: ${err.message}${suffix}`, hint: err.hint };
}
