/**
 * Argument quoting for generated launcher scripts.
 */

// Order matters: backticks first, so escapes added below are not doubled.
const POWERSHELL_ESCAPES: ReadonlyArray<readonly [string, string]> = [
	["`", "``"],
	["$", "`$"],
	['"', '`"'],
	[";", "`;"],
	["|", "`|"],
	["'", "''"],
	["\n", "`n"],
	["\r", "`r"],
	["\t", "`t"],
	["\b", "`b"],
	["\0", "`0"],
];

/**
 * Quote `arg` as a single PowerShell argument.
 *
 * The value is wrapped in single quotes with embedded single quotes doubled.
 * Backtick, dollar sign, double quote, semicolon, pipe and control
 * characters are additionally backtick-escaped, so the literal stays inert
 * even if it ends up interpolated outside its quotes. Never throws.
 */
export function escapeShellArg(arg: string): string {
	let escaped = arg;
	for (const [from, to] of POWERSHELL_ESCAPES) {
		escaped = escaped.split(from).join(to);
	}
	return `'${escaped}'`;
}

/**
 * Plain PowerShell single-quoted literal for paths the launcher itself
 * opens, where the value must round-trip exactly.
 */
export function powerShellLiteral(value: string): string {
	return `'${value.replaceAll("'", "''")}'`;
}

// Words made only of these characters need no quoting in sh.
const POSIX_BARE_WORD = /^[A-Za-z0-9_/.,:@%+-]+$/;

/**
 * Quote `arg` as a single POSIX sh word. Anything but a plain word is
 * single-quoted, with embedded single quotes written as '\''.
 */
export function posixQuote(arg: string): string {
	if (POSIX_BARE_WORD.test(arg)) return arg;
	return `'${arg.replaceAll("'", "'\\''")}'`;
}
