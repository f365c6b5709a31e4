import * as readline from "node:readline";

export function isInteractive(): boolean {
	return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export async function prompt(question: string): Promise<string> {
	const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
	return new Promise((resolve) => {
		rl.question(question, (answer) => {
			rl.close();
			resolve(answer);
		});
	});
}

export async function promptYesNo(question: string): Promise<boolean> {
	const answer = await prompt(`${question} [y/N] `);
	return ["y", "yes"].includes(answer.trim().toLowerCase());
}

/**
 * Read a line from the terminal without echoing it. Resolves null on
 * Ctrl+C or empty input.
 */
export async function promptHidden(question: string): Promise<string | null> {
	return new Promise((resolve) => {
		const stdin = process.stdin;
		const wasRaw = stdin.isRaw;
		let input = "";

		process.stdout.write(question);
		stdin.setRawMode(true);

		const finish = (value: string | null) => {
			stdin.setRawMode(wasRaw ?? false);
			stdin.removeListener("data", onData);
			stdin.pause();
			process.stdout.write("\n");
			resolve(value);
		};

		const onData = (chunk: Buffer) => {
			for (const c of chunk.toString("utf-8")) {
				if (c === "\n" || c === "\r") {
					finish(input.length > 0 ? input : null);
					return;
				}
				if (c === "\u0003") {
					finish(null);
					return;
				}
				if (c === "\u007F" || c === "\b") {
					if (input.length > 0) {
						input = input.slice(0, -1);
						process.stdout.write("\b \b");
					}
				} else if (c.charCodeAt(0) >= 32) {
					input += c;
					process.stdout.write("*");
				}
			}
		};

		stdin.on("data", onData);
		stdin.resume();
	});
}

/** Read all of piped stdin, dropping one trailing newline. */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
	}
	const text = Buffer.concat(chunks).toString("utf-8");
	return text.replace(/\r?\n$/, "");
}
