import { readFileSync } from "node:fs";
import { parse } from "dotenv";
import { ConfigurationError } from "../error.js";

/**
 * Read a `KEY=VALUE` file without touching `process.env`.
 * `#` comments and blank lines are ignored.
 *
 * @throws {ConfigurationError} If the file cannot be read.
 */
export function readEnvFile(
	path: string,
	description: string,
): Record<string, string> {
	let contents: string;
	try {
		contents = readFileSync(path, "utf8");
	} catch (error) {
		const code =
			error instanceof Error && "code" in error ? String(error.code) : "";
		throw new ConfigurationError({
			message:
				code === "ENOENT"
					? `${description} file not found: ${path}`
					: `Cannot read ${description} file ${path}`,
			cause: error,
		});
	}
	return parse(contents);
}
