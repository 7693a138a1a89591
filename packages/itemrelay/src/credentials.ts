import createDebug from "debug";
import { ConfigurationError, MissingCredentialsError } from "./error.js";
import { readEnvFile } from "./lib/env-file.js";

const debug = createDebug("itemrelay:credentials");

export const ACCOUNT_ID_VARIABLE = "ACCOUNT_ID";
export const API_KEY_VARIABLE = "API_KEY";

/**
 * Account id and API key used to log in to the service.
 */
export interface Credentials {
	readonly accountId: string;
	readonly apiKey: string;
}

export type CredentialsSource = "explicit" | "file" | "environment";

export interface CredentialsInit {
	accountId?: string;
	apiKey?: string;
	/**
	 * Path of a `KEY=VALUE` file defining `ACCOUNT_ID` and `API_KEY`.
	 * When given, the file must exist.
	 */
	credentialsFile?: string;
}

/**
 * Resolve credentials from, in order of precedence:
 *
 * 1. explicit `accountId` / `apiKey`
 * 2. the named credentials file
 * 3. `ACCOUNT_ID` / `API_KEY` in `env`
 *
 * A source is used only when it supplies both values. `env` is only read.
 *
 * @throws {ConfigurationError} If explicit arguments or the named file are incomplete,
 * or the file cannot be read.
 * @throws {MissingCredentialsError} If no source supplies credentials.
 */
export function resolveCredentials(
	init: CredentialsInit,
	env: NodeJS.ProcessEnv = process.env,
): Credentials & { source: CredentialsSource } {
	const { accountId, apiKey, credentialsFile } = init;

	if (accountId || apiKey) {
		if (!accountId || !apiKey) {
			throw new ConfigurationError({
				message: accountId
					? "apiKey must be given together with accountId"
					: "accountId must be given together with apiKey",
			});
		}
		debug("using explicit credentials");
		return freeze(accountId, apiKey, "explicit");
	}

	if (credentialsFile !== undefined) {
		const values = readEnvFile(credentialsFile, "Credentials");
		const fileAccountId = values[ACCOUNT_ID_VARIABLE];
		const fileApiKey = values[API_KEY_VARIABLE];
		if (!fileAccountId || !fileApiKey) {
			throw new ConfigurationError({
				message: `Credentials file ${credentialsFile} must define ${ACCOUNT_ID_VARIABLE} and ${API_KEY_VARIABLE}`,
			});
		}
		debug("using credentials from %s", credentialsFile);
		return freeze(fileAccountId, fileApiKey, "file");
	}

	const envAccountId = env[ACCOUNT_ID_VARIABLE];
	const envApiKey = env[API_KEY_VARIABLE];
	if (envAccountId && envApiKey) {
		debug("using credentials from environment");
		return freeze(envAccountId, envApiKey, "environment");
	}

	throw new MissingCredentialsError(
		envAccountId || envApiKey
			? `Only one of ${ACCOUNT_ID_VARIABLE} and ${API_KEY_VARIABLE} is set`
			: undefined,
	);
}

function freeze(
	accountId: string,
	apiKey: string,
	source: CredentialsSource,
): Credentials & { source: CredentialsSource } {
	return Object.freeze({ accountId, apiKey, source });
}
