import { ConfigurationError } from "./error.js";

export const DEFAULT_LOGIN_URL = "https://api.xrtc.org/v1/auth/login";
export const DEFAULT_SET_URL = "https://api.xrtc.org/v1/item/set";
export const DEFAULT_GET_URL = "https://api.xrtc.org/v1/item/get";

export type RelayEndpointsInit = {
	loginUrl?: string;
	setUrl?: string;
	getUrl?: string;
};

/**
 * URLs of the login, set-item and get-item endpoints.
 */
export class RelayEndpoints {
	public readonly loginUrl: string;
	public readonly setUrl: string;
	public readonly getUrl: string;

	/**
	 * @throws {ConfigurationError} If a URL is not an absolute http(s) URL.
	 */
	constructor(init: RelayEndpointsInit = {}) {
		this.loginUrl = checkUrl("loginUrl", init.loginUrl ?? DEFAULT_LOGIN_URL);
		this.setUrl = checkUrl("setUrl", init.setUrl ?? DEFAULT_SET_URL);
		this.getUrl = checkUrl("getUrl", init.getUrl ?? DEFAULT_GET_URL);
	}

	/**
	 * Merge endpoint layers; earlier layers take precedence over later ones.
	 */
	static merge(...layers: Array<RelayEndpointsInit | undefined>): RelayEndpoints {
		const pick = (key: keyof RelayEndpointsInit) =>
			layers.find((layer) => layer?.[key])?.[key];
		return new RelayEndpoints({
			loginUrl: pick("loginUrl"),
			setUrl: pick("setUrl"),
			getUrl: pick("getUrl"),
		});
	}
}

function checkUrl(name: string, value: string): string {
	let url: URL;
	try {
		url = new URL(value);
	} catch (error) {
		throw new ConfigurationError({
			message: `${name} is not a valid URL: "${value}"`,
			cause: error,
		});
	}
	if (url.protocol !== "https:" && url.protocol !== "http:") {
		throw new ConfigurationError({
			message: `${name} must use http or https (got ${url.protocol})`,
		});
	}
	return value;
}
