import type { z } from "zod";
import type { Credentials } from "../credentials.js";
import { DecodeError, ValidationError } from "../error.js";
import {
	GET_MODES,
	type GetItemInput,
	type GetMode,
	type Item,
	type ItemInput,
	type PortalRef,
	type Schedule,
} from "../types.js";
import { utf8ByteLength } from "../utils.js";
import {
	GetItemRequest,
	LoginRequest,
	LoginResponse,
	ReceivedData,
	ReceivedError,
	SetItemRequest,
} from "./wire.js";

/**
 * `GetItemInput` after validation, with defaults applied.
 */
export interface ResolvedGetInput {
	readonly portals: ReadonlyArray<PortalRef>;
	readonly mode: GetMode;
	readonly cutoff?: number;
	readonly schedule: Schedule;
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ");
}

function checkSize(body: string, maxBytes: number, what: string): string {
	const size = utf8ByteLength(body);
	if (size > maxBytes) {
		throw new ValidationError({
			message: `${what} failed. Serialized request of ${size} bytes exceeds limit of ${maxBytes} bytes`,
		});
	}
	return body;
}

export function encodeLogin(credentials: Credentials): string {
	return JSON.stringify(
		LoginRequest.parse({
			accountid: credentials.accountId,
			apikey: credentials.apiKey,
		}),
	);
}

/**
 * Serialize a set-item batch.
 *
 * @throws {ValidationError} If the batch is empty, an item is malformed, a payload
 * exceeds `maxBytes`, or the serialized body exceeds `maxBytes`.
 */
export function encodeSetRequest(
	items: ReadonlyArray<ItemInput>,
	maxBytes: number,
): string {
	const parsed = SetItemRequest.safeParse({
		items: items.map((item) => ({
			portalid: item.portalId,
			payload: item.payload,
		})),
	});
	if (!parsed.success) {
		throw new ValidationError({
			message: `Set item failed. ${describeIssues(parsed.error)}`,
			cause: parsed.error,
		});
	}
	parsed.data.items.forEach((item, index) => {
		const size = utf8ByteLength(item.payload);
		if (size > maxBytes) {
			throw new ValidationError({
				message: `Set item failed. Payload of item ${index} is ${size} bytes, limit is ${maxBytes} bytes`,
			});
		}
	});
	return checkSize(JSON.stringify(parsed.data), maxBytes, "Set item");
}

/**
 * Validate a `getItem` input and apply defaults.
 *
 * @throws {ValidationError}
 */
export function resolveGetInput(input: GetItemInput): ResolvedGetInput {
	const mode = input.mode ?? "probe";
	if (!GET_MODES.includes(mode)) {
		throw new ValidationError({
			message: `Get item failed. Unknown mode "${String(mode)}"`,
		});
	}
	const { cutoff } = input;
	if (cutoff !== undefined && (!Number.isInteger(cutoff) || cutoff < 0)) {
		throw new ValidationError({
			message: `Get item failed. cutoff must be a non-negative integer number of milliseconds (got ${cutoff})`,
		});
	}
	const schedule = input.schedule ?? "LIFO";
	if (schedule !== "LIFO" && schedule !== "FIFO") {
		throw new ValidationError({
			message: `Get item failed. Unknown schedule "${String(schedule)}"`,
		});
	}
	return { portals: input.portals, mode, cutoff, schedule };
}

/**
 * Serialize one get round. Mode and cutoff are applied by the client, so every
 * round is a probe on the wire; `schedule` is only sent when not the default.
 *
 * @throws {ValidationError}
 */
export function encodeGetRequest(
	input: ResolvedGetInput,
	maxBytes: number,
): string {
	const parsed = GetItemRequest.safeParse({
		portals: input.portals.map((portal) => ({ portalid: portal.portalId })),
		mode: "probe",
		schedule: input.schedule === "LIFO" ? undefined : input.schedule,
	});
	if (!parsed.success) {
		throw new ValidationError({
			message: `Get item failed. ${describeIssues(parsed.error)}`,
			cause: parsed.error,
		});
	}
	return checkSize(JSON.stringify(parsed.data), maxBytes, "Get item");
}

function parseJson(text: string, what: string): unknown {
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new DecodeError({
			message: `${what} failed. Response is not valid JSON`,
			cause: error,
		});
	}
}

/**
 * Decode one get-item response document into items, in server order.
 * A document without `items` is an empty batch.
 *
 * @throws {DecodeError} If the document is empty, too large, not JSON, or does not
 * match the expected shape.
 */
export function decodeItems(text: string, maxBytes: number): Item[] {
	if (text.length === 0) {
		throw new DecodeError({ message: "Get item failed. Empty response" });
	}
	const size = utf8ByteLength(text);
	if (size > maxBytes) {
		throw new DecodeError({
			message: `Get item failed. Response of ${size} bytes exceeds limit of ${maxBytes} bytes`,
		});
	}
	const parsed = ReceivedData.safeParse(parseJson(text, "Get item"));
	if (!parsed.success) {
		throw new DecodeError({
			message: `Get item failed. Unexpected response: ${describeIssues(parsed.error)}`,
			cause: parsed.error,
		});
	}
	return (parsed.data.items ?? []).map((item) => ({
		portalId: item.portalid,
		payload: item.payload,
		serverTimestamp: item.servertimestamp,
	}));
}

/**
 * Decode a whole get-item response body. The body holds one JSON document per
 * line; blank lines are skipped and items are concatenated in order.
 *
 * @throws {DecodeError} If the body holds no document, or any document is invalid.
 */
export function decodeItemsBody(text: string, maxBytes: number): Item[] {
	const documents = text.split("\n").filter((line) => line.trim().length > 0);
	if (documents.length === 0) {
		throw new DecodeError({ message: "Get item failed. Empty response" });
	}
	return documents.flatMap((document) => decodeItems(document, maxBytes));
}

/**
 * Decode a login response into the server timestamp it carries.
 *
 * @throws {DecodeError}
 */
export function decodeLogin(text: string): number {
	const parsed = LoginResponse.safeParse(
		text.length === 0 ? {} : parseJson(text, "Login"),
	);
	if (!parsed.success) {
		throw new DecodeError({
			message: `Login failed. Unexpected response: ${describeIssues(parsed.error)}`,
			cause: parsed.error,
		});
	}
	return parsed.data.servertimestamp;
}

/**
 * Extract the service's error message and code from an error body.
 * Returns an empty object when the body is not a recognizable error document.
 */
export function decodeErrorBody(text: string): {
	message?: string;
	code?: number;
} {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch {
		return {};
	}
	const parsed = ReceivedError.safeParse(json);
	if (!parsed.success || !parsed.data.error) {
		return {};
	}
	return {
		message: parsed.data.error.errormessage ?? undefined,
		code: parsed.data.error.errorcode,
	};
}
