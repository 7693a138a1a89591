import { z } from "zod";

/**
 * Wire-format schemas for the item-exchange API.
 * Field names match the service exactly.
 */

export const WireItem = z.object({
	portalid: z.string(),
	payload: z.string(),
	servertimestamp: z.number().int().nonnegative().default(0),
});

export const WirePortal = z.object({
	portalid: z.string().min(1),
});

export const LoginRequest = z.object({
	accountid: z.string().min(1),
	apikey: z.string().min(1),
});

export const LoginResponse = z.object({
	servertimestamp: z.number().int().nonnegative().default(0),
});

export const SetItemRequest = z.object({
	items: z
		.array(
			z.object({
				portalid: z.string().min(1, "portal id must not be empty"),
				payload: z.string(),
			}),
		)
		.min(1, "at least one item is required"),
});

export const GetItemRequest = z.object({
	portals: z.array(WirePortal).min(1, "at least one portal is required"),
	mode: z.literal("probe"),
	schedule: z.enum(["LIFO", "FIFO"]).optional(),
});

export const ReceivedData = z.object({
	items: z.array(WireItem).nullish(),
});

export const ReceivedError = z.object({
	error: z
		.object({
			errorgroup: z.number().optional(),
			errorcode: z.number().optional(),
			errormessage: z.string().nullish(),
		})
		.nullish(),
});
