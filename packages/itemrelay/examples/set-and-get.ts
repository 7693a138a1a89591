/**
 * Set one item and read it back with a probe.
 *
 * Credentials come from ACCOUNT_ID and API_KEY in the environment.
 */
import { ItemInput, ItemRelay } from "../src/index.js";

const relay = new ItemRelay();

await relay.withSession(
	async (session) => {
		await session.setItem([
			ItemInput.string({ portalId: "exampleportal", payload: "examplepayload" }),
		]);

		for await (const item of session.getItem({
			portals: [{ portalId: "exampleportal" }],
		})) {
			console.log(item);
		}
	},
	{ kind: "serial" },
);
