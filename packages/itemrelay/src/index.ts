// =============================================================================
// Core Client
// =============================================================================

/** Top-level entrypoint for the SDK. */
export { ItemRelay, type SessionOptions } from "./relay.js";
export { RelayEndpoints, type RelayEndpointsInit } from "./endpoints.js";
export { RelayEnvironment } from "./common.js";

// =============================================================================
// Sessions
// =============================================================================

export { ConcurrentSession } from "./lib/session/concurrent/index.js";
export { SerialSession } from "./lib/session/serial/index.js";
export type {
	ItemSession,
	SessionConfig,
	SessionKind,
} from "./lib/session/types.js";

// =============================================================================
// Credentials
// =============================================================================

export {
	type Credentials,
	type CredentialsInit,
	type CredentialsSource,
	resolveCredentials,
} from "./credentials.js";

// =============================================================================
// SDK Types
// =============================================================================

export type {
	GetItemInput,
	GetMode,
	Item,
	PortalRef,
	Schedule,
} from "./types.js";
/**
 * Use `ItemInput.string()` or `ItemInput.bytes()` to build items to set.
 */
export { GET_MODES, ItemInput, MAX_SERIALIZED_BYTES } from "./types.js";

// =============================================================================
// Client Configuration
// =============================================================================

export type {
	FetchLike,
	ItemRelayOptions,
	PollConfig,
	RequestOptions,
} from "./common.js";

// =============================================================================
// Error Types
// =============================================================================

export {
	ConfigurationError,
	DecodeError,
	type ErrorOrigin,
	MissingCredentialsError,
	RelayError,
	TransportError,
	UseAfterCloseError,
	ValidationError,
} from "./error.js";

// =============================================================================
// Utilities
// =============================================================================

export { decodePayload } from "./lib/base64.js";
export { isFresh, pollItems, type PollRound } from "./lib/poller.js";
export { utf8ByteLength } from "./utils.js";
