import { isIP } from "node:net";
import { ConfigError } from "../errors";
import { PROTOCOL_VERSION } from "../protocol/messages/types";

/**
 * Reconnect backoff settings, delays in milliseconds.
 */
export interface ReconnectConfig {
	/** Delay before the first attempt (default: 2000) */
	initialDelay?: number;

	/** Growth factor per attempt, at least 1 (default: 1.5) */
	multiplier?: number;

	/** Upper bound on the delay (default: 10000) */
	maxDelay?: number;

	/** Attempts before giving up (default: 5) */
	maxAttempts?: number;

	/** How long one attempt may wait for REGISTERED (default: 10000) */
	attemptTimeout?: number;
}

/**
 * Configuration for the relay client. Times are in milliseconds unless noted.
 */
export interface RelayClientConfig {
	/** Relay host name or IP address */
	host: string;

	/** Reliable channel port (default: 7777) */
	tcpPort?: number;

	/** Datagram channel port (default: 7778) */
	udpPort?: number;

	/** Wrap the reliable channel in TLS (default: false) */
	tls?: boolean;

	/** Accept a self-signed relay certificate. Development only (default: false) */
	allowSelfSigned?: boolean;

	/** Fixed local UDP port, for NAT setups that need a stable mapping */
	udpLocalPort?: number;

	/** Encrypt datagram payloads (default: false) */
	udpEncryption?: boolean;

	/** Secret shared with the relay for datagram encryption */
	udpSharedSecret?: string;

	/** Socket connect timeout (default: 10000) */
	connectTimeout?: number;

	/** How long close() waits for the socket before destroying it (default: 1000) */
	closeTimeout?: number;

	/** HEARTBEAT period while connected (default: 5000) */
	heartbeatInterval?: number;

	/** Silence after which the connection counts as lost (default: 15000) */
	heartbeatTimeout?: number;

	/** PING period while connected (default: 2000) */
	pingInterval?: number;

	/** Round-trip samples averaged (default: 10) */
	latencyWindowSize?: number;

	reconnect?: ReconnectConfig;

	/** Start reconnect() by itself when a connected session is lost (default: true) */
	autoReconnect?: boolean;

	/** Minimum time between room list requests (default: 1000) */
	roomListThrottle?: number;

	/** Dispatch queue actions run per tick (default: 100) */
	maxDispatchPerTick?: number;

	/** Drift in world units beyond which remote players snap (default: 5) */
	desyncThreshold?: number;

	/** Blend speed toward the target, per second (default: 10) */
	blendRate?: number;

	/** Datagram send limit, 0 disables (default: 60) */
	maxDatagramsPerSecond?: number;

	/** Largest accepted frame in bytes (default: 65536) */
	maxMessageSize?: number;

	/** Protocol version sent with REGISTER (default: 1) */
	protocolVersion?: number;

	/** Enable debug logging */
	debug?: boolean;
}

export type ResolvedReconnectConfig = Required<ReconnectConfig>;

export type ResolvedConfig = Required<Omit<RelayClientConfig, "udpLocalPort" | "reconnect">> & {
	udpLocalPort: number | undefined;
	reconnect: ResolvedReconnectConfig;
};

const HOSTNAME = /^(?=.{1,253}$)[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?)*$/;

function isValidHost(host: string): boolean {
	return isIP(host) !== 0 || HOSTNAME.test(host);
}

function checkPort(field: string, value: number): void {
	if (!Number.isInteger(value) || value < 1 || value > 65535) {
		throw new ConfigError(field, `must be an integer in 1..65535, got ${value}`);
	}
}

function checkPositive(field: string, value: number): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigError(field, `must be a positive number, got ${value}`);
	}
}

function checkPositiveInteger(field: string, value: number): void {
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigError(field, `must be a positive integer, got ${value}`);
	}
}

/**
 * Fill defaults and validate.
 * @throws ConfigError on the first invalid field, before any socket exists
 */
export function resolveConfig(config: RelayClientConfig): ResolvedConfig {
	const resolved: ResolvedConfig = {
		host: config.host,
		tcpPort: config.tcpPort ?? 7777,
		udpPort: config.udpPort ?? 7778,
		tls: config.tls ?? false,
		allowSelfSigned: config.allowSelfSigned ?? false,
		udpLocalPort: config.udpLocalPort,
		udpEncryption: config.udpEncryption ?? false,
		udpSharedSecret: config.udpSharedSecret ?? "",
		connectTimeout: config.connectTimeout ?? 10000,
		closeTimeout: config.closeTimeout ?? 1000,
		heartbeatInterval: config.heartbeatInterval ?? 5000,
		heartbeatTimeout: config.heartbeatTimeout ?? 15000,
		pingInterval: config.pingInterval ?? 2000,
		latencyWindowSize: config.latencyWindowSize ?? 10,
		reconnect: {
			initialDelay: config.reconnect?.initialDelay ?? 2000,
			multiplier: config.reconnect?.multiplier ?? 1.5,
			maxDelay: config.reconnect?.maxDelay ?? 10000,
			maxAttempts: config.reconnect?.maxAttempts ?? 5,
			attemptTimeout: config.reconnect?.attemptTimeout ?? 10000,
		},
		autoReconnect: config.autoReconnect ?? true,
		roomListThrottle: config.roomListThrottle ?? 1000,
		maxDispatchPerTick: config.maxDispatchPerTick ?? 100,
		desyncThreshold: config.desyncThreshold ?? 5,
		blendRate: config.blendRate ?? 10,
		maxDatagramsPerSecond: config.maxDatagramsPerSecond ?? 60,
		maxMessageSize: config.maxMessageSize ?? 65536,
		protocolVersion: config.protocolVersion ?? PROTOCOL_VERSION,
		debug: config.debug ?? false,
	};

	validateEndpoint(resolved);

	checkPositive("connectTimeout", resolved.connectTimeout);
	checkPositive("closeTimeout", resolved.closeTimeout);
	checkPositive("heartbeatInterval", resolved.heartbeatInterval);
	checkPositive("heartbeatTimeout", resolved.heartbeatTimeout);
	checkPositive("pingInterval", resolved.pingInterval);
	if (resolved.heartbeatTimeout <= resolved.heartbeatInterval) {
		throw new ConfigError(
			"heartbeatTimeout",
			`must exceed heartbeatInterval (${resolved.heartbeatTimeout} <= ${resolved.heartbeatInterval})`
		);
	}
	checkPositiveInteger("latencyWindowSize", resolved.latencyWindowSize);

	checkPositive("reconnect.initialDelay", resolved.reconnect.initialDelay);
	checkPositive("reconnect.maxDelay", resolved.reconnect.maxDelay);
	checkPositive("reconnect.attemptTimeout", resolved.reconnect.attemptTimeout);
	checkPositiveInteger("reconnect.maxAttempts", resolved.reconnect.maxAttempts);
	if (!Number.isFinite(resolved.reconnect.multiplier) || resolved.reconnect.multiplier < 1) {
		throw new ConfigError("reconnect.multiplier", `must be at least 1, got ${resolved.reconnect.multiplier}`);
	}
	if (resolved.reconnect.maxDelay < resolved.reconnect.initialDelay) {
		throw new ConfigError("reconnect.maxDelay", "must not be below reconnect.initialDelay");
	}

	if (!Number.isFinite(resolved.roomListThrottle) || resolved.roomListThrottle < 0) {
		throw new ConfigError("roomListThrottle", `must be zero or more, got ${resolved.roomListThrottle}`);
	}
	checkPositiveInteger("maxDispatchPerTick", resolved.maxDispatchPerTick);
	checkPositive("desyncThreshold", resolved.desyncThreshold);
	checkPositive("blendRate", resolved.blendRate);
	if (!Number.isInteger(resolved.maxDatagramsPerSecond) || resolved.maxDatagramsPerSecond < 0) {
		throw new ConfigError(
			"maxDatagramsPerSecond",
			`must be a non-negative integer, got ${resolved.maxDatagramsPerSecond}`
		);
	}
	checkPositiveInteger("maxMessageSize", resolved.maxMessageSize);
	checkPositiveInteger("protocolVersion", resolved.protocolVersion);

	return resolved;
}

/**
 * The checks connect() repeats before opening anything: host, ports and TLS/encryption pairing.
 * @throws ConfigError
 */
export function validateEndpoint(config: ResolvedConfig): void {
	if (typeof config.host !== "string" || config.host.trim() === "") {
		throw new ConfigError("host", "must not be empty");
	}
	if (!isValidHost(config.host)) {
		throw new ConfigError("host", `"${config.host}" is not a valid host name or IP address`);
	}

	checkPort("tcpPort", config.tcpPort);
	checkPort("udpPort", config.udpPort);
	if (config.udpLocalPort !== undefined) {
		checkPort("udpLocalPort", config.udpLocalPort);
	}

	if (config.allowSelfSigned && !config.tls) {
		throw new ConfigError("allowSelfSigned", "requires tls");
	}
	if (config.udpEncryption && config.udpSharedSecret === "") {
		throw new ConfigError("udpSharedSecret", "is required when udpEncryption is on");
	}
}

function parsePort(name: string, value: string): number {
	const port = Number(value);
	if (value.trim() === "" || !Number.isInteger(port)) {
		throw new ConfigError(name, `"${value}" is not a number`);
	}
	return port;
}

function parseFlag(value: string): boolean {
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Read relay settings from environment variables.
 *
 * Recognised: RELAY_HOST, RELAY_TCP_PORT, RELAY_UDP_PORT, RELAY_TLS,
 * RELAY_ALLOW_SELF_SIGNED, RELAY_UDP_LOCAL_PORT, RELAY_UDP_SECRET (turns on
 * datagram encryption) and RELAY_DEBUG. Unset variables are left out so
 * {@link resolveConfig} applies its defaults.
 *
 * @example
 * ```ts
 * const config = resolveConfig({ host: "localhost", ...configFromEnv(process.env) });
 * ```
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<RelayClientConfig> {
	const config: Partial<RelayClientConfig> = {};

	if (env.RELAY_HOST !== undefined) config.host = env.RELAY_HOST;
	if (env.RELAY_TCP_PORT !== undefined) config.tcpPort = parsePort("RELAY_TCP_PORT", env.RELAY_TCP_PORT);
	if (env.RELAY_UDP_PORT !== undefined) config.udpPort = parsePort("RELAY_UDP_PORT", env.RELAY_UDP_PORT);
	if (env.RELAY_UDP_LOCAL_PORT !== undefined) {
		config.udpLocalPort = parsePort("RELAY_UDP_LOCAL_PORT", env.RELAY_UDP_LOCAL_PORT);
	}
	if (env.RELAY_TLS !== undefined) config.tls = parseFlag(env.RELAY_TLS);
	if (env.RELAY_ALLOW_SELF_SIGNED !== undefined) config.allowSelfSigned = parseFlag(env.RELAY_ALLOW_SELF_SIGNED);
	if (env.RELAY_UDP_SECRET !== undefined && env.RELAY_UDP_SECRET !== "") {
		config.udpSharedSecret = env.RELAY_UDP_SECRET;
		config.udpEncryption = true;
	}
	if (env.RELAY_DEBUG !== undefined) config.debug = parseFlag(env.RELAY_DEBUG);

	return config;
}
