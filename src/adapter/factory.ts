/**
 * Adapter factories — validate raw configuration and build an adapter.
 *
 * @example
 * ```ts
 * const adapter = unwrap(
 *   createPermissionedAdapter({ address, poolManager, owner, ...configFromEnv() }),
 * );
 * ```
 */

import type { ListenerErrorCallback } from "../lib/events/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { type AdapterConfig, parseAdapterConfig } from "../shared/config.js";
import type { AdapterError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import type { AdapterOptions } from "./adapter-base.js";
import { ImmutableMultiHookAdapter } from "./immutable-adapter.js";
import { PermissionedMultiHookAdapter } from "./permissioned-adapter.js";

export interface FactoryOptions {
	/** Defaults to a pino logger at the configured `logLevel`. */
	readonly logger?: Logger;
	readonly onListenerError?: ListenerErrorCallback;
}

function prepare(
	input: unknown,
	options: FactoryOptions,
): Result<{ config: AdapterConfig; options: AdapterOptions }, AdapterError> {
	const parsed = parseAdapterConfig(input);
	if (!parsed.ok) return parsed;
	const config = parsed.value;
	const logger = options.logger ?? createLogger({ level: config.logLevel });
	const adapterOptions: AdapterOptions =
		options.onListenerError === undefined
			? { logger }
			: { logger, onListenerError: options.onListenerError };
	return ok({ config, options: adapterOptions });
}

/** @param input - Raw config, validated against `adapterConfigSchema` */
export function createImmutableAdapter(
	input: unknown,
	options: FactoryOptions = {},
): Result<ImmutableMultiHookAdapter, AdapterError> {
	const prepared = prepare(input, options);
	if (!prepared.ok) return prepared;
	return ImmutableMultiHookAdapter.create(prepared.value.config, prepared.value.options);
}

/** @param input - Raw config, validated against `adapterConfigSchema` */
export function createPermissionedAdapter(
	input: unknown,
	options: FactoryOptions = {},
): Result<PermissionedMultiHookAdapter, AdapterError> {
	const prepared = prepare(input, options);
	if (!prepared.ok) return prepared;
	return PermissionedMultiHookAdapter.create(prepared.value.config, prepared.value.options);
}
