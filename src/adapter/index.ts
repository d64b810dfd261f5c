export type {
	AdapterEvents,
	GovernanceFeeUpdatedEvent,
	HookApprovalChangedEvent,
	HookListChange,
	HooksRegisteredEvent,
	PoolFeeConfigurationUpdatedEvent,
	PoolOwnerClaimedEvent,
	RoleChangedEvent,
} from "./events.js";
export { MultiHookAdapterBase, type AdapterOptions } from "./adapter-base.js";
export { ImmutableMultiHookAdapter } from "./immutable-adapter.js";
export { PermissionedMultiHookAdapter } from "./permissioned-adapter.js";
export { createImmutableAdapter, createPermissionedAdapter, type FactoryOptions } from "./factory.js";
