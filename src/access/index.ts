export type { ApprovalChange } from "./types.js";
export { Ownable } from "./ownable.js";
export { ApprovedHookRegistry } from "./approved-hooks.js";
export { PoolOwnerRegistry } from "./pool-owners.js";
