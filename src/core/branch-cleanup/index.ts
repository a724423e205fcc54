export { runBranchCleanup } from './clean-branches.ts';
export type { BranchCleanupDeps, BranchCleanupOptions, BranchCleanupResult } from './clean-branches.ts';
export { collectBranchStatuses, formatBranchTable } from './branch-status.ts';
export type { BranchStatus, BranchStatusRow } from './branch-status.ts';
export { readBranchInventory } from './inventory.ts';
export { resolvePullRequestLookup } from './pull-request-lookup.ts';
export type { PullRequestLookup } from './pull-request-lookup.ts';
export { protectionPolicyFromConfig } from './protection.ts';
