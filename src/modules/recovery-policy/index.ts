/**
 * Recovery policy module: barrel exports
 */

export type { RecoveryPolicy, RecoveryDecision } from './recovery-policy.js'
export { RecoveryPolicyImpl, createRecoveryPolicy } from './recovery-policy-impl.js'
export type { RecoveryPolicyOptions } from './recovery-policy-impl.js'
export { FailureWindow } from './failure-window.js'
