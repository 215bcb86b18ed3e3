import type { PermissionDecision, TrustedTool } from '../../core/session/types.js';

/**
 * Model for presenting a tool permission prompt from `q chat`.
 * Used by the Renderer implementations.
 */
export interface PermissionPromptModel {
  /** Prompt text as printed by the child, trimmed. */
  prompt: string;
  /** Tools already trusted for this session (shown for context). */
  trusted: TrustedTool[];
  /** Answer chosen up front (`--on-permission`); skips the interactive choice. */
  preset?: PermissionDecision;
}

export type PermissionPolicy = 'deny' | 'approve' | 'trust';

export const PERMISSION_POLICIES: readonly PermissionPolicy[] = ['deny', 'approve', 'trust'];

const POLICY_DECISIONS: Record<PermissionPolicy, PermissionDecision> = {
  deny: 'deny',
  approve: 'approve-once',
  trust: 'approve-and-trust',
};

export const DECISION_LABELS: Record<PermissionDecision, string> = {
  'approve-once': 'Approve once',
  deny: 'Deny',
  'approve-and-trust': 'Approve and trust for this session',
};

export function isPermissionPolicy(value: string): value is PermissionPolicy {
  return PERMISSION_POLICIES.some((p) => p === value);
}

export function decisionForPolicy(policy: PermissionPolicy): PermissionDecision {
  return POLICY_DECISIONS[policy];
}
