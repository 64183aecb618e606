/**
 * Role Classifier
 *
 * Pure predicates over the decoded roles of an event link. Roles are not
 * mutually exclusive: a link may satisfy several predicates.
 */

import type { AgentRole, ObjectRole } from "@sip-provenance/types";

// ─── Agent side ──────────────────────────────────────────────────────────

export function isImplementer(roles: readonly AgentRole[]): boolean {
  return roles.includes("implementer");
}

export function isExecuter(roles: readonly AgentRole[]): boolean {
  return roles.includes("executer");
}

export function isInstrument(roles: readonly AgentRole[]): boolean {
  return roles.includes("instrument");
}

/** A general "associated with" participant. */
export function hasNoRole(roles: readonly AgentRole[]): boolean {
  return roles.length === 0;
}

// ─── Object side ─────────────────────────────────────────────────────────

export function isSource(roles: readonly ObjectRole[]): boolean {
  return roles.includes("source");
}

export function isResult(roles: readonly ObjectRole[]): boolean {
  return roles.includes("outcome");
}
