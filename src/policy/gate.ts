import type { Logger } from "../config/logger";
import { ALLOWED_RULES, BLOCKED_PATTERNS, EXEMPT_PATHS, EXEMPT_PREFIXES, type PolicyRule } from "./rules";

export type PolicyVerdict = "ALLOW" | "BLOCK";

export type PolicyDecision = {
  verdict: PolicyVerdict;
  reasonCode: "EXEMPT" | "ALLOWLISTED" | "BLOCKED" | "NOT_IN_ALLOWLIST";
};

export type PolicyTables = {
  blocked: readonly string[];
  allowed: readonly PolicyRule[];
  exemptPaths: readonly string[];
  exemptPrefixes: readonly string[];
};

export const defaultPolicyTables: PolicyTables = {
  blocked: BLOCKED_PATTERNS,
  allowed: ALLOWED_RULES,
  exemptPaths: EXEMPT_PATHS,
  exemptPrefixes: EXEMPT_PREFIXES,
};

function isPlaceholder(segment: string): boolean {
  return segment.length > 2 && segment.startsWith("{") && segment.endsWith("}");
}

/** Strips exactly one trailing slash; "/" stays "/". */
export function normalizePath(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Matches a concrete path against a `{name}` pattern segment by segment.
 * Returns the captured placeholders, or null when the shapes differ.
 */
export function matchPathPattern(
  path: string,
  pattern: string,
  options: { caseSensitive?: boolean } = {}
): Record<string, string> | null {
  const pathParts = path.split("/");
  const patternParts = pattern.split("/");
  if (pathParts.length !== patternParts.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i += 1) {
    const expected = patternParts[i];
    const actual = pathParts[i];
    if (isPlaceholder(expected)) {
      if (actual.length === 0) return null;
      params[expected.slice(1, -1)] = actual;
      continue;
    }
    const same = options.caseSensitive ? expected === actual : expected.toLowerCase() === actual.toLowerCase();
    if (!same) return null;
  }
  return params;
}

export function matchesPathPattern(path: string, pattern: string): boolean {
  return matchPathPattern(path, pattern) !== null;
}

/**
 * Fail-closed capability check for an inbound (method, path). Blocked patterns
 * win over the allow table; anything not allowlisted is blocked.
 */
export class PolicyGate {
  constructor(
    private readonly logger: Logger,
    private readonly tables: PolicyTables = defaultPolicyTables
  ) {}

  evaluate(method: string, rawPath: string): PolicyDecision {
    const path = normalizePath(rawPath);
    const lowered = path.toLowerCase();

    if (this.isExempt(lowered)) {
      return { verdict: "ALLOW", reasonCode: "EXEMPT" };
    }

    if (this.tables.blocked.some((pattern) => matchesPathPattern(path, pattern))) {
      this.logger.warn("policy_blocked", { method, path });
      return { verdict: "BLOCK", reasonCode: "BLOCKED" };
    }

    const upperMethod = method.toUpperCase();
    const allowed = this.tables.allowed.some(
      (rule) => rule.method === upperMethod && matchesPathPattern(path, rule.pattern)
    );
    if (allowed) {
      return { verdict: "ALLOW", reasonCode: "ALLOWLISTED" };
    }

    this.logger.warn("policy_not_in_allowlist", { method, path });
    return { verdict: "BLOCK", reasonCode: "NOT_IN_ALLOWLIST" };
  }

  decide(method: string, path: string): PolicyVerdict {
    return this.evaluate(method, path).verdict;
  }

  listAllowed(): readonly PolicyRule[] {
    return this.tables.allowed;
  }

  private isExempt(loweredPath: string): boolean {
    if (this.tables.exemptPaths.includes(loweredPath)) return true;
    return this.tables.exemptPrefixes.some(
      (prefix) => loweredPath === prefix || loweredPath.startsWith(`${prefix}/`)
    );
  }
}
