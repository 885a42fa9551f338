import { ConfigError } from "./errors.js";
import { isHealthy, responseSize } from "./types.js";
import type { ComparatorPolicy, ResponseSnapshot } from "./types.js";

export type SignalName = "statusCode" | "length" | "needAll" | "needAny" | "patterns";

export interface SignalResult {
  signal: SignalName;
  passed: boolean;
}

export const compilePatterns = (patterns: string[], flags: string): RegExp[] =>
  patterns.map((pattern) => {
    try {
      return new RegExp(pattern, flags);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid pattern ${JSON.stringify(pattern)}: ${reason}`);
    }
  });

/**
 * Decides whether a candidate response is "the same" as the baseline.
 * Unhealthy snapshots never match. With no signal enabled, any pair of
 * healthy snapshots matches.
 */
export class ResponseComparator {
  private readonly policy: ComparatorPolicy;
  private readonly patterns: RegExp[];

  constructor(policy: ComparatorPolicy) {
    this.policy = policy;
    this.patterns = compilePatterns(policy.patterns, "m");
  }

  equivalent(baseline: ResponseSnapshot, candidate: ResponseSnapshot): boolean {
    if (!isHealthy(baseline) || !isHealthy(candidate)) {
      return false;
    }
    const results = this.explain(baseline, candidate).map((result) => result.passed);
    if (results.length === 0) {
      return true;
    }
    return this.policy.logic === "OR"
      ? results.some(Boolean)
      : results.every(Boolean);
  }

  /** Verdict of every enabled signal, in evaluation order. */
  explain(baseline: ResponseSnapshot, candidate: ResponseSnapshot): SignalResult[] {
    const results: SignalResult[] = [];
    if (this.policy.statusCode) {
      results.push({
        signal: "statusCode",
        passed: baseline.statusCode === candidate.statusCode,
      });
    }
    if (this.policy.lengthCheck) {
      results.push({ signal: "length", passed: this.lengthWithin(baseline, candidate) });
    }
    if (this.policy.needAll.length > 0) {
      const body = candidate.body;
      results.push({
        signal: "needAll",
        passed: body !== undefined && this.policy.needAll.every((token) => body.includes(token)),
      });
    }
    if (this.policy.needAny.length > 0) {
      const body = candidate.body;
      results.push({
        signal: "needAny",
        passed: body !== undefined && this.policy.needAny.some((token) => body.includes(token)),
      });
    }
    if (this.patterns.length > 0) {
      const body = candidate.body;
      results.push({
        signal: "patterns",
        passed: body !== undefined && this.patterns.every((pattern) => pattern.test(body)),
      });
    }
    return results;
  }

  private lengthWithin(baseline: ResponseSnapshot, candidate: ResponseSnapshot): boolean {
    const base = responseSize(baseline);
    const cand = responseSize(candidate);
    if (base === 0) {
      return cand === 0;
    }
    return Math.abs(base - cand) / base <= this.policy.lengthTolerance;
  }
}
