import type { BaseLogger } from "pino";
import {
  blankValue,
  classifyBody,
  countBodyFields,
  decodeBody,
  encodeBody,
  isDecodable,
} from "./bodyCodec.js";
import type { BodyFields, DecodableKind } from "./bodyCodec.js";
import { compilePatterns } from "./comparator.js";
import type { ResponseComparator } from "./comparator.js";
import { ddmin } from "./ddmin.js";
import type { Verdict } from "./ddmin.js";
import type { HttpTransport } from "./transport.js";
import { isHealthy } from "./types.js";
import type {
  BodyKind,
  BodyPolicy,
  HeaderEntry,
  HeaderPolicy,
  MinimizationOutcome,
  MinimizationPolicy,
  Phase,
  RequestRecord,
  ResponseSnapshot,
} from "./types.js";

export type Exchanger = Pick<HttpTransport, "exchange">;

export interface MinimizerOptions {
  policy: MinimizationPolicy;
  maxTestsPerRequest: number;
  transport: Exchanger;
  comparator: ResponseComparator;
  logger: BaseLogger;
}

/** A concrete request together with the response it was seen to produce. */
interface RequestState {
  headers: HeaderEntry[];
  bodyText: string | undefined;
  response: ResponseSnapshot;
}

interface PhaseResult {
  state: RequestState;
  candidates: number;
  tests: number;
}

export interface HeaderSplit {
  fixed: HeaderEntry[];
  candidates: HeaderEntry[];
}

export const splitHeaders = (
  headers: readonly HeaderEntry[],
  policy: HeaderPolicy,
  allowPatterns: RegExp[]
): HeaderSplit => {
  const pinned = new Set([...policy.protected, ...policy.ignore].map((name) => name.toLowerCase()));
  const fixed: HeaderEntry[] = [];
  const candidates: HeaderEntry[] = [];
  for (const header of headers) {
    const name = header.name.toLowerCase();
    const allowed =
      allowPatterns.length === 0 || allowPatterns.some((pattern) => pattern.test(name));
    if (pinned.has(name) || !allowed) {
      fixed.push({ ...header });
    } else {
      candidates.push({ ...header });
    }
  }
  return { fixed, candidates };
};

export const buildHeaders = (
  split: HeaderSplit,
  kept: readonly number[]
): HeaderEntry[] => [...split.fixed, ...kept.map((position) => split.candidates[position])];

export const selectBodyCandidates = (fields: BodyFields, policy: BodyPolicy): string[] =>
  [...fields.keys()].filter(
    (key) =>
      !policy.protectedKeys.includes(key) &&
      (policy.onlyKeys.length === 0 || policy.onlyKeys.includes(key))
  );

/**
 * Rebuilds a body from its decoded fields. Non-candidate fields and kept
 * candidates carry their value; the other candidates are dropped or blanked.
 */
export const buildBody = (
  kind: DecodableKind,
  fields: BodyFields,
  candidates: readonly string[],
  kept: readonly string[],
  removedFields: BodyPolicy["removedFields"]
): string => {
  const candidateSet = new Set(candidates);
  const keptSet = new Set(kept);
  const out: BodyFields = new Map();
  for (const [key, value] of fields) {
    if (!candidateSet.has(key) || keptSet.has(key)) {
      out.set(key, value);
    } else if (removedFields === "blank") {
      out.set(key, blankValue(kind));
    }
  }
  return encodeBody(kind, out);
};

const range = (length: number): number[] => Array.from({ length }, (_, position) => position);

export class RequestMinimizer {
  private readonly policy: MinimizationPolicy;
  private readonly maxTests: number;
  private readonly transport: Exchanger;
  private readonly comparator: ResponseComparator;
  private readonly logger: BaseLogger;
  private readonly allowPatterns: RegExp[];

  constructor(options: MinimizerOptions) {
    this.policy = options.policy;
    this.maxTests = options.maxTestsPerRequest;
    this.transport = options.transport;
    this.comparator = options.comparator;
    this.logger = options.logger;
    this.allowPatterns = compilePatterns(options.policy.headers.allowPatterns, "i");
  }

  async minimize(
    record: RequestRecord
  ): Promise<{ baseline: ResponseSnapshot; outcome: MinimizationOutcome }> {
    this.logger.info(
      { index: record.index, method: record.method, url: record.url },
      "minimizing request"
    );
    const originalHeaders = record.headers.map((header) => ({ ...header }));
    const baseline = await this.transport.exchange(record, originalHeaders, record.bodyText);

    if (!isHealthy(baseline)) {
      this.logger.warn(
        { index: record.index, error: baseline.error },
        "baseline exchange failed, request left untouched"
      );
      return {
        baseline,
        outcome: {
          headers: originalHeaders,
          bodyText: record.bodyText,
          response: baseline,
          matched: false,
          headerCandidates: originalHeaders.length,
          bodyCandidates: 0,
          finalHeaderCount: originalHeaders.length,
          finalBodyFieldCount: 0,
        },
      };
    }

    const kind = classifyBody(record.mimeType, this.policy.body.mode);
    const counts: Record<Phase, number> = { headers: 0, body: 0 };
    const accepted: RequestState[] = [];
    let state: RequestState = {
      headers: originalHeaders,
      bodyText: record.bodyText,
      response: baseline,
    };
    let remaining = this.maxTests;

    for (const phase of this.policy.order) {
      const result = await this.runPhase(phase, record, baseline, state, kind, remaining);
      if (!result) {
        continue;
      }
      counts[phase] = result.candidates;
      remaining = Math.max(0, remaining - result.tests);
      state = result.state;
      accepted.push(result.state);
    }

    const confirmation = await this.transport.exchange(record, state.headers, state.bodyText);
    let final: RequestState = { ...state, response: confirmation };
    let matched = this.comparator.equivalent(baseline, confirmation);

    if (!matched) {
      this.logger.info({ index: record.index }, "cross-validation failed, trying fallbacks");
      const fallback = [...accepted]
        .reverse()
        .find((candidate) => this.comparator.equivalent(baseline, candidate.response));
      if (fallback) {
        final = fallback;
        matched = true;
      } else {
        this.logger.warn({ index: record.index }, "falling back to the baseline request");
        final = { headers: originalHeaders, bodyText: record.bodyText, response: baseline };
        matched = this.comparator.equivalent(baseline, baseline);
      }
    }

    if (matched && this.policy.body.tryBlankValues && isDecodable(kind)) {
      const refined = await this.refineBlankValues(record, baseline, kind, final);
      if (refined) {
        final = refined;
        matched = this.comparator.equivalent(baseline, refined.response);
      }
    }

    this.logger.info(
      {
        index: record.index,
        matched,
        headers: `${final.headers.length}/${originalHeaders.length}`,
        tests: this.maxTests - remaining,
      },
      "request minimized"
    );

    return {
      baseline,
      outcome: {
        headers: final.headers,
        bodyText: final.bodyText,
        response: final.response,
        matched,
        headerCandidates: counts.headers,
        bodyCandidates: counts.body,
        finalHeaderCount: final.headers.length,
        finalBodyFieldCount: countBodyFields(kind, final.bodyText),
      },
    };
  }

  private runPhase(
    phase: Phase,
    record: RequestRecord,
    baseline: ResponseSnapshot,
    state: RequestState,
    kind: BodyKind,
    budget: number
  ): Promise<PhaseResult | undefined> {
    if (phase === "headers") {
      return this.policy.headers.enabled
        ? this.reduceHeaders(record, baseline, state, budget)
        : Promise.resolve(undefined);
    }
    return this.policy.body.enabled && isDecodable(kind)
      ? this.reduceBody(record, baseline, state, kind, budget)
      : Promise.resolve(undefined);
  }

  private async probe(
    record: RequestRecord,
    baseline: ResponseSnapshot,
    headers: HeaderEntry[],
    bodyText: string | undefined
  ): Promise<Verdict<RequestState>> {
    const response = await this.transport.exchange(record, headers, bodyText);
    const ok = this.comparator.equivalent(baseline, response);
    this.logger.debug(
      {
        index: record.index,
        ok,
        status: response.statusCode,
        signals: this.comparator.explain(baseline, response),
      },
      "candidate tested"
    );
    return ok ? { ok, artifact: { headers, bodyText, response } } : { ok };
  }

  private async reduceHeaders(
    record: RequestRecord,
    baseline: ResponseSnapshot,
    state: RequestState,
    budget: number
  ): Promise<PhaseResult> {
    const split = splitHeaders(state.headers, this.policy.headers, this.allowPatterns);
    if (split.candidates.length === 0) {
      return { state, candidates: 0, tests: 0 };
    }

    const reduction = await ddmin(
      range(split.candidates.length),
      (kept) => this.probe(record, baseline, buildHeaders(split, kept), state.bodyText),
      budget
    );
    this.logger.debug(
      { index: record.index, kept: reduction.items.length, of: split.candidates.length },
      "header reduction done"
    );
    return {
      state: reduction.accepted ?? state,
      candidates: split.candidates.length,
      tests: reduction.tests,
    };
  }

  private async reduceBody(
    record: RequestRecord,
    baseline: ResponseSnapshot,
    state: RequestState,
    kind: DecodableKind,
    budget: number
  ): Promise<PhaseResult | undefined> {
    const fields = decodeBody(kind, state.bodyText);
    if (!fields || fields.size === 0) {
      this.logger.debug({ index: record.index, kind }, "body not decodable, skipping body phase");
      return undefined;
    }
    const candidates = selectBodyCandidates(fields, this.policy.body);
    if (candidates.length === 0) {
      return { state, candidates: 0, tests: 0 };
    }

    const reduction = await ddmin(
      candidates,
      (kept) =>
        this.probe(
          record,
          baseline,
          state.headers,
          buildBody(kind, fields, candidates, kept, this.policy.body.removedFields)
        ),
      budget
    );
    this.logger.debug(
      { index: record.index, kept: reduction.items.length, of: candidates.length },
      "body reduction done"
    );
    return {
      state: reduction.accepted ?? state,
      candidates: candidates.length,
      tests: reduction.tests,
    };
  }

  private async refineBlankValues(
    record: RequestRecord,
    baseline: ResponseSnapshot,
    kind: DecodableKind,
    current: RequestState
  ): Promise<RequestState | undefined> {
    if (!current.bodyText) {
      return undefined;
    }
    const fields = decodeBody(kind, current.bodyText);
    if (!fields) {
      return undefined;
    }
    const candidates = selectBodyCandidates(fields, this.policy.body);
    if (candidates.length === 0) {
      return undefined;
    }

    const blanked = (kept: readonly string[]): string =>
      buildBody(kind, fields, candidates, kept, "blank");
    const reduction = await ddmin(candidates, (kept) =>
      this.probe(record, baseline, current.headers, blanked(kept))
    );

    const bodyText = blanked(reduction.items);
    const response = await this.transport.exchange(record, current.headers, bodyText);
    if (!this.comparator.equivalent(baseline, response) || bodyText === current.bodyText) {
      return undefined;
    }
    this.logger.debug(
      { index: record.index, blanked: candidates.length - reduction.items.length },
      "blank-value refinement adopted"
    );
    return { headers: current.headers, bodyText, response };
  }
}
