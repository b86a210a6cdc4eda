/**
 * Purpose: Route each expression through the domain evaluators in priority order.
 * Intent: The first evaluator that claims a line wins; failures fall through and the most specific one is reported.
 */

import type { EngineConfig } from "../config.js";
import { DomainError } from "../errors.js";
import { createServiceLogger } from "../logger.js";
import type { DomainEvaluator, DomainResult, LineContext } from "../types.js";
import { createArithmeticEvaluator } from "./domain_arith.js";
import { createBaseEvaluator } from "./domain_base.js";
import { createDateTimeEvaluator } from "./domain_datetime.js";
import { createNetworkEvaluator } from "./domain_network.js";
import { createPercentageEvaluator } from "./domain_percentage.js";

export type DispatchOutcome =
  | { ok: true; evaluator: string; result: DomainResult }
  | { ok: false; error: unknown };

const logger = createServiceLogger("dispatch");

export function createDefaultEvaluators(config: Pick<EngineConfig, "now" | "timeZone">): DomainEvaluator[] {
  return [
    createNetworkEvaluator(),
    createDateTimeEvaluator(config),
    createPercentageEvaluator(),
    createBaseEvaluator(),
    createArithmeticEvaluator(),
  ];
}

export class Dispatcher {
  constructor(private readonly evaluators: readonly DomainEvaluator[]) {}

  get names(): string[] {
    return this.evaluators.map((e) => e.name);
  }

  dispatch(expr: string, ctx: LineContext): DispatchOutcome {
    let domainError: DomainError | null = null;
    let lastError: unknown = null;

    for (const evaluator of this.evaluators) {
      if (!evaluator.matches(expr)) continue;
      try {
        const result = evaluator.evaluate(expr, ctx);
        if (result) return { ok: true, evaluator: evaluator.name, result };
        logger.debug("evaluator declined", { line: ctx.lineNumber, evaluator: evaluator.name });
      } catch (err) {
        logger.debug("evaluator failed", {
          line: ctx.lineNumber,
          evaluator: evaluator.name,
          error: err instanceof Error ? err.message : String(err),
        });
        if (err instanceof DomainError) domainError ??= err;
        lastError = err;
      }
    }

    if (domainError) return { ok: false, error: domainError };
    return {
      ok: false,
      error: lastError ?? new DomainError("dispatch", "LP_DOMAIN_UNRECOGNIZED", `unrecognized expression: ${expr}`),
    };
  }
}
