import { errorMessage } from "../errors.js";
import { MarginEstimator } from "../execution/broker.js";
import { GateResult, MarginEstimate, Side } from "../types.js";
import { withTimeout } from "../utils/timing.js";

export interface MarginCheck extends GateResult {
  estimate?: MarginEstimate;
  failedOpen?: boolean;
}

/**
 * Pre-trade margin check. Estimator outages fail open: a missing estimate never
 * blocks an order.
 */
export class MarginGate {
  constructor(
    private estimator: MarginEstimator | null,
    private cfg: { enabled: boolean; timeoutMs: number }
  ) {}

  get enabled(): boolean {
    return this.cfg.enabled && this.estimator !== null;
  }

  async check(instrument: string, side: Side, qty: number, referencePrice: number): Promise<MarginCheck> {
    if (!this.cfg.enabled || !this.estimator) {
      return { ok: true };
    }
    let estimate: MarginEstimate;
    try {
      estimate = await withTimeout(
        this.estimator.estimate({ side, instrument, qty, price: referencePrice }),
        this.cfg.timeoutMs,
        `margin ${instrument}`
      );
    } catch (err) {
      console.warn("MARGIN_CHECK_FAIL_OPEN", instrument, side, qty, errorMessage(err));
      return { ok: true, failedOpen: true, reason: errorMessage(err) };
    }

    if (estimate.availableBalance < estimate.totalMargin || estimate.insufficientBalance > 0) {
      return {
        ok: false,
        estimate,
        reason: `Insufficient margin: need ${estimate.totalMargin}, available ${estimate.availableBalance}`
      };
    }
    return { ok: true, estimate };
  }
}
