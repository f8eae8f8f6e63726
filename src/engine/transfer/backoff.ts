/**
 * Retry and pacing policies.
 *
 * The sender's pacing policy is the only congestion signal in the
 * protocol: it raises the inter-piece delay after the receiver has
 * reported loss `retryThreshold` times in a row. The receiver's retry
 * policy bounds how many times a single piece is requested.
 *
 * Both are pure and free of I/O.
 *
 * @module engine/transfer/backoff
 */

// =============================================================================
// Pacing (sender, per recipient)
// =============================================================================

/**
 * Pacing parameters
 */
export interface PacingOptions {
  minDelayMs: number;
  maxDelayMs: number;
  retryThreshold: number;
  delayMultiplier: number;
}

/**
 * Pacing state of one recipient
 */
export interface PacingState {
  delayMs: number;
  retryCount: number;
}

/**
 * Outcome of feeding a resume request to the policy
 */
export interface PacingDecision extends PacingState {
  /** True if the delay was raised */
  escalated: boolean;
}

/**
 * Multiplicative delay escalation driven by loss reports.
 */
export class PacingPolicy {
  constructor(private readonly options: PacingOptions) {}

  /**
   * True once the loss-report counter has reached the threshold.
   */
  shouldEscalate(retryCount: number): boolean {
    return retryCount >= this.options.retryThreshold;
  }

  /**
   * Raised delay, capped at maxDelayMs and never below minDelayMs.
   */
  nextDelay(currentDelayMs: number): number {
    const raised = currentDelayMs * this.options.delayMultiplier;
    return Math.max(this.options.minDelayMs, Math.min(raised, this.options.maxDelayMs));
  }

  /**
   * Applies one resume request to a recipient's pacing state.
   *
   * Loss increments the counter; reaching the threshold raises the delay
   * and resets the counter. A request without loss resets the counter and
   * leaves the delay alone.
   */
  onResumeRequest(state: PacingState, missingCount: number): PacingDecision {
    if (missingCount === 0) {
      return { delayMs: state.delayMs, retryCount: 0, escalated: false };
    }

    const retryCount = state.retryCount + 1;
    if (!this.shouldEscalate(retryCount)) {
      return { delayMs: state.delayMs, retryCount, escalated: false };
    }

    const delayMs = this.nextDelay(state.delayMs);
    return { delayMs, retryCount: 0, escalated: delayMs > state.delayMs };
  }
}

// =============================================================================
// Retries (receiver, per piece)
// =============================================================================

/**
 * Bounds the number of resume requests sent for one piece.
 */
export class RetryPolicy {
  constructor(private readonly maxRetries: number) {}

  /**
   * True once a piece has been requested maxRetries times.
   */
  isExhausted(requestCount: number): boolean {
    return requestCount >= this.maxRetries;
  }
}
