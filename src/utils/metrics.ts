/**
 * Simple in-memory metrics tracking
 */

import { CheckStatus } from '../types/checkResult';
import { CheckName } from '../types/validationResult';

type StatusCounts = Record<CheckStatus, number>;

interface MetricsCounts {
  totalVerifications: number;
  unparsableAddresses: number;
  checks: Record<CheckName, StatusCounts>;
}

function emptyStatusCounts(): StatusCounts {
  return { passed: 0, failed: 0, skipped: 0, errored: 0 };
}

function emptyCounts(): MetricsCounts {
  return {
    totalVerifications: 0,
    unparsableAddresses: 0,
    checks: {
      syntax: emptyStatusCounts(),
      registrability: emptyStatusCounts(),
      mx: emptyStatusCounts(),
      disposable: emptyStatusCounts(),
      avatar: emptyStatusCounts(),
      free: emptyStatusCounts(),
      roleBasedUsername: emptyStatusCounts(),
      smtp: emptyStatusCounts(),
    },
  };
}

class MetricsCollector {
  private metrics: MetricsCounts = emptyCounts();

  incrementVerifications(): void {
    this.metrics.totalVerifications++;
  }

  incrementUnparsable(): void {
    this.metrics.unparsableAddresses++;
  }

  recordCheck(name: CheckName, status: CheckStatus): void {
    this.metrics.checks[name][status]++;
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics(): MetricsCounts {
    return structuredClone(this.metrics);
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.metrics = emptyCounts();
  }
}

export const metrics = new MetricsCollector();
