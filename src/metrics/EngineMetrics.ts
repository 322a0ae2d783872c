// metrics/EngineMetrics.ts: Operation counters and liquidity evaluation timings

import type { ErrorCode } from '../core/errors.js';

/**
 * Evaluation timing statistics
 */
interface EvaluationStats {
  samples: number;
  p50: number;
  p95: number;
  avg: number;
  max: number;
}

/**
 * EngineMetrics: count operations and rejections, time liquidity evaluations
 */
export class EngineMetrics {
  private evaluationTimings: number[] = [];
  private readonly operations = new Map<string, number>();
  private readonly rejections = new Map<ErrorCode, number>();
  private readonly maxSamples = 1000; // Keep last 1000 samples

  recordEvaluation(timeMs: number): void {
    this.evaluationTimings.push(timeMs);
    if (this.evaluationTimings.length > this.maxSamples) {
      this.evaluationTimings.shift();
    }
  }

  recordOperation(name: string): void {
    this.operations.set(name, (this.operations.get(name) ?? 0) + 1);
  }

  recordRejection(code: ErrorCode): void {
    this.rejections.set(code, (this.rejections.get(code) ?? 0) + 1);
  }

  getOperationCount(name: string): number {
    return this.operations.get(name) ?? 0;
  }

  getRejectionCount(code: ErrorCode): number {
    return this.rejections.get(code) ?? 0;
  }

  getEvaluationStats(): EvaluationStats | null {
    if (this.evaluationTimings.length === 0) {
      return null;
    }

    const sorted = [...this.evaluationTimings].sort((a, b) => a - b);
    const len = sorted.length;

    return {
      samples: len,
      p50: sorted[Math.floor(len * 0.5)],
      p95: sorted[Math.floor(len * 0.95)],
      avg: sorted.reduce((a, b) => a + b, 0) / len,
      max: sorted[len - 1],
    };
  }

  logStats(): void {
    const stats = this.getEvaluationStats();
    if (stats) {
      console.log('[metrics] Liquidity evaluation:');
      console.log(`  Samples: ${stats.samples}`);
      console.log(`  P50: ${stats.p50.toFixed(3)}ms`);
      console.log(`  P95: ${stats.p95.toFixed(3)}ms`);
      console.log(`  Max: ${stats.max.toFixed(3)}ms`);
    }

    console.log('[metrics] Operations:', Object.fromEntries(this.operations));
    console.log('[metrics] Rejections:', Object.fromEntries(this.rejections));
  }
}
