/**
 * GenerationStatsCollector
 *
 * Timing state for one streaming request: request start, first chunk, end.
 * Values are kept unrounded; rounding happens when metrics are reported.
 *
 * @example
 * ```typescript
 * const stats = new GenerationStatsCollector();
 * stats.start();
 * for await (const chunk of stream) {
 *   stats.markChunk();
 * }
 * stats.stop();
 * console.log(stats.getStats(tokensGenerated));
 * ```
 */

import { performance } from 'node:perf_hooks';
import { safeDivide } from '../utils/math-helpers.js';

/** Monotonic clock in milliseconds */
export type Clock = () => number;

export interface GenerationTiming {
  /** Seconds from request start to end of stream */
  totalLatencyS: number;
  /** Seconds from request start to first chunk; null when no chunk arrived */
  timeToFirstTokenS: number | null;
  tokensPerSecond: number;
}

export class GenerationStatsCollector {
  private startTime: number | null = null;
  private firstChunkTime: number | null = null;
  private endTime: number | null = null;

  constructor(private readonly clock: Clock = () => performance.now()) {}

  /**
   * Record the request start; call immediately before issuing the request.
   */
  public start(): void {
    this.startTime = this.clock();
    this.firstChunkTime = null;
    this.endTime = null;
  }

  /**
   * Record receipt of a chunk. Only the first call has an effect.
   */
  public markChunk(): void {
    if (this.firstChunkTime === null) {
      this.firstChunkTime = this.clock();
    }
  }

  /**
   * Record the end of the stream. Only the first call has an effect.
   */
  public stop(): void {
    if (this.endTime === null) {
      this.endTime = this.clock();
    }
  }

  /**
   * Derive timing metrics; tokens/second is 0 unless both the token count
   * and the latency are positive.
   */
  public getStats(tokensGenerated: number): GenerationTiming {
    if (this.startTime === null) {
      return { totalLatencyS: 0, timeToFirstTokenS: null, tokensPerSecond: 0 };
    }

    const endTime = this.endTime ?? this.clock();
    const totalLatencyS = (endTime - this.startTime) / 1000;
    const timeToFirstTokenS =
      this.firstChunkTime === null ? null : (this.firstChunkTime - this.startTime) / 1000;
    const tokensPerSecond = tokensGenerated > 0 ? safeDivide(tokensGenerated, totalLatencyS) : 0;

    return { totalLatencyS, timeToFirstTokenS, tokensPerSecond };
  }

  public get isStarted(): boolean {
    return this.startTime !== null;
  }

  public get hasChunks(): boolean {
    return this.firstChunkTime !== null;
  }
}
