/**
 * Streaming Metrics Collector
 *
 * Drives one streaming generation request and turns its timing into
 * GenerationMetrics: time to first token, total latency and tokens/second.
 */

import type { Logger } from 'pino';
import { GenerationStatsCollector, type Clock } from '../api/stats-collector.js';
import type { GenerateStreamSource } from '../api/ollama-client.js';
import { DURATION_DECIMALS, THROUGHPUT_DECIMALS } from '../config/defaults.js';
import type { GenerationMetrics } from '../types/benchmark.js';
import type { GenerateChunk } from '../types/schemas/ollama.js';
import { lazyLog } from '../utils/logger.js';
import { roundTo } from '../utils/math-helpers.js';

export interface StreamingMetricsCollectorOptions {
  clock?: Clock;
  logger?: Logger;
}

export class StreamingMetricsCollector {
  private readonly clock?: Clock;
  private readonly logger?: Logger;

  constructor(
    private readonly source: GenerateStreamSource,
    options: StreamingMetricsCollectorOptions = {}
  ) {
    this.clock = options.clock;
    this.logger = options.logger;
  }

  /**
   * Run one generation request and measure it
   *
   * An empty stream is not an error: TTFT is null and tokens/second is 0.
   *
   * @throws {ServerUnavailableError} if the request cannot be opened
   * @throws {ServerError} if the server reports an error
   */
  public async generate(modelId: string, prompt: string): Promise<GenerationMetrics> {
    const stats = new GenerationStatsCollector(this.clock);
    let responseText = '';
    let finalChunk: GenerateChunk | undefined;
    let chunkCount = 0;

    stats.start();
    for await (const chunk of this.source.generate(modelId, prompt)) {
      stats.markChunk();
      chunkCount++;
      responseText += chunk.response ?? '';
      finalChunk = chunk;

      lazyLog(this.logger, 'trace', () => ({ modelId, chunkCount, done: chunk.done }), 'Chunk received');

      if (chunk.done) {
        break;
      }
    }
    stats.stop();

    const tokensGenerated = finalChunk?.eval_count ?? 0;
    const timing = stats.getStats(tokensGenerated);

    this.logger?.debug(
      { modelId, chunkCount, tokensGenerated, totalLatencyS: timing.totalLatencyS },
      'Generation stream finished'
    );

    return Object.freeze({
      prompt,
      response_text: responseText,
      time_to_first_token_s:
        timing.timeToFirstTokenS === null ? null : roundTo(timing.timeToFirstTokenS, DURATION_DECIMALS),
      total_latency_s: roundTo(timing.totalLatencyS, DURATION_DECIMALS),
      tokens_generated: tokensGenerated,
      tokens_per_second: roundTo(timing.tokensPerSecond, THROUGHPUT_DECIMALS),
      raw_metadata: Object.freeze({ ...(finalChunk ?? {}) }),
    });
  }
}
