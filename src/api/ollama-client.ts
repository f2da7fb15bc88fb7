/**
 * Ollama Client
 *
 * Minimal streaming client for `POST /api/generate`. The server answers with
 * newline-delimited JSON, one chunk per line; the last chunk has `done: true`
 * and carries token counts and server-side durations.
 */

import type { Logger } from 'pino';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/defaults.js';
import { GenerateChunkSchema, type GenerateChunk } from '../types/schemas/ollama.js';
import { ServerError, ServerUnavailableError, toError } from '../utils/errors.js';

/**
 * Inference request boundary: anything that streams generation chunks
 */
export interface GenerateStreamSource {
  generate(model: string, prompt: string): AsyncIterable<GenerateChunk>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OllamaClientOptions {
  /** Server base URL, e.g. http://localhost:11434 */
  host: string;
  /** Bound on a whole request, stream included */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Parse one NDJSON line into a validated chunk
 *
 * @throws {ServerError} on malformed JSON, an unexpected shape, or an `error` field
 */
export function parseGenerateChunk(line: string): GenerateChunk {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new ServerError(`Malformed stream chunk: ${line.slice(0, 200)}`, undefined, toError(error));
  }

  const parsed = GenerateChunkSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ServerError(`Unexpected stream chunk shape: ${parsed.error.message}`);
  }
  if (parsed.data.error !== undefined) {
    throw new ServerError(`Server reported an error mid-stream: ${parsed.data.error}`);
  }
  return parsed.data;
}

export class OllamaClient implements GenerateStreamSource {
  private readonly host: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger?: Logger;

  constructor(options: OllamaClientOptions) {
    this.host = options.host.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  /**
   * POST /api/generate (streaming)
   *
   * @throws {ServerUnavailableError} if the request cannot be opened
   * @throws {ServerError} on an error status or a failure while streaming
   */
  public async *generate(model: string, prompt: string): AsyncGenerator<GenerateChunk> {
    const url = `${this.host}/api/generate`;
    this.logger?.debug({ url, model }, 'Opening generation stream');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model, prompt, stream: true }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ServerUnavailableError(
        `Cannot reach inference server at ${this.host}: ${toError(error).message}`,
        this.host,
        toError(error)
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new ServerError(`HTTP ${response.status}: ${body}`, response.status);
    }

    if (!response.body) {
      throw new ServerError('Response body is null', response.status);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let finished = false;

    try {
      while (true) {
        const result = await reader.read().catch((error: unknown) => {
          throw new ServerError(
            `Generation stream interrupted: ${toError(error).message}`,
            response.status,
            toError(error)
          );
        });

        if (result.done) {
          finished = true;
          buffer += decoder.decode();
          break;
        }

        buffer += decoder.decode(result.value, { stream: true });

        // Process complete lines
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (line.trim() !== '') {
            yield parseGenerateChunk(line);
          }
        }
      }

      if (buffer.trim() !== '') {
        yield parseGenerateChunk(buffer);
      }
    } finally {
      if (!finished) {
        // Consumer stopped early (done chunk) or a chunk failed to parse
        await reader.cancel().catch((error: unknown) => {
          this.logger?.debug({ err: error }, 'Stream cancel failed');
        });
      }
    }
  }
}
