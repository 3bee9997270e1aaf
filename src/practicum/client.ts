import { ApiError, MalformedResponseError } from '../errors.js';
import type { Cursor } from '../types.js';
import { getErrorMessage, isAbortError, truncate } from '../utils.js';

interface PracticumConfig {
  apiBase: string;
  token: string;
  requestTimeoutMs?: number;
}

export class PracticumClient {
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
  private static readonly BODY_EXCERPT_CHARS = 300;

  private readonly apiBase: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;

  constructor(config: PracticumConfig) {
    this.apiBase = config.apiBase.replace(/\/+$/, '');
    this.token = config.token;
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? PracticumClient.DEFAULT_REQUEST_TIMEOUT_MS);
  }

  /**
   * Single attempt, no retries: the scheduler's next tick is the retry.
   * Resolves with the parsed JSON body, unvalidated.
   */
  async getStatuses(fromDate: Cursor): Promise<unknown> {
    const params = new URLSearchParams({ from_date: String(fromDate) });
    const endpoint = `${this.apiBase}/homework_statuses/?${params.toString()}`;

    let response: Response;
    try {
      response = await this.fetchWithTimeout(endpoint, {
        method: 'GET',
        headers: { authorization: `OAuth ${this.token}` },
      });
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      throw new ApiError(`Practicum API request failed: ${getErrorMessage(error)} (from_date=${fromDate})`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ApiError(
        `Practicum API responded ${response.status}: ${truncate(body.trim(), PracticumClient.BODY_EXCERPT_CHARS)} (from_date=${fromDate})`,
        response.status,
      );
    }

    const body = await response.text();
    try {
      return JSON.parse(body) as unknown;
    } catch {
      throw new MalformedResponseError(
        `Practicum API returned non-JSON body: ${truncate(body.trim(), PracticumClient.BODY_EXCERPT_CHARS)}`,
      );
    }
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      return await fetch(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new ApiError(`Practicum API request timed out after ${this.requestTimeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
