/**
 * Fingrid Open Data API Client
 *
 * One authenticated GET per query, with transport and status outcomes
 * mapped onto the viewer's error taxonomy. `fetch` is injectable so the
 * client can be exercised without a network.
 */

import { z } from 'zod';
import {
  AuthenticationError,
  DataProcessingError,
  NetworkError,
  ValidationError,
  extractErrorMessage,
} from '../utils/errorUtils';

export const BASE_URL = 'https://api.fingrid.fi/v1/variable';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface GridApiClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Diagnostic sink, e.g. the app's tagged logger */
  log?: (message: string) => void;
}

const responseBodySchema = z.array(z.unknown());

/**
 * Build the events URL for a variable and time range
 */
export function buildEventsUrl(
  variableId: string,
  startTime: string,
  endTime: string,
  baseUrl: string = BASE_URL,
): string {
  const params = new URLSearchParams({ start_time: startTime, end_time: endTime });
  return `${baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(variableId)}/events/json?${params.toString()}`;
}

/**
 * Create the API key header
 */
export function createApiKeyHeaders(apiKey: string): Record<string, string> {
  return {
    'x-api-key': apiKey,
    Accept: 'application/json',
  };
}

/**
 * Check whether a fetch rejection came from the request timeout
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Read the body of an error response
 */
export async function parseErrorResponse(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error: unknown) {
    return `Unable to read error response (${extractErrorMessage(error)})`;
  }
}

/**
 * Truncate error message to max length
 */
export function truncateErrorMessage(message: string, maxLength: number = 200): string {
  return message.length > maxLength ? message.substring(0, maxLength) : message;
}

/**
 * Map a non-OK response onto the error taxonomy
 */
export function createStatusError(response: Response, variableId: string): Error {
  if (response.status === 401) {
    return new AuthenticationError('Invalid API key. Please check your FINGRID_API_KEY.');
  }
  if (response.status === 404) {
    return new ValidationError(`Variable ID ${variableId} not found.`);
  }
  const statusText = response.statusText ? ` ${response.statusText}` : '';
  return new NetworkError(`HTTP Error: ${response.status}${statusText}`);
}

export class GridApiClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log: (message: string) => void;

  constructor(options: GridApiClientOptions, private readonly fetchFn: typeof fetch = fetch) {
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new AuthenticationError(
        'FINGRID_API_KEY is missing. Set it as an environment variable.\n'
        + 'Example: export FINGRID_API_KEY=your_key_here',
      );
    }
    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.log ?? (() => undefined);
  }

  /**
   * Fetch the events of one variable between two timestamps
   * @param variableId - Fingrid variable id, e.g. "124"
   * @param startTime - ISO-8601 start, e.g. "2024-01-01T00:00:00Z"
   * @param endTime - ISO-8601 end
   * @returns Parsed JSON body, a list of records for `toTable`
   * @throws ValidationError for missing input or an unknown variable
   * @throws AuthenticationError when the API rejects the key
   * @throws NetworkError on timeout, connection failure or other HTTP errors
   * @throws DataProcessingError when the body is not a JSON list
   */
  async fetchData(variableId: string, startTime: string, endTime: string): Promise<unknown[]> {
    if (!variableId) {
      throw new ValidationError('Variable ID cannot be empty.');
    }
    if (!startTime || !endTime) {
      throw new ValidationError('Start and end times are required.');
    }

    const url = buildEventsUrl(variableId, startTime, endTime, this.baseUrl);
    this.log(`GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: createApiKeyHeaders(this.apiKey),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      if (isTimeoutError(error)) {
        throw new NetworkError('Request timed out. Please try again.', { cause: error });
      }
      throw new NetworkError(
        `Failed to connect to Fingrid API. Check your internet connection. (${extractErrorMessage(error)})`,
        { cause: error },
      );
    }

    if (!response.ok) {
      const text = truncateErrorMessage((await parseErrorResponse(response)).trim());
      this.log(`Request failed with status ${response.status}${text ? `: ${text}` : ''}`);
      throw createStatusError(response, variableId);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      if (isTimeoutError(error)) {
        throw new NetworkError('Request timed out. Please try again.', { cause: error });
      }
      throw new DataProcessingError(`JSON parse error: ${extractErrorMessage(error)}`, { cause: error });
    }

    const parsed = responseBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new DataProcessingError('Unexpected response from Fingrid API: expected a list of events');
    }
    this.log(`Received ${parsed.data.length} events for variable ${variableId}`);
    return parsed.data;
  }
}
