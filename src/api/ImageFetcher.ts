import type { ImageSource, RasterImage } from '../types/types.js';
import { getRequestTimeoutMs } from '../config.js';
import { decodeImage } from '../image/codec.js';
import { FetchError } from './errors.js';

function describeStatus(status: number): string {
  if (status === 404) {
    return 'The expression chart was not found.';
  }
  if (status === 429) {
    return 'Too many requests to RiceXPro. Please wait a moment and try again.';
  }
  if (status >= 500) {
    return 'RiceXPro is experiencing issues. Please try again later.';
  }
  return `RiceXPro rejected the chart request (HTTP ${status}).`;
}

function toFetchError(error: unknown, url: string, networkMessage: string): unknown {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new FetchError('The expression chart is taking too long to load. Please try again.', url);
  }
  if (error instanceof TypeError) {
    return new FetchError(networkMessage, url);
  }
  return error;
}

/**
 * Downloads chart images and decodes them. No retries: every failure
 * surfaces as a FetchError or DecodeError.
 */
export class ImageFetcher implements ImageSource {
  private readonly requestTimeoutMs: number;

  constructor(requestTimeoutMs: number = getRequestTimeoutMs()) {
    this.requestTimeoutMs = requestTimeoutMs;
  }

  public async fetch(url: string): Promise<RasterImage> {
    const bytes = await this.fetchBytes(url);
    return await decodeImage(bytes, url);
  }

  private async fetchBytes(url: string): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    }
    catch (error) {
      // Network errors (DNS, connection refused, etc.)
      throw toFetchError(error, url, 'RiceXPro is unreachable. Please check your internet connection and try again.');
    }

    if (!response.ok) {
      throw new FetchError(describeStatus(response.status), url, response.status);
    }

    // The timeout signal still covers the body download.
    try {
      return new Uint8Array(await response.arrayBuffer());
    }
    catch (error) {
      throw toFetchError(error, url, 'The connection to RiceXPro dropped while loading the expression chart. Please try again.');
    }
  }
}
