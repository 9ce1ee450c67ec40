import type { ITransport, TransportRequest, TransportResponse } from '../../domain/ports/ITransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { TransportError, errorMessage } from '../../domain/errors/SyncError.js';

/**
 * ITransport over the global fetch, one AbortSignal.timeout per request
 */
export class FetchTransport implements ITransport {
  constructor(private readonly logger: ILogger) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.logger.trace('HTTP request', { method: request.method, url: request.url });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(request.timeoutMs),
      });
      const bodyText = await response.text();

      this.logger.debug('HTTP response', {
        method: request.method,
        url: request.url,
        statusCode: response.status,
      });
      return { statusCode: response.status, bodyText };
    } catch (error) {
      throw new TransportError(
        `${request.method} ${request.url} failed: ${errorMessage(error)}`,
        request.url,
        { cause: error }
      );
    }
  }
}

/**
 * Waits a fixed delay before every request (`SHOULD_SLEEP`)
 */
export class PacedTransport implements ITransport {
  constructor(
    private readonly inner: ITransport,
    private readonly sleep: (ms: number) => Promise<void>,
    private readonly delayMs: number
  ) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.delayMs > 0) {
      await this.sleep(this.delayMs);
    }
    return this.inner.send(request);
  }
}
