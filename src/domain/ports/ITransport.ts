export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface TransportResponse {
  statusCode: number;
  bodyText: string;
}

/**
 * HTTP capability consumed by the directory adapters and the mutation executor.
 * Resolves with any status code; rejects with a TransportError on network-level failure.
 */
export interface ITransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}
