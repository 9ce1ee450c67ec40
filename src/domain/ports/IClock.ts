/**
 * Time source for retry backoff and discovery polling. Faked in tests.
 */
export interface IClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}
