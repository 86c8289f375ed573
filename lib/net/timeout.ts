/**
 * Shared timeout helper for promises. Rejects with an error whose `code` is
 * `ETIMEOUT`, the same code the DNS module uses for its own timeouts.
 */
export class TimeoutError extends Error {
  readonly code = 'ETIMEOUT';

  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function withTimeout<T>(p: Promise<T>, ms: number, label = 'operation'): Promise<T> {
  if (ms <= 0) return p;
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}
