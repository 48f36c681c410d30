import type { CredentialProvider, TokenRefresher } from '@tasksync/protocol';

/** Fixed token, e.g. from configuration */
export class StaticTokenProvider implements CredentialProvider {
  private token: string;

  constructor(token: string) {
    this.token = token;
  }

  async getToken(): Promise<string> {
    return this.token;
  }

  invalidate(): void {
    // a static token has no cache to drop
  }
}

/**
 * Token provider that caches a refreshed token until shortly before it
 * expires. Concurrent callers during a refresh share one refresh call.
 *
 * Instances are passed explicitly to whatever needs a token; there is no
 * shared default instance.
 */
export class CachedTokenProvider implements CredentialProvider {
  private refresher: TokenRefresher;
  private refreshSkewMs: number;
  private now: () => number;
  private cached: { token: string; expiresAt: number } | null = null;
  private pending: Promise<string> | null = null;

  constructor(refresher: TokenRefresher, options?: { refreshSkewMs?: number; now?: () => number }) {
    this.refresher = refresher;
    this.refreshSkewMs = options?.refreshSkewMs ?? 60_000;
    this.now = options?.now ?? Date.now;
  }

  async getToken(signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    if (this.cached && this.now() < this.cached.expiresAt - this.refreshSkewMs) {
      return this.cached.token;
    }
    // The shared refresh belongs to no caller; each caller races its own signal.
    if (!this.pending) {
      this.pending = this.refresh().finally(() => {
        this.pending = null;
      });
    }
    return raceSignal(this.pending, signal);
  }

  invalidate(): void {
    this.cached = null;
  }

  private async refresh(): Promise<string> {
    const refreshed = await this.refresher.refresh();
    this.cached = {
      token: refreshed.token,
      expiresAt: this.now() + refreshed.expiresInSeconds * 1000,
    };
    return refreshed.token;
  }
}

function raceSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
