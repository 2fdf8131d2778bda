// Asset handles
//
// A handle stands in for a resource that may still be loading. Records hold
// handles, never the bytes, so a record is complete as soon as its handles
// exist.

export type AssetStatus = 'pending' | 'loaded' | 'failed';

type AssetState<T> =
  | { status: 'pending' }
  | { status: 'loaded'; value: T }
  | { status: 'failed'; error: Error };

type Waiter<T> = {
  resolve(value: T): void;
  reject(error: Error): void;
};

/**
 * Placeholder for an externally loadable resource.
 */
export class AssetHandle<T = unknown> {
  readonly path: string;
  private state: AssetState<T> = { status: 'pending' };
  private waiters: Waiter<T>[] = [];

  constructor(path: string) {
    this.path = path;
  }

  get status(): AssetStatus {
    return this.state.status;
  }

  /**
   * The loaded value, or undefined while pending or after a failure.
   */
  get value(): T | undefined {
    return this.state.status === 'loaded' ? this.state.value : undefined;
  }

  get error(): Error | undefined {
    return this.state.status === 'failed' ? this.state.error : undefined;
  }

  /**
   * Settle the handle with a loaded value. Later calls are ignored.
   */
  resolve(value: T): void {
    if (this.state.status !== 'pending') return;
    this.state = { status: 'loaded', value };
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(value);
    }
  }

  /**
   * Settle the handle with a failure. Later calls are ignored.
   */
  reject(error: Error): void {
    if (this.state.status !== 'pending') return;
    this.state = { status: 'failed', error };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  /**
   * Wait for the resource. Rejects if loading failed.
   */
  whenSettled(): Promise<T> {
    const state = this.state;
    switch (state.status) {
      case 'loaded':
        return Promise.resolve(state.value);
      case 'failed':
        return Promise.reject(state.error);
      case 'pending':
        return new Promise<T>((resolve, reject) => {
          this.waiters.push({ resolve, reject });
        });
    }
  }

  toJSON(): string {
    return this.path;
  }
}

/**
 * Something that turns an asset path into a handle without waiting for I/O.
 */
export interface AssetResolver {
  load(path: string): AssetHandle;
}
