/**
 * Single-slot request/response channel.
 *
 * A consumer asks for the next item with request(); a producer offers items
 * with sendIfRequested(), which only delivers when a request is outstanding.
 * Items offered while nobody is waiting are dropped, and each request is
 * satisfied exactly once.
 *
 * Registering a request and checking for one each happen in a single
 * synchronous section, so an item offered after request() returns is never
 * lost, and one offered before it is never delivered late.
 */

export class RequestCancelledError extends Error {
  constructor(reason = 'Request cancelled') {
    super(reason);
    this.name = 'RequestCancelledError';
  }
}

interface PendingRequest<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export class RequestChannel<T> {
  private pending: PendingRequest<T> | null = null;

  /** True while a request is waiting for a response. */
  isRequestPending(): boolean {
    return this.pending !== null;
  }

  /**
   * Wait for the next item a producer offers.
   * Only one request may be outstanding at a time.
   */
  request(): Promise<T> {
    if (this.pending) {
      throw new Error('A request is already outstanding on this channel');
    }
    return new Promise<T>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  /** Deliver `value` to the outstanding request, if any. Returns true if delivered. */
  sendIfRequested(value: T): boolean {
    const pending = this.pending;
    if (!pending) return false;
    this.pending = null;
    pending.resolve(value);
    return true;
  }

  /** Reject the outstanding request, if any. Returns true if one was cancelled. */
  cancel(reason?: string): boolean {
    const pending = this.pending;
    if (!pending) return false;
    this.pending = null;
    pending.reject(new RequestCancelledError(reason));
    return true;
  }
}
