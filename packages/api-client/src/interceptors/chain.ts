// ---------------------------------------------------------------------------
// InterceptorChain: Executes interceptors in registration order
// ---------------------------------------------------------------------------

import type {
  ApiInterceptor,
  OutboundRequest,
  InboundResponse,
  ErrorContext,
} from "./interface";

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class InterceptorChain {
  private readonly interceptors: ApiInterceptor[] = [];

  constructor(interceptors?: ApiInterceptor[]) {
    if (interceptors) {
      this.interceptors.push(...interceptors);
    }
  }

  /** Add an interceptor to the end of the chain. */
  add(interceptor: ApiInterceptor): void {
    this.interceptors.push(interceptor);
  }

  /** Remove an interceptor by name. */
  remove(name: string): boolean {
    const idx = this.interceptors.findIndex((i) => i.name === name);
    if (idx !== -1) {
      this.interceptors.splice(idx, 1);
      return true;
    }
    return false;
  }

  get length(): number {
    return this.interceptors.length;
  }

  /**
   * Run every `onOutbound` hook in order. A failing hook is reported through
   * `processError` and the request continues unchanged past it.
   */
  async processOutbound(request: OutboundRequest): Promise<OutboundRequest> {
    let current = request;

    for (const interceptor of this.interceptors) {
      if (!interceptor.onOutbound) continue;
      try {
        current = await interceptor.onOutbound(current);
      } catch (err) {
        await this.processError(asError(err), { phase: "outbound", request: current });
      }
    }

    return current;
  }

  async processInbound(response: InboundResponse): Promise<InboundResponse> {
    let current = response;

    for (const interceptor of this.interceptors) {
      if (!interceptor.onInbound) continue;
      try {
        current = await interceptor.onInbound(current);
      } catch (err) {
        await this.processError(asError(err), { phase: "inbound", response: current });
      }
    }

    return current;
  }

  /**
   * Run every `onError` hook. Each handler is settled independently so one
   * failing handler neither stops the others nor replaces the original error.
   */
  async processError(error: Error, context: ErrorContext): Promise<void> {
    const handlers = this.interceptors.filter((i) => i.onError !== undefined);
    await Promise.allSettled(handlers.map((i) => i.onError?.(error, context)));
  }
}
