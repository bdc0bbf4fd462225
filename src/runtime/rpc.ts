export type StreamingMode = 'none' | 'server' | 'client' | 'bidi';

export interface Codec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

/**
 * Static description of one RPC method, emitted by the code generator.
 */
export interface MethodDescriptor<Req, Res, M extends StreamingMode = StreamingMode> {
  /** Fully-qualified service name. */
  readonly service: string;
  readonly name: string;
  /** `/<service>/<method>`. */
  readonly path: string;
  readonly streaming: M;
  readonly request: Codec<Req>;
  readonly response: Codec<Res>;
}

export function defineMethod<Req, Res, M extends StreamingMode>(
  service: string,
  name: string,
  streaming: M,
  request: Codec<Req>,
  response: Codec<Res>,
): MethodDescriptor<Req, Res, M> {
  return { service, name, path: `/${service}/${name}`, streaming, request, response };
}

export type RpcErrorCode =
  | 'cancelled'
  | 'unimplemented'
  | 'invalid-argument'
  | 'internal'
  | 'already-consumed';

export class RpcError extends Error {
  constructor(
    readonly code: RpcErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

export interface CallOptions {
  /** Aborting the signal cancels the call. */
  signal?: AbortSignal;
}

export interface CallContext {
  readonly path: string;
  /** Aborted when the caller cancels or stops consuming. */
  readonly signal: AbortSignal;
}

/**
 * Moves encoded messages between a client and a server.
 *
 * `open` starts one call. The returned iterable yields encoded responses; the call is over when
 * it completes, throws, or is closed early through its iterator's `return()`. Implementations
 * must release the underlying stream when `signal` aborts.
 */
export interface RpcTransport {
  open(
    path: string,
    requests: AsyncIterable<Uint8Array>,
    context: { signal: AbortSignal },
  ): AsyncIterable<Uint8Array>;
}

export type UnaryHandler<Req, Res> = (request: Req, context: CallContext) => Promise<Res>;
export type ServerStreamingHandler<Req, Res> = (
  request: Req,
  context: CallContext,
) => AsyncIterable<Res>;
export type ClientStreamingHandler<Req, Res> = (
  requests: AsyncIterable<Req>,
  context: CallContext,
) => Promise<Res>;
export type BidiStreamingHandler<Req, Res> = (
  requests: AsyncIterable<Req>,
  context: CallContext,
) => AsyncIterable<Res>;

/**
 * Registration side of a transport. Generated `register<Service>` functions target this.
 */
export interface RpcServer {
  handleUnary<Req, Res>(method: MethodDescriptor<Req, Res, 'none'>, handler: UnaryHandler<Req, Res>): void;
  handleServerStreaming<Req, Res>(
    method: MethodDescriptor<Req, Res, 'server'>,
    handler: ServerStreamingHandler<Req, Res>,
  ): void;
  handleClientStreaming<Req, Res>(
    method: MethodDescriptor<Req, Res, 'client'>,
    handler: ClientStreamingHandler<Req, Res>,
  ): void;
  handleBidiStreaming<Req, Res>(
    method: MethodDescriptor<Req, Res, 'bidi'>,
    handler: BidiStreamingHandler<Req, Res>,
  ): void;
}

async function* encodeAll<T>(values: AsyncIterable<T>, codec: Codec<T>): AsyncGenerator<Uint8Array> {
  for await (const v of values) yield codec.encode(v);
}

async function* decodeAll<T>(values: AsyncIterable<Uint8Array>, codec: Codec<T>): AsyncGenerator<T> {
  for await (const v of values) yield codec.decode(v);
}

async function* once<T>(value: T): AsyncGenerator<T> {
  yield value;
}

/**
 * Resolve with `undefined` as soon as `signal` aborts, otherwise with the promise's value.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
  if (signal.aborted) return Promise.resolve(undefined);
  return new Promise<T | undefined>((resolve, reject) => {
    const onAbort = (): void => resolve(undefined);
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

/**
 * Lazily consumed response stream of a server- or bidi-streaming call.
 *
 * Nothing is sent until iteration starts. The stream can be iterated once; `cancel()`, a `break`
 * out of `for await`, or a decode error aborts the call and closes the transport stream.
 */
export class ServerStream<T> implements AsyncIterable<T> {
  private readonly controller = new AbortController();
  private iterator: AsyncIterator<Uint8Array> | undefined;
  private consumed = false;
  private closed = false;
  private inFlight = false;
  private readonly detach: () => void;

  constructor(
    private readonly start: (signal: AbortSignal) => AsyncIterable<Uint8Array>,
    private readonly codec: Codec<T>,
    signal?: AbortSignal,
  ) {
    if (signal?.aborted) {
      this.controller.abort(signal.reason);
      this.detach = () => undefined;
    } else if (signal) {
      const onAbort = (): void => {
        void this.cancel(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.detach = () => signal.removeEventListener('abort', onAbort);
    } else {
      this.detach = () => undefined;
    }
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Abort the call and release the transport stream. Safe to call more than once.
   */
  async cancel(reason?: unknown): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason ?? new RpcError('cancelled', 'Call cancelled by the client'));
    }
    await this.close();
  }

  private async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.detach();
    const it = this.iterator;
    this.iterator = undefined;
    if (!it?.return) return;
    if (!this.inFlight) {
      await it.return();
      return;
    }
    // A step is still pending on the transport, which has seen the abort; the queued return()
    // runs once that step settles. Nobody is left to receive an error from it.
    it.return().then(
      () => undefined,
      () => undefined,
    );
  }

  private async next(): Promise<IteratorResult<T, undefined>> {
    const signal = this.controller.signal;
    if (this.closed || signal.aborted) {
      await this.close();
      return { done: true, value: undefined };
    }
    let step: IteratorResult<Uint8Array> | undefined;
    this.inFlight = true;
    try {
      // A transport may refuse the call synchronously from open().
      if (!this.iterator) this.iterator = this.start(signal)[Symbol.asyncIterator]();
      step = await untilAborted(this.iterator.next(), signal);
    } catch (err) {
      this.closed = true;
      this.iterator = undefined;
      this.detach();
      throw err;
    } finally {
      this.inFlight = signal.aborted && step === undefined;
    }
    if (step === undefined) {
      await this.close();
      return { done: true, value: undefined };
    }
    if (step.done) {
      this.closed = true;
      this.iterator = undefined;
      this.detach();
      return { done: true, value: undefined };
    }
    try {
      return { done: false, value: this.codec.decode(step.value) };
    } catch (err) {
      await this.cancel(err);
      throw err;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consumed) {
      throw new RpcError('already-consumed', 'A ServerStream can only be iterated once');
    }
    this.consumed = true;
    return {
      next: () => this.next(),
      return: async () => {
        await this.cancel();
        return { done: true, value: undefined };
      },
    };
  }
}

export async function unaryCall<Req, Res>(
  transport: RpcTransport,
  method: MethodDescriptor<Req, Res, 'none'>,
  request: Req,
  options: CallOptions = {},
): Promise<Res> {
  return singleResponse(transport, method, once(method.request.encode(request)), options);
}

export function serverStreamingCall<Req, Res>(
  transport: RpcTransport,
  method: MethodDescriptor<Req, Res, 'server'>,
  request: Req,
  options: CallOptions = {},
): ServerStream<Res> {
  return new ServerStream(
    (signal) => transport.open(method.path, once(method.request.encode(request)), { signal }),
    method.response,
    options.signal,
  );
}

export async function clientStreamingCall<Req, Res>(
  transport: RpcTransport,
  method: MethodDescriptor<Req, Res, 'client'>,
  requests: AsyncIterable<Req>,
  options: CallOptions = {},
): Promise<Res> {
  return singleResponse(transport, method, encodeAll(requests, method.request), options);
}

export function bidiStreamingCall<Req, Res>(
  transport: RpcTransport,
  method: MethodDescriptor<Req, Res, 'bidi'>,
  requests: AsyncIterable<Req>,
  options: CallOptions = {},
): ServerStream<Res> {
  return new ServerStream(
    (signal) => transport.open(method.path, encodeAll(requests, method.request), { signal }),
    method.response,
    options.signal,
  );
}

async function singleResponse<Req, Res>(
  transport: RpcTransport,
  method: MethodDescriptor<Req, Res>,
  requests: AsyncIterable<Uint8Array>,
  options: CallOptions,
): Promise<Res> {
  const stream = new ServerStream(
    (signal) => transport.open(method.path, requests, { signal }),
    method.response,
    options.signal,
  );
  for await (const response of stream) return response;
  if (options.signal?.aborted) {
    throw new RpcError('cancelled', `${method.path} was cancelled`);
  }
  throw new RpcError('internal', `${method.path} completed without a response`);
}

type RawHandler = (
  requests: AsyncIterable<Uint8Array>,
  context: CallContext,
) => AsyncIterable<Uint8Array>;

async function firstRequest<T>(requests: AsyncIterable<Uint8Array>, codec: Codec<T>, path: string): Promise<T> {
  for await (const bytes of requests) return codec.decode(bytes);
  throw new RpcError('invalid-argument', `${path} received no request`);
}

/**
 * In-process transport: client calls dispatch straight to registered handlers.
 */
export class LoopbackTransport implements RpcTransport, RpcServer {
  private readonly handlers = new Map<string, RawHandler>();
  private active = 0;

  /** Calls whose response stream is currently open. */
  get activeStreams(): number {
    return this.active;
  }

  open(
    path: string,
    requests: AsyncIterable<Uint8Array>,
    context: { signal: AbortSignal },
  ): AsyncIterable<Uint8Array> {
    const handler = this.handlers.get(path);
    if (!handler) throw new RpcError('unimplemented', `No handler registered for ${path}`);
    return this.track(handler(requests, { path, signal: context.signal }));
  }

  private async *track(responses: AsyncIterable<Uint8Array>): AsyncGenerator<Uint8Array> {
    this.active++;
    try {
      yield* responses;
    } finally {
      this.active--;
    }
  }

  private register(path: string, handler: RawHandler): void {
    if (this.handlers.has(path)) throw new Error(`Handler already registered for ${path}`);
    this.handlers.set(path, handler);
  }

  handleUnary<Req, Res>(method: MethodDescriptor<Req, Res, 'none'>, handler: UnaryHandler<Req, Res>): void {
    this.register(method.path, async function* (requests, context) {
      const request = await firstRequest(requests, method.request, method.path);
      yield method.response.encode(await handler(request, context));
    });
  }

  handleServerStreaming<Req, Res>(
    method: MethodDescriptor<Req, Res, 'server'>,
    handler: ServerStreamingHandler<Req, Res>,
  ): void {
    this.register(method.path, async function* (requests, context) {
      const request = await firstRequest(requests, method.request, method.path);
      yield* encodeAll(handler(request, context), method.response);
    });
  }

  handleClientStreaming<Req, Res>(
    method: MethodDescriptor<Req, Res, 'client'>,
    handler: ClientStreamingHandler<Req, Res>,
  ): void {
    this.register(method.path, async function* (requests, context) {
      yield method.response.encode(await handler(decodeAll(requests, method.request), context));
    });
  }

  handleBidiStreaming<Req, Res>(
    method: MethodDescriptor<Req, Res, 'bidi'>,
    handler: BidiStreamingHandler<Req, Res>,
  ): void {
    this.register(method.path, async function* (requests, context) {
      yield* encodeAll(handler(decodeAll(requests, method.request), context), method.response);
    });
  }
}

export function createLoopbackTransport(): LoopbackTransport {
  return new LoopbackTransport();
}
