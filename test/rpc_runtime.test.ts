import { describe, expect, it, vi } from 'vitest';

import type { CallContext, Codec, RpcTransport } from '../src/runtime/index.js';
import {
  bidiStreamingCall,
  clientStreamingCall,
  createLoopbackTransport,
  defineMethod,
  RpcError,
  serverStreamingCall,
  unaryCall,
} from '../src/runtime/index.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const text: Codec<string> = {
  encode: (value) => encoder.encode(value),
  decode: (bytes) => decoder.decode(bytes),
};

const say = defineMethod('test.Echo', 'Say', 'none', text, text);
const ticks = defineMethod('test.Echo', 'Ticks', 'server', text, text);
const join = defineMethod('test.Echo', 'Join', 'client', text, text);
const shout = defineMethod('test.Echo', 'Shout', 'bidi', text, text);

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

async function rejectionOf(promise: Promise<unknown>): Promise<RpcError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RpcError) return err;
    throw err;
  }
  throw new Error('expected the call to fail');
}

describe('method descriptors', () => {
  it('derive the call path from service and method', () => {
    expect(say.path).toBe('/test.Echo/Say');
    expect(ticks.streaming).toBe('server');
  });
});

describe('loopback transport', () => {
  it('runs each streaming mode end to end', async () => {
    const transport = createLoopbackTransport();
    transport.handleUnary(say, async (request, context) => `${context.path}: ${request}`);
    transport.handleServerStreaming(ticks, async function* (request) {
      for (let i = 0; i < 3; i++) yield `${request}-${i}`;
    });
    transport.handleClientStreaming(join, async (requests) => {
      const parts: string[] = [];
      for await (const r of requests) parts.push(r);
      return parts.join('+');
    });
    transport.handleBidiStreaming(shout, async function* (requests) {
      for await (const r of requests) yield r.toUpperCase();
    });

    expect(await unaryCall(transport, say, 'hi')).toBe('/test.Echo/Say: hi');

    const streamed: string[] = [];
    for await (const v of serverStreamingCall(transport, ticks, 'tick')) streamed.push(v);
    expect(streamed).toEqual(['tick-0', 'tick-1', 'tick-2']);

    expect(await clientStreamingCall(transport, join, fromArray(['a', 'b', 'c']))).toBe('a+b+c');

    const shouted: string[] = [];
    for await (const v of bidiStreamingCall(transport, shout, fromArray(['x', 'y']))) shouted.push(v);
    expect(shouted).toEqual(['X', 'Y']);

    expect(transport.activeStreams).toBe(0);
  });

  it('reports calls to unregistered methods as unimplemented', async () => {
    const err = await rejectionOf(unaryCall(createLoopbackTransport(), say, 'hi'));
    expect(err.code).toBe('unimplemented');
    expect(err.message).toBe('No handler registered for /test.Echo/Say');
  });

  it('passes handler errors through to the caller', async () => {
    const transport = createLoopbackTransport();
    const boom = new Error('boom');
    transport.handleUnary(say, async () => {
      throw boom;
    });
    await expect(unaryCall(transport, say, 'hi')).rejects.toBe(boom);
    expect(transport.activeStreams).toBe(0);
  });

  it('rejects a second handler for the same path', () => {
    const transport = createLoopbackTransport();
    transport.handleUnary(say, async (r) => r);
    expect(() => transport.handleUnary(say, async (r) => r)).toThrow('Handler already registered for /test.Echo/Say');
  });
});

describe('cancellation', () => {
  it('never starts a unary call whose signal is already aborted', async () => {
    const transport = createLoopbackTransport();
    const handler = vi.fn(async (request: string) => request);
    transport.handleUnary(say, handler);
    const controller = new AbortController();
    controller.abort();

    const err = await rejectionOf(unaryCall(transport, say, 'hi', { signal: controller.signal }));
    expect(err.code).toBe('cancelled');
    expect(err.message).toBe('/test.Echo/Say was cancelled');
    expect(handler).not.toHaveBeenCalled();
  });

  it('closes the server stream when the client breaks out of the loop', async () => {
    const transport = createLoopbackTransport();
    let cleanedUp = false;
    let seen: CallContext | undefined;
    transport.handleServerStreaming(ticks, async function* (request, context) {
      seen = context;
      try {
        for (let i = 0; ; i++) yield `${request}-${i}`;
      } finally {
        cleanedUp = true;
      }
    });

    const stream = serverStreamingCall(transport, ticks, 'tick');
    const got: string[] = [];
    for await (const v of stream) {
      got.push(v);
      if (got.length === 3) break;
    }

    expect(got).toEqual(['tick-0', 'tick-1', 'tick-2']);
    expect(cleanedUp).toBe(true);
    expect(transport.activeStreams).toBe(0);
    expect(seen?.signal.aborted).toBe(true);
    expect(stream.cancelled).toBe(true);
  });

  it('stops a stream when the caller aborts mid-flight', async () => {
    const transport = createLoopbackTransport();
    let cleanedUp = false;
    transport.handleServerStreaming(ticks, async function* (request) {
      try {
        for (let i = 0; ; i++) yield `${request}-${i}`;
      } finally {
        cleanedUp = true;
      }
    });

    const controller = new AbortController();
    const got: string[] = [];
    for await (const v of serverStreamingCall(transport, ticks, 'tick', { signal: controller.signal })) {
      got.push(v);
      if (got.length === 2) controller.abort();
    }

    expect(got).toEqual(['tick-0', 'tick-1']);
    await vi.waitFor(() => {
      expect(cleanedUp).toBe(true);
      expect(transport.activeStreams).toBe(0);
    });
  });

  it('can be cancelled explicitly', async () => {
    const transport = createLoopbackTransport();
    transport.handleServerStreaming(ticks, async function* (request) {
      for (let i = 0; ; i++) yield `${request}-${i}`;
    });
    const stream = serverStreamingCall(transport, ticks, 'tick');
    const iterator = stream[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ done: false, value: 'tick-0' });
    await stream.cancel();
    await stream.cancel();
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
    expect(transport.activeStreams).toBe(0);
  });
});

describe('ServerStream', () => {
  it('can only be iterated once', async () => {
    const transport = createLoopbackTransport();
    transport.handleServerStreaming(ticks, async function* (request) {
      yield request;
    });
    const stream = serverStreamingCall(transport, ticks, 'once');
    const got: string[] = [];
    for await (const v of stream) got.push(v);
    expect(got).toEqual(['once']);
    expect(() => stream[Symbol.asyncIterator]()).toThrow('A ServerStream can only be iterated once');
  });

  it('releases the caller signal when the transport refuses the call', async () => {
    const transport = createLoopbackTransport();
    const open = vi.spyOn(transport, 'open');
    const controller = new AbortController();
    const added = vi.spyOn(controller.signal, 'addEventListener');
    const removed = vi.spyOn(controller.signal, 'removeEventListener');
    const iterator = serverStreamingCall(transport, ticks, 'x', { signal: controller.signal })[Symbol.asyncIterator]();

    const err = await rejectionOf(iterator.next());
    expect(err.code).toBe('unimplemented');
    expect(err.message).toBe('No handler registered for /test.Echo/Ticks');
    expect(added).toHaveBeenCalledTimes(1);
    expect(removed).toHaveBeenCalledTimes(1);
    expect(removed.mock.calls[0]?.[1]).toBe(added.mock.calls[0]?.[1]);

    expect(await iterator.next()).toEqual({ done: true, value: undefined });
    expect(open).toHaveBeenCalledTimes(1);
  });

  it('sends nothing until iteration starts', () => {
    const transport = createLoopbackTransport();
    const handler = vi.fn(async function* (request: string) {
      yield request;
    });
    transport.handleServerStreaming(ticks, handler);
    serverStreamingCall(transport, ticks, 'lazy');
    expect(handler).not.toHaveBeenCalled();
  });

  it('cancels the call when a response does not decode', async () => {
    const transport = createLoopbackTransport();
    const strict: Codec<string> = {
      encode: text.encode,
      decode: (bytes) => {
        const value = decoder.decode(bytes);
        if (value === 'bad') throw new Error('undecodable response');
        return value;
      },
    };
    const fragile = defineMethod('test.Echo', 'Fragile', 'server', text, strict);
    let cleanedUp = false;
    transport.handleServerStreaming(fragile, async function* () {
      try {
        yield 'good';
        yield 'bad';
        yield 'never';
      } finally {
        cleanedUp = true;
      }
    });

    const got: string[] = [];
    const drain = async (): Promise<void> => {
      for await (const v of serverStreamingCall(transport, fragile, 'go')) got.push(v);
    };
    await expect(drain()).rejects.toThrow('undecodable response');
    expect(got).toEqual(['good']);
    expect(cleanedUp).toBe(true);
  });

  it('fails a unary call whose transport answers nothing', async () => {
    const silent: RpcTransport = {
      open: () => fromArray<Uint8Array>([]),
    };
    const err = await rejectionOf(unaryCall(silent, say, 'hi'));
    expect(err.code).toBe('internal');
    expect(err.message).toBe('/test.Echo/Say completed without a response');
  });
});
