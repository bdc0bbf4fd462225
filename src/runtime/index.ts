export type { ScalarKind, ScalarValue } from './byte-buffer.js';
export {
  ByteBuffer,
  FILE_IDENTIFIER_LENGTH,
  SIZE_PREFIX_LENGTH,
  SIZEOF_INT,
  SIZEOF_SHORT,
} from './byte-buffer.js';
export type { BuilderOptions } from './builder.js';
export { Builder } from './builder.js';
export type {
  BidiStreamingHandler,
  CallContext,
  CallOptions,
  ClientStreamingHandler,
  Codec,
  MethodDescriptor,
  RpcErrorCode,
  RpcServer,
  RpcTransport,
  ServerStreamingHandler,
  StreamingMode,
  UnaryHandler,
} from './rpc.js';
export {
  bidiStreamingCall,
  clientStreamingCall,
  createLoopbackTransport,
  defineMethod,
  LoopbackTransport,
  RpcError,
  ServerStream,
  serverStreamingCall,
  unaryCall,
} from './rpc.js';

/**
 * Options accepted by generated `serialize<Table>` functions.
 */
export interface SerializeOptions {
  /** Prefix the buffer with its u32 length. */
  sizePrefix?: boolean;
  forceDefaults?: boolean;
  initialSize?: number;
}

export interface DeserializeOptions {
  /** The buffer starts with a u32 length prefix. */
  sizePrefixed?: boolean;
}
