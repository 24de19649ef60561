import net from 'node:net';

import type {
  framedsocket_params_t,
  normalized_framedsocket_params_t,
  rpc_address_t
} from '../../types/project_types';

import { DEFAULT_LISTEN_BACKLOG, NormalizeFramedSocketParams } from '../rpcconfig/RpcConfig';
import {
  ConnectionError,
  FramingError,
  GetErrorMessage,
  TransportError,
  TransportTimeoutError
} from '../rpcerrors/RpcErrors.class';

const LENGTH_PREFIX_BYTES = 4;
const RECEIVE_HIGH_WATER_BYTES = 1_048_576;

type wait_outcome_t = 'signaled' | 'timeout';

function WaitForSignal(params: {
  waiters: Set<() => void>;
  timeout_ms: number;
}): Promise<wait_outcome_t> {
  return new Promise<wait_outcome_t>((resolve) => {
    const waiter = (): void => {
      clearTimeout(timeout_handle);
      params.waiters.delete(waiter);
      resolve('signaled');
    };

    const timeout_handle = setTimeout(() => {
      params.waiters.delete(waiter);
      resolve('timeout');
    }, params.timeout_ms);

    params.waiters.add(waiter);
  });
}

function NotifyWaiters(params: { waiters: Set<() => void> }): void {
  for (const waiter of Array.from(params.waiters)) {
    waiter();
  }
}

/**
 * Stream socket wrapper with a timeout on every blocking operation and
 * 4-byte big-endian length-prefixed framing on top of raw byte transfer.
 *
 * One instance wraps exactly one of: a connected stream socket (created by
 * `connect()` or handed over by `accept()`), or a listening socket (created by
 * `bind()` + `listen()`).
 */
export class FramedSocket {
  private readonly params: normalized_framedsocket_params_t;

  private socket: net.Socket | null = null;
  private server: net.Server | null = null;
  private bound_address: rpc_address_t | null = null;

  private received_data: Buffer = Buffer.alloc(0);
  private is_peer_ended = false;
  private is_socket_closed = false;
  private socket_error: Error | null = null;
  private is_closed = false;

  private readonly readable_waiters = new Set<() => void>();
  private readonly writable_waiters = new Set<() => void>();

  private pending_connections: FramedSocket[] = [];
  private pending_connection_limit = DEFAULT_LISTEN_BACKLOG;
  private is_accepting = true;
  private listener_error: Error | null = null;
  private readonly accept_waiters = new Set<() => void>();

  constructor(params: { socket?: net.Socket; transport?: framedsocket_params_t } = {}) {
    this.params = NormalizeFramedSocketParams({ framedsocket_params: params.transport });

    if (params.socket) {
      this.attachSocket({ socket: params.socket });
    }
  }

  getParams(): normalized_framedsocket_params_t {
    return this.params;
  }

  async connect(params: { address: rpc_address_t; timeout_ms?: number }): Promise<void> {
    if (this.socket || this.server || this.is_closed) {
      throw new TransportError({ message: 'connect() requires a fresh FramedSocket.' });
    }

    const timeout_ms = this.resolveTimeout({ timeout_ms: params.timeout_ms });
    const host = params.address.host.length > 0 ? params.address.host : 'localhost';

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const candidate_socket = net.connect({ host, port: params.address.port });

      let settled = false;
      const finalize = (finalize_params: { error?: Error }): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout_handle);
        candidate_socket.removeAllListeners('connect');
        candidate_socket.removeAllListeners('error');

        if (finalize_params.error) {
          candidate_socket.destroy();
          reject(
            new ConnectionError({
              message: `Error connecting to ${host}:${params.address.port}: ${finalize_params.error.message}`,
              cause: finalize_params.error
            })
          );
          return;
        }
        resolve(candidate_socket);
      };

      const timeout_handle = setTimeout(() => {
        finalize({ error: new TransportTimeoutError({ message: 'Connect timed out.' }) });
      }, timeout_ms);

      candidate_socket.once('connect', () => {
        finalize({});
      });

      candidate_socket.once('error', (error) => {
        finalize({ error });
      });
    });

    this.attachSocket({ socket });
  }

  bind(params: { address: rpc_address_t }): void {
    if (this.socket || this.server || this.is_closed) {
      throw new TransportError({ message: 'bind() requires a fresh FramedSocket.' });
    }

    this.bound_address = {
      host: params.address.host,
      port: params.address.port
    };
  }

  async listen(params: { backlog?: number } = {}): Promise<void> {
    const bound_address = this.bound_address;
    if (!bound_address) {
      throw new TransportError({ message: 'bind() must be called before listen().' });
    }
    if (this.server) {
      throw new TransportError({ message: 'Socket is already listening.' });
    }

    const backlog = params.backlog ?? DEFAULT_LISTEN_BACKLOG;
    this.pending_connection_limit = backlog;

    const server = net.createServer((accepted_socket) => {
      if (!this.is_accepting || this.pending_connections.length >= this.pending_connection_limit) {
        accepted_socket.destroy();
        return;
      }

      this.pending_connections.push(
        new FramedSocket({ socket: accepted_socket, transport: this.params })
      );
      NotifyWaiters({ waiters: this.accept_waiters });
    });

    await new Promise<void>((resolve, reject) => {
      const on_listen_error = (error: Error): void => {
        reject(error);
      };

      server.once('error', on_listen_error);
      server.listen(
        {
          port: bound_address.port,
          host: bound_address.host.length > 0 ? bound_address.host : undefined,
          backlog
        },
        () => {
          server.removeListener('error', on_listen_error);
          resolve();
        }
      );
    });

    server.on('error', (error) => {
      this.listener_error = error;
      NotifyWaiters({ waiters: this.accept_waiters });
    });

    server.on('close', () => {
      NotifyWaiters({ waiters: this.accept_waiters });
    });

    const address_information = server.address();
    if (address_information && typeof address_information !== 'string') {
      this.bound_address = {
        host: bound_address.host,
        port: address_information.port
      };
    }

    this.server = server;
  }

  /**
   * While not accepting, connections are closed on arrival and the queue of
   * connections not yet taken by `accept()` is dropped. At most `backlog`
   * connections are ever queued.
   */
  setAccepting(params: { is_accepting: boolean }): void {
    this.is_accepting = params.is_accepting;
    if (params.is_accepting) {
      return;
    }

    for (const pending_connection of this.pending_connections) {
      pending_connection.close();
    }
    this.pending_connections = [];
  }

  isAccepting(): boolean {
    return this.is_accepting;
  }

  getPendingConnectionCount(): number {
    return this.pending_connections.length;
  }

  async accept(params: { timeout_ms?: number } = {}): Promise<FramedSocket> {
    const server = this.server;
    if (!server) {
      throw new TransportError({ message: 'accept() requires a listening socket.' });
    }

    const deadline_ms = Date.now() + this.resolveTimeout({ timeout_ms: params.timeout_ms });

    for (;;) {
      const pending_connection = this.pending_connections.shift();
      if (pending_connection) {
        return pending_connection;
      }

      if (this.listener_error) {
        throw new TransportError({
          message: `Connection broken? ${this.listener_error.message}`,
          cause: this.listener_error
        });
      }

      if (this.is_closed || !server.listening) {
        throw new TransportError({ message: 'Listening socket is closed.' });
      }

      const remaining_ms = deadline_ms - Date.now();
      if (remaining_ms <= 0) {
        throw new TransportTimeoutError();
      }

      await WaitForSignal({ waiters: this.accept_waiters, timeout_ms: remaining_ms });
    }
  }

  /**
   * Waits until the socket can take more data, then writes once. Resolves with
   * the number of bytes handed to the socket.
   */
  async send(params: { data: Buffer; timeout_ms?: number }): Promise<number> {
    const socket = this.requireSocket();
    const deadline_ms = Date.now() + this.resolveTimeout({ timeout_ms: params.timeout_ms });

    for (;;) {
      this.assertWritable({ socket });

      if (!socket.writableNeedDrain) {
        break;
      }

      const remaining_ms = deadline_ms - Date.now();
      if (remaining_ms <= 0) {
        throw new TransportTimeoutError();
      }

      await WaitForSignal({ waiters: this.writable_waiters, timeout_ms: remaining_ms });
    }

    socket.write(params.data);
    return params.data.length;
  }

  /**
   * Resolves with up to `max_bytes` received bytes. An empty buffer means the
   * peer closed its side; no data within the timeout rejects with
   * `TransportTimeoutError` instead.
   */
  async recv(params: { max_bytes: number; timeout_ms?: number }): Promise<Buffer> {
    this.requireSocket();
    const deadline_ms = Date.now() + this.resolveTimeout({ timeout_ms: params.timeout_ms });

    for (;;) {
      if (this.received_data.length > 0) {
        return this.takeReceivedData({ max_bytes: params.max_bytes });
      }

      if (this.socket_error) {
        throw new TransportError({
          message: `Connection broken: ${this.socket_error.message}`,
          cause: this.socket_error
        });
      }

      if (this.is_peer_ended) {
        return Buffer.alloc(0);
      }

      if (this.is_closed || this.is_socket_closed) {
        throw new TransportError({ message: 'Socket is closed.' });
      }

      const remaining_ms = deadline_ms - Date.now();
      if (remaining_ms <= 0) {
        throw new TransportTimeoutError();
      }

      await WaitForSignal({ waiters: this.readable_waiters, timeout_ms: remaining_ms });
    }
  }

  async sendFramed(params: { message: Buffer; timeout_ms?: number }): Promise<void> {
    if (params.message.length > this.params.max_frame_bytes) {
      throw new FramingError({
        message: `Outbound frame length ${params.message.length} exceeds configured max_frame_bytes (${this.params.max_frame_bytes}).`
      });
    }

    const framed_buffer = Buffer.allocUnsafe(LENGTH_PREFIX_BYTES + params.message.length);
    framed_buffer.writeUInt32BE(params.message.length, 0);
    params.message.copy(framed_buffer, LENGTH_PREFIX_BYTES);

    let sent_bytes = 0;
    while (sent_bytes < framed_buffer.length) {
      sent_bytes += await this.send({
        data: framed_buffer.subarray(sent_bytes, sent_bytes + this.params.framed_chunk_bytes),
        timeout_ms: params.timeout_ms
      });
    }
  }

  /**
   * Reads one length-prefixed message. Resolves `null` when the peer closed
   * the connection before a new frame started.
   */
  async recvFramed(params: { timeout_ms?: number } = {}): Promise<Buffer | null> {
    let length_prefix = await this.recv({
      max_bytes: LENGTH_PREFIX_BYTES,
      timeout_ms: params.timeout_ms
    });

    if (length_prefix.length === 0) {
      return null;
    }

    if (length_prefix.length < LENGTH_PREFIX_BYTES) {
      length_prefix = Buffer.concat([
        length_prefix,
        await this.recvExactly({
          byte_count: LENGTH_PREFIX_BYTES - length_prefix.length,
          failure_label: 'Invalid length prefix'
        })
      ]);
    }

    const message_length = length_prefix.readUInt32BE(0);
    if (message_length > this.params.max_frame_bytes) {
      throw new FramingError({
        message: `Inbound frame length ${message_length} exceeds configured max_frame_bytes (${this.params.max_frame_bytes}).`
      });
    }

    if (message_length === 0) {
      return Buffer.alloc(0);
    }

    return await this.recvExactly({
      byte_count: message_length,
      failure_label: 'Incomplete frame payload'
    });
  }

  close(): void {
    if (this.is_closed) {
      return;
    }
    this.is_closed = true;

    if (this.socket) {
      this.socket.destroy();
    }

    if (this.server) {
      this.server.close();
      for (const pending_connection of this.pending_connections) {
        pending_connection.close();
      }
      this.pending_connections = [];
    }

    NotifyWaiters({ waiters: this.readable_waiters });
    NotifyWaiters({ waiters: this.writable_waiters });
    NotifyWaiters({ waiters: this.accept_waiters });
  }

  isClosed(): boolean {
    return this.is_closed;
  }

  getAddress(): rpc_address_t | null {
    if (!this.bound_address) {
      return null;
    }

    return {
      host: this.bound_address.host,
      port: this.bound_address.port
    };
  }

  getRemoteAddress(): string {
    if (!this.socket) {
      return 'unknown';
    }

    return `${this.socket.remoteAddress ?? 'unknown'}:${this.socket.remotePort ?? 0}`;
  }

  private attachSocket(params: { socket: net.Socket }): void {
    const { socket } = params;
    this.socket = socket;

    socket.setNoDelay(true);

    socket.on('data', (chunk: Buffer) => {
      this.received_data =
        this.received_data.length === 0 ? chunk : Buffer.concat([this.received_data, chunk]);
      if (this.received_data.length >= RECEIVE_HIGH_WATER_BYTES) {
        socket.pause();
      }
      NotifyWaiters({ waiters: this.readable_waiters });
    });

    socket.on('end', () => {
      this.is_peer_ended = true;
      NotifyWaiters({ waiters: this.readable_waiters });
    });

    socket.on('drain', () => {
      NotifyWaiters({ waiters: this.writable_waiters });
    });

    socket.on('error', (error) => {
      this.socket_error = error;
      NotifyWaiters({ waiters: this.readable_waiters });
      NotifyWaiters({ waiters: this.writable_waiters });
    });

    socket.on('close', () => {
      this.is_socket_closed = true;
      NotifyWaiters({ waiters: this.readable_waiters });
      NotifyWaiters({ waiters: this.writable_waiters });
    });

    if (socket.destroyed) {
      this.is_socket_closed = true;
    }
  }

  private async recvExactly(params: { byte_count: number; failure_label: string }): Promise<Buffer> {
    const received_chunks: Buffer[] = [];
    let received_bytes = 0;
    let consecutive_timeouts = 0;

    while (received_bytes < params.byte_count) {
      let chunk: Buffer;
      try {
        chunk = await this.recv({
          max_bytes: Math.min(this.params.framed_chunk_bytes, params.byte_count - received_bytes),
          timeout_ms: this.params.framed_chunk_timeout_ms
        });
      } catch (error) {
        if (!(error instanceof TransportTimeoutError)) {
          throw error;
        }

        consecutive_timeouts += 1;
        if (consecutive_timeouts > this.params.max_consecutive_chunk_timeouts) {
          throw new FramingError({
            message: `${params.failure_label}: not enough data was received (${received_bytes}/${params.byte_count} bytes).`,
            cause: error
          });
        }
        continue;
      }

      if (chunk.length === 0) {
        throw new FramingError({
          message: `${params.failure_label}: connection was closed unexpectedly (${received_bytes}/${params.byte_count} bytes).`
        });
      }

      received_chunks.push(chunk);
      received_bytes += chunk.length;
      consecutive_timeouts = 0;
    }

    return Buffer.concat(received_chunks, params.byte_count);
  }

  private takeReceivedData(params: { max_bytes: number }): Buffer {
    const taken_data = this.received_data.subarray(0, params.max_bytes);
    this.received_data = this.received_data.subarray(taken_data.length);

    if (
      this.socket &&
      this.socket.isPaused() &&
      this.received_data.length < RECEIVE_HIGH_WATER_BYTES
    ) {
      this.socket.resume();
    }

    return taken_data;
  }

  private assertWritable(params: { socket: net.Socket }): void {
    if (this.socket_error) {
      throw new TransportError({
        message: `Connection broken: ${GetErrorMessage({ error: this.socket_error })}`,
        cause: this.socket_error
      });
    }

    if (
      this.is_closed ||
      this.is_socket_closed ||
      params.socket.destroyed ||
      params.socket.writableEnded
    ) {
      throw new TransportError({ message: 'Socket is not writable.' });
    }
  }

  private requireSocket(): net.Socket {
    if (!this.socket) {
      throw new TransportError({ message: 'Socket is not connected.' });
    }

    return this.socket;
  }

  private resolveTimeout(params: { timeout_ms?: number }): number {
    if (params.timeout_ms === undefined) {
      return this.params.default_timeout_ms;
    }

    if (!Number.isFinite(params.timeout_ms) || params.timeout_ms < 0) {
      throw new RangeError(`Invalid timeout period (${params.timeout_ms}).`);
    }

    return params.timeout_ms;
  }
}
