import type {
  framedsocket_params_t,
  rpc_address_t,
  rpc_serializer_i,
  rpc_wire_frame_t,
  singleconnectionrpc_call_params_t,
  singleconnectionrpc_proxy_constructor_params_t,
  singleconnectionrpc_remote_facade_t
} from '../../types/project_types';

import { AsyncLock } from '../asynclock/AsyncLock.class';
import { FramedSocket } from '../framedsocket/FramedSocket.class';
import {
  AssertPositiveInteger,
  DEFAULT_MAX_CALL_DURATION_MS,
  DEFAULT_PROXY_ADDRESS,
  FormatAddress,
  NormalizeAddress
} from '../rpcconfig/RpcConfig';
import {
  CommunicationError,
  GetErrorMessage,
  MarshalingError,
  RemoteError,
  RemoteExceptionError,
  TransportTimeoutError
} from '../rpcerrors/RpcErrors.class';
import { RpcLogger } from '../rpclogger/RpcLogger.class';
import { JsonSerializer } from '../serializer/JsonSerializer.class';
import { DecodeWireFrame, EncodeWireFrame } from '../wireprotocol/WireProtocol';

const FACADE_RESERVED_PROPERTY_NAMES = new Set<string>(['then', 'catch', 'finally']);

/**
 * Client side of one persistent connection. Calls are serialized by a FIFO
 * lock, so request and response frames of two calls never interleave. Every
 * failure surfaces as `CommunicationError` (reconnect needed), `RemoteError`
 * (connection kept) or `MarshalingError` (connection kept).
 */
export class SingleConnectionRpcProxy {
  public readonly remote: singleconnectionrpc_remote_facade_t;

  private address: rpc_address_t;
  private readonly serializer: rpc_serializer_i;
  private readonly max_call_duration_ms: number;
  private readonly transport_params: framedsocket_params_t | undefined;
  private readonly logger: RpcLogger;
  private readonly call_lock = new AsyncLock();

  private connection: FramedSocket | null = null;
  private is_connected = false;

  static async connect(
    params: singleconnectionrpc_proxy_constructor_params_t = {}
  ): Promise<SingleConnectionRpcProxy> {
    const proxy = new SingleConnectionRpcProxy(params);
    await proxy.establishConnection();
    return proxy;
  }

  constructor(params: singleconnectionrpc_proxy_constructor_params_t = {}) {
    this.address = NormalizeAddress({
      address: params.address,
      defaults: DEFAULT_PROXY_ADDRESS,
      allow_ephemeral_port: false
    });
    this.serializer = params.serializer ?? new JsonSerializer();
    this.max_call_duration_ms = params.max_call_duration_ms ?? DEFAULT_MAX_CALL_DURATION_MS;
    this.transport_params = params.transport;
    this.logger = new RpcLogger({ component: 'proxy', observability: params.observability });

    AssertPositiveInteger({ value: this.max_call_duration_ms, label: 'max_call_duration_ms' });

    this.remote = this.createRemoteFacade();
  }

  /** Takes effect at the next (re)connect. */
  setAddress(params: { address: Partial<rpc_address_t> }): void {
    this.address = NormalizeAddress({
      address: params.address,
      defaults: this.address,
      allow_ephemeral_port: false
    });
  }

  getAddress(): rpc_address_t {
    return { host: this.address.host, port: this.address.port };
  }

  isConnected(): boolean {
    return this.is_connected;
  }

  async call(params: singleconnectionrpc_call_params_t): Promise<unknown> {
    return await this.call_lock.runExclusive({
      task: async () => {
        try {
          return await this.performCall(params);
        } catch (error) {
          this.logger.log({
            level: 'debug',
            event: 'call_failed',
            message: `${params.function_name}: ${GetErrorMessage({ error })}`
          });
          throw error;
        }
      }
    });
  }

  async invoke(function_name: string, ...call_args: unknown[]): Promise<unknown> {
    return await this.call({ function_name, call_args });
  }

  async close(): Promise<void> {
    this.disconnect({ quiet: false });
  }

  private async establishConnection(): Promise<FramedSocket> {
    const connection = new FramedSocket({ transport: this.transport_params });
    try {
      await connection.connect({ address: this.address });
    } catch (error) {
      throw new CommunicationError({
        message: 'Error connecting to RPC server.',
        cause: error
      });
    }

    this.connection = connection;
    this.is_connected = true;
    this.logger.log({
      level: 'debug',
      event: 'proxy_connected',
      message: `connected to ${FormatAddress({ address: this.address })}`
    });
    return connection;
  }

  private disconnect(params: { quiet: boolean }): void {
    const connection = this.connection;
    this.connection = null;
    this.is_connected = false;

    if (!connection) {
      return;
    }

    try {
      connection.close();
    } catch (error) {
      if (!params.quiet) {
        throw new CommunicationError({
          message: 'Error disconnecting from server.',
          cause: error
        });
      }
    } finally {
      this.logger.log({
        level: 'debug',
        event: 'proxy_disconnected',
        message: `disconnected from ${FormatAddress({ address: this.address })}`
      });
    }
  }

  private async performCall(params: singleconnectionrpc_call_params_t): Promise<unknown> {
    const connection =
      this.connection && this.is_connected ? this.connection : await this.establishConnection();

    let serialized_args: Buffer;
    try {
      serialized_args = this.serializer.serialize({ value: params.call_args });
    } catch (error) {
      throw this.asMarshalingError({ error, message: 'Error marshaling function input.' });
    }

    await this.sendFrame({
      connection,
      message: EncodeWireFrame({
        frame: { frame_type: 'perform', function_name: params.function_name }
      }),
      failure_message: 'Error sending PERFORM request to server.'
    });

    const perform_response = await this.receiveFrame({
      connection,
      failure_message: 'Server did not respond to PERFORM request.'
    });
    if (perform_response.frame_type === 'nack') {
      throw new RemoteError({ message: perform_response.reason });
    }
    if (perform_response.frame_type !== 'ack') {
      this.raiseProtocolViolation({ frame: perform_response, step: 'PERFORM request' });
    }

    await this.sendFrame({
      connection,
      message: serialized_args,
      failure_message: 'Error sending function input to server.'
    });

    const input_response = await this.receiveFrame({
      connection,
      failure_message: 'Server did not ack receipt of input.'
    });
    if (input_response.frame_type === 'nack') {
      throw new RemoteError({ message: input_response.reason });
    }
    if (input_response.frame_type === 'exception') {
      this.raiseRemoteException({ payload: input_response.payload });
    }
    if (input_response.frame_type !== 'ack') {
      this.raiseProtocolViolation({ frame: input_response, step: 'function input' });
    }

    const final_response = await this.receiveFinalFrame({ connection });
    if (final_response.frame_type === 'exception') {
      this.raiseRemoteException({ payload: final_response.payload });
    }
    if (final_response.frame_type !== 'result') {
      this.raiseProtocolViolation({ frame: final_response, step: 'remote function output' });
    }

    try {
      return this.serializer.deserialize({ data: final_response.payload });
    } catch (error) {
      throw this.asMarshalingError({ error, message: 'Error unmarshaling result.' });
    }
  }

  private async sendFrame(params: {
    connection: FramedSocket;
    message: Buffer;
    failure_message: string;
  }): Promise<void> {
    try {
      await params.connection.sendFramed({ message: params.message });
    } catch (error) {
      this.disconnect({ quiet: true });
      throw new CommunicationError({ message: params.failure_message, cause: error });
    }
  }

  private async receiveFrame(params: {
    connection: FramedSocket;
    failure_message: string;
  }): Promise<rpc_wire_frame_t> {
    let frame: Buffer | null;
    try {
      frame = await params.connection.recvFramed();
    } catch (error) {
      this.disconnect({ quiet: true });
      throw new CommunicationError({ message: params.failure_message, cause: error });
    }

    return this.decodeResponse({ frame });
  }

  /**
   * Waits up to `max_call_duration_ms` for RESULT or EXCEPTION. A timeout is
   * a `RemoteError` and drops the connection; a late reply must never be read
   * as the answer to the next call.
   */
  private async receiveFinalFrame(params: { connection: FramedSocket }): Promise<rpc_wire_frame_t> {
    let frame: Buffer | null;
    try {
      frame = await params.connection.recvFramed({ timeout_ms: this.max_call_duration_ms });
    } catch (error) {
      this.disconnect({ quiet: true });
      if (error instanceof TransportTimeoutError) {
        throw new RemoteError({
          message: 'Timeout while performing remote function.',
          cause: error
        });
      }
      throw new CommunicationError({
        message: 'Error receiving remote function output.',
        cause: error
      });
    }

    return this.decodeResponse({ frame });
  }

  private decodeResponse(params: { frame: Buffer | null }): rpc_wire_frame_t {
    if (params.frame === null || params.frame.length === 0) {
      this.disconnect({ quiet: true });
      throw new CommunicationError({ message: 'Connection closed by server.' });
    }

    return DecodeWireFrame({ frame: params.frame });
  }

  private raiseRemoteException(params: { payload: Buffer }): never {
    let remote_error: unknown;
    try {
      remote_error = this.serializer.deserialize({ data: params.payload });
    } catch (error) {
      throw new RemoteError({ message: 'Unknown exception raised on server.', cause: error });
    }

    if (!(remote_error instanceof Error)) {
      throw new RemoteError({ message: 'Unknown exception raised on server.' });
    }

    throw new RemoteExceptionError({ remote_error });
  }

  private raiseProtocolViolation(params: { frame: rpc_wire_frame_t; step: string }): never {
    this.disconnect({ quiet: true });
    throw new CommunicationError({
      message: `Unexpected ${params.frame.frame_type} frame from server after ${params.step}.`
    });
  }

  private asMarshalingError(params: { error: unknown; message: string }): MarshalingError {
    if (params.error instanceof MarshalingError) {
      return params.error;
    }

    return new MarshalingError({
      message: `${params.message} ${GetErrorMessage({ error: params.error })}`,
      cause: params.error
    });
  }

  private createRemoteFacade(): singleconnectionrpc_remote_facade_t {
    const facade_target: singleconnectionrpc_remote_facade_t = {};

    return new Proxy(facade_target, {
      get: (_target, property_name: string | symbol): unknown => {
        if (typeof property_name !== 'string') {
          return undefined;
        }

        if (FACADE_RESERVED_PROPERTY_NAMES.has(property_name)) {
          return undefined;
        }

        return async (...call_args: unknown[]): Promise<unknown> => {
          return await this.call({
            function_name: property_name,
            call_args
          });
        };
      }
    });
  }
}
