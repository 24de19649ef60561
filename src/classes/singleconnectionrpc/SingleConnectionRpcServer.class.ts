import type {
  framedsocket_params_t,
  register_function_params_t,
  rpc_address_t,
  rpc_callable_t,
  rpc_serializer_i,
  rpc_server_state_t,
  rpc_wire_frame_t,
  singleconnectionrpc_server_constructor_params_t
} from '../../types/project_types';

import { FramedSocket } from '../framedsocket/FramedSocket.class';
import { FunctionRegistry } from '../functionregistry/FunctionRegistry.class';
import {
  AssertPositiveInteger,
  DEFAULT_LISTEN_BACKLOG,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SERVER_ADDRESS,
  FormatAddress,
  NormalizeAddress
} from '../rpcconfig/RpcConfig';
import {
  GetErrorMessage,
  MarshalingError,
  NormalizeThrownValue,
  ServerStateError,
  TransportTimeoutError
} from '../rpcerrors/RpcErrors.class';
import { RpcLogger } from '../rpclogger/RpcLogger.class';
import { JsonSerializer } from '../serializer/JsonSerializer.class';
import { DecodeWireFrame, EncodeWireFrame } from '../wireprotocol/WireProtocol';

type perform_outcome_t = 'continue' | 'disconnect';

/**
 * Server half of the PERFORM exchange for one accepted connection. The worker
 * owns its socket from spawn until exit.
 */
export class SingleConnectionRpcWorker {
  private readonly connection: FramedSocket;
  private readonly function_registry: FunctionRegistry;
  private readonly serializer: rpc_serializer_i;
  private readonly poll_interval_ms: number;
  private readonly logger: RpcLogger;
  private readonly is_shutdown_requested: () => boolean;
  private readonly on_exit: (params: { worker: SingleConnectionRpcWorker }) => void;
  private readonly peer_address: string;

  private is_disconnected = false;

  constructor(params: {
    connection: FramedSocket;
    function_registry: FunctionRegistry;
    serializer: rpc_serializer_i;
    poll_interval_ms: number;
    logger: RpcLogger;
    is_shutdown_requested: () => boolean;
    on_exit: (params: { worker: SingleConnectionRpcWorker }) => void;
  }) {
    this.connection = params.connection;
    this.function_registry = params.function_registry;
    this.serializer = params.serializer;
    this.poll_interval_ms = params.poll_interval_ms;
    this.logger = params.logger;
    this.is_shutdown_requested = params.is_shutdown_requested;
    this.on_exit = params.on_exit;
    this.peer_address = params.connection.getRemoteAddress();
  }

  getPeerAddress(): string {
    return this.peer_address;
  }

  async run(): Promise<void> {
    this.logger.log({
      level: 'debug',
      event: 'worker_spawned',
      message: `worker spawned for ${this.peer_address}`
    });

    try {
      while (!this.is_shutdown_requested()) {
        let command_frame: Buffer | null;
        try {
          command_frame = await this.connection.recvFramed({ timeout_ms: this.poll_interval_ms });
        } catch (error) {
          if (error instanceof TransportTimeoutError) {
            continue;
          }
          this.logger.log({
            level: 'debug',
            event: 'connection_broken',
            message: `${this.peer_address}: ${GetErrorMessage({ error })}`
          });
          break;
        }

        if (command_frame === null || command_frame.length === 0) {
          this.logger.log({
            level: 'debug',
            event: 'peer_closed',
            message: `connection closed by ${this.peer_address}`
          });
          break;
        }

        const wire_frame = DecodeWireFrame({ frame: command_frame });
        if (wire_frame.frame_type !== 'perform') {
          this.logger.log({
            level: 'debug',
            event: 'protocol_fault',
            message: `ignoring unexpected ${wire_frame.frame_type} frame from ${this.peer_address}`
          });
          continue;
        }

        const perform_outcome = await this.performCall({
          function_name: wire_frame.function_name
        });
        if (perform_outcome === 'disconnect') {
          break;
        }
      }
    } catch (error) {
      this.logger.log({
        level: 'warn',
        event: 'worker_failed',
        message: `unhandled error while serving ${this.peer_address}: ${GetErrorMessage({ error })}`
      });
    } finally {
      this.disconnect();
      this.logger.log({
        level: 'debug',
        event: 'worker_exit',
        message: `worker leaving for ${this.peer_address}`
      });
    }
  }

  disconnect(): void {
    if (this.is_disconnected) {
      return;
    }
    this.is_disconnected = true;

    try {
      this.on_exit({ worker: this });
      this.connection.close();
    } catch (error) {
      this.logger.log({
        level: 'debug',
        event: 'disconnect_failed',
        message: GetErrorMessage({ error })
      });
    }
  }

  private async performCall(params: { function_name: string }): Promise<perform_outcome_t> {
    const { function_name } = params;

    const callable = this.function_registry.lookup({ name: function_name });
    if (!callable) {
      return await this.sendResponse({
        frame: {
          frame_type: 'nack',
          reason: `Function (${function_name}) does not exist.`
        }
      });
    }

    if ((await this.sendResponse({ frame: { frame_type: 'ack' } })) === 'disconnect') {
      return 'disconnect';
    }

    const intent_hook = this.function_registry.lookupIntentHook({ name: function_name });
    await this.notifyIntent({ intent_hook, function_name, failed: false });

    let argument_payload: Buffer | null;
    try {
      argument_payload = await this.connection.recvFramed();
    } catch (error) {
      this.logger.log({
        level: 'debug',
        event: 'connection_broken',
        message: `${this.peer_address} did not send input for ${function_name}: ${GetErrorMessage({ error })}`
      });
      await this.notifyIntent({ intent_hook, function_name, failed: true });
      return 'disconnect';
    }

    if (argument_payload === null || argument_payload.length === 0) {
      this.logger.log({
        level: 'debug',
        event: 'peer_closed',
        message: `${this.peer_address} closed the connection before sending input for ${function_name}`
      });
      await this.notifyIntent({ intent_hook, function_name, failed: true });
      return 'disconnect';
    }

    let call_args: unknown;
    try {
      call_args = this.serializer.deserialize({ data: argument_payload });
    } catch (error) {
      this.logger.log({
        level: 'debug',
        event: 'protocol_fault',
        message: `could not unmarshal input for ${function_name}: ${GetErrorMessage({ error })}`
      });
      await this.notifyIntent({ intent_hook, function_name, failed: true });
      return await this.sendException({ error });
    }

    if (!Array.isArray(call_args)) {
      await this.notifyIntent({ intent_hook, function_name, failed: true });
      return await this.sendResponse({
        frame: { frame_type: 'nack', reason: 'Argument must be a tuple.' }
      });
    }
    const positional_args: unknown[] = call_args;

    if ((await this.sendResponse({ frame: { frame_type: 'ack' } })) === 'disconnect') {
      await this.notifyIntent({ intent_hook, function_name, failed: true });
      return 'disconnect';
    }

    let call_result: unknown;
    try {
      call_result = await callable(...positional_args);
    } catch (error) {
      return await this.sendException({ error });
    }

    let serialized_result: Buffer;
    try {
      serialized_result = this.serializer.serialize({ value: call_result });
    } catch (error) {
      this.logger.log({
        level: 'debug',
        event: 'protocol_fault',
        message: `could not marshal the result of ${function_name}: ${GetErrorMessage({ error })}`
      });
      return await this.sendException({ error });
    }

    return await this.sendResponse({
      frame: { frame_type: 'result', payload: serialized_result }
    });
  }

  private async sendException(params: { error: unknown }): Promise<perform_outcome_t> {
    const error = NormalizeThrownValue({ error: params.error });

    let serialized_error: Buffer;
    try {
      serialized_error = this.serializer.serialize({ value: error });
    } catch (serialize_error) {
      serialized_error = this.serializer.serialize({
        value: new MarshalingError({
          message: `Could not marshal ${error.name}: ${GetErrorMessage({ error: serialize_error })}`
        })
      });
    }

    return await this.sendResponse({
      frame: { frame_type: 'exception', payload: serialized_error }
    });
  }

  private async sendResponse(params: { frame: rpc_wire_frame_t }): Promise<perform_outcome_t> {
    try {
      await this.connection.sendFramed({ message: EncodeWireFrame({ frame: params.frame }) });
      return 'continue';
    } catch (error) {
      this.logger.log({
        level: 'debug',
        event: 'connection_broken',
        message: `failed to send ${params.frame.frame_type} to ${this.peer_address}: ${GetErrorMessage({ error })}`
      });
      return 'disconnect';
    }
  }

  private async notifyIntent(params: {
    intent_hook: rpc_callable_t | null;
    function_name: string;
    failed: boolean;
  }): Promise<void> {
    if (!params.intent_hook) {
      return;
    }

    try {
      await params.intent_hook(params.failed);
    } catch (error) {
      this.logger.log({
        level: 'warn',
        event: 'intent_hook_failed',
        message: `${params.function_name} intent hook failed: ${GetErrorMessage({ error })}`
      });
    }
  }
}

/**
 * Listens on one address, hands every accepted connection to its own worker,
 * and stops cooperatively: the accept loop and the workers re-check the
 * shutdown flag after each poll interval.
 */
export class SingleConnectionRpcServer {
  private readonly address: rpc_address_t;
  private readonly function_registry: FunctionRegistry;
  private readonly serializer: rpc_serializer_i;
  private readonly poll_interval_ms: number;
  private readonly listen_backlog: number;
  private readonly transport_params: framedsocket_params_t | undefined;
  private readonly logger: RpcLogger;

  private listening_socket: FramedSocket | null = null;
  private server_state: rpc_server_state_t = 'idle';
  private is_shutdown_requested = false;
  private accept_loop_promise: Promise<void> | null = null;
  private readonly live_workers = new Set<SingleConnectionRpcWorker>();

  constructor(params: singleconnectionrpc_server_constructor_params_t = {}) {
    this.address = NormalizeAddress({
      address: params.address,
      defaults: DEFAULT_SERVER_ADDRESS,
      allow_ephemeral_port: true
    });
    this.function_registry = params.function_registry ?? new FunctionRegistry();
    this.serializer = params.serializer ?? new JsonSerializer();
    this.poll_interval_ms = params.poll_interval_ms ?? DEFAULT_POLL_INTERVAL_MS;
    this.listen_backlog = params.listen_backlog ?? DEFAULT_LISTEN_BACKLOG;
    this.transport_params = params.transport;
    this.logger = new RpcLogger({ component: 'server', observability: params.observability });

    AssertPositiveInteger({ value: this.poll_interval_ms, label: 'poll_interval_ms' });
    AssertPositiveInteger({ value: this.listen_backlog, label: 'listen_backlog' });
  }

  registerFunction(params: register_function_params_t): string {
    return this.function_registry.register(params);
  }

  async start(): Promise<void> {
    if (this.server_state === 'torn_down') {
      throw new ServerStateError({
        message: 'Server has been torn down and cannot be started again.'
      });
    }
    if (this.server_state === 'running' || this.server_state === 'shutting_down') {
      throw new ServerStateError({ message: 'Server is already running.' });
    }

    let listening_socket = this.listening_socket;
    if (!listening_socket) {
      listening_socket = new FramedSocket({ transport: this.transport_params });
      listening_socket.bind({ address: this.address });
      await listening_socket.listen({ backlog: this.listen_backlog });
      this.listening_socket = listening_socket;
    }

    listening_socket.setAccepting({ is_accepting: true });
    this.is_shutdown_requested = false;
    this.server_state = 'running';
    this.accept_loop_promise = this.runAcceptLoop({ listening_socket });
  }

  /**
   * From here on, new connections are closed on arrival and queued ones are
   * dropped; connections already handed to a worker finish their current call.
   */
  async stop(params: { block?: boolean } = {}): Promise<void> {
    this.is_shutdown_requested = true;
    this.listening_socket?.setAccepting({ is_accepting: false });
    if (this.server_state === 'running') {
      this.server_state = 'shutting_down';
    }

    if (params.block && this.accept_loop_promise) {
      await this.accept_loop_promise;
    }
  }

  /** Stops the accept loop and closes the listening socket for good. */
  async teardown(): Promise<void> {
    await this.stop({ block: true });

    if (this.listening_socket) {
      this.listening_socket.close();
      this.listening_socket = null;
    }

    this.server_state = 'torn_down';
  }

  getState(): rpc_server_state_t {
    return this.server_state;
  }

  isShuttingDown(): boolean {
    return this.is_shutdown_requested;
  }

  getAddress(): rpc_address_t {
    return this.listening_socket?.getAddress() ?? { host: this.address.host, port: this.address.port };
  }

  getFunctionRegistry(): FunctionRegistry {
    return this.function_registry;
  }

  getPendingConnectionCount(): number {
    return this.listening_socket?.getPendingConnectionCount() ?? 0;
  }

  getLiveWorkerCount(): number {
    return this.live_workers.size;
  }

  removeWorker(params: { worker: SingleConnectionRpcWorker }): void {
    this.live_workers.delete(params.worker);
  }

  private async runAcceptLoop(params: { listening_socket: FramedSocket }): Promise<void> {
    this.logger.log({
      level: 'info',
      event: 'accept_loop_started',
      message: `listening on ${FormatAddress({ address: this.getAddress() })}`
    });

    try {
      while (!this.is_shutdown_requested) {
        let connection: FramedSocket;
        try {
          connection = await params.listening_socket.accept({ timeout_ms: this.poll_interval_ms });
        } catch (error) {
          if (error instanceof TransportTimeoutError) {
            continue;
          }
          this.logger.log({
            level: 'warn',
            event: 'accept_failed',
            message: GetErrorMessage({ error })
          });
          break;
        }

        if (this.is_shutdown_requested) {
          connection.close();
          break;
        }

        this.spawnWorker({ connection });
      }
    } catch (error) {
      this.logger.log({
        level: 'warn',
        event: 'accept_loop_failed',
        message: GetErrorMessage({ error })
      });
    } finally {
      if (this.server_state !== 'torn_down') {
        this.server_state = 'stopped';
      }
      this.logger.log({
        level: 'info',
        event: 'accept_loop_stopped',
        message: `no longer accepting on ${FormatAddress({ address: this.getAddress() })}`
      });
    }
  }

  private spawnWorker(params: { connection: FramedSocket }): void {
    const worker = new SingleConnectionRpcWorker({
      connection: params.connection,
      function_registry: this.function_registry,
      serializer: this.serializer,
      poll_interval_ms: this.poll_interval_ms,
      logger: this.logger.child({ component: 'worker' }),
      is_shutdown_requested: () => this.is_shutdown_requested,
      on_exit: ({ worker: exiting_worker }) => {
        this.removeWorker({ worker: exiting_worker });
      }
    });

    this.live_workers.add(worker);
    void worker.run();
  }
}
