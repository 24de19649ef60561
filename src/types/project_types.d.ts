import type { FunctionRegistry } from '../classes/functionregistry/FunctionRegistry.class';

export type rpc_address_t = {
  host: string;
  port: number;
};

export type rpc_log_level_t = 'debug' | 'info' | 'warn';

export type rpc_log_event_t = {
  component: string;
  level: rpc_log_level_t;
  event: string;
  message: string;
  details?: Record<string, unknown>;
};

export type rpc_log_sink_t = (params: { log_event: rpc_log_event_t }) => void;

export type rpc_observability_params_t = {
  enable_console_log?: boolean;
  log_sink?: rpc_log_sink_t;
};

export type framedsocket_params_t = {
  default_timeout_ms?: number;
  framed_chunk_timeout_ms?: number;
  framed_chunk_bytes?: number;
  max_consecutive_chunk_timeouts?: number;
  max_frame_bytes?: number;
};

export type normalized_framedsocket_params_t = {
  default_timeout_ms: number;
  framed_chunk_timeout_ms: number;
  framed_chunk_bytes: number;
  max_consecutive_chunk_timeouts: number;
  max_frame_bytes: number;
};

export type rpc_callable_t = (...call_args: unknown[]) => unknown;

export type register_function_params_t = {
  callable: rpc_callable_t;
  name?: string;
};

export interface rpc_serializer_i {
  serialize(params: { value: unknown }): Buffer;
  deserialize(params: { data: Buffer }): unknown;
}

export type rpc_wire_frame_t =
  | {
      frame_type: 'perform';
      function_name: string;
    }
  | {
      frame_type: 'ack';
    }
  | {
      frame_type: 'nack';
      reason: string;
    }
  | {
      frame_type: 'exception';
      payload: Buffer;
    }
  | {
      frame_type: 'result';
      payload: Buffer;
    }
  | {
      frame_type: 'unknown';
      frame: Buffer;
    };

export type rpc_server_state_t =
  | 'idle'
  | 'running'
  | 'shutting_down'
  | 'stopped'
  | 'torn_down';

export type singleconnectionrpc_server_constructor_params_t = {
  address?: Partial<rpc_address_t>;
  function_registry?: FunctionRegistry;
  serializer?: rpc_serializer_i;
  poll_interval_ms?: number;
  listen_backlog?: number;
  transport?: framedsocket_params_t;
  observability?: rpc_observability_params_t;
};

export type singleconnectionrpc_proxy_constructor_params_t = {
  address?: Partial<rpc_address_t>;
  serializer?: rpc_serializer_i;
  max_call_duration_ms?: number;
  transport?: framedsocket_params_t;
  observability?: rpc_observability_params_t;
};

export type singleconnectionrpc_call_params_t = {
  function_name: string;
  call_args: unknown[];
};

export type singleconnectionrpc_remote_facade_t = {
  [function_name: string]: (...call_args: unknown[]) => Promise<unknown>;
};

export type serialized_error_record_t = {
  name: string;
  message: string;
  stack?: string;
  code?: string | number;
};
