import type {
  framedsocket_params_t,
  normalized_framedsocket_params_t,
  rpc_address_t
} from '../../types/project_types';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_FRAMED_CHUNK_TIMEOUT_MS = 60_000;
export const DEFAULT_FRAMED_CHUNK_BYTES = 4_096;
export const DEFAULT_MAX_CONSECUTIVE_CHUNK_TIMEOUTS = 1;
export const MAX_FRAME_BYTES = 0xffff_ffff;

export const DEFAULT_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_LISTEN_BACKLOG = 5;
export const DEFAULT_MAX_CALL_DURATION_MS = 600_000;

export const DEFAULT_SERVER_ADDRESS: rpc_address_t = {
  host: '',
  port: 0
};

export const DEFAULT_PROXY_ADDRESS: rpc_address_t = {
  host: 'localhost',
  port: 3344
};

const DEFAULT_FRAMEDSOCKET_PARAMS: normalized_framedsocket_params_t = {
  default_timeout_ms: DEFAULT_TIMEOUT_MS,
  framed_chunk_timeout_ms: DEFAULT_FRAMED_CHUNK_TIMEOUT_MS,
  framed_chunk_bytes: DEFAULT_FRAMED_CHUNK_BYTES,
  max_consecutive_chunk_timeouts: DEFAULT_MAX_CONSECUTIVE_CHUNK_TIMEOUTS,
  max_frame_bytes: MAX_FRAME_BYTES
};

export function AssertPositiveInteger(params: { value: number; label: string }): void {
  const { value, label } = params;
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${label} must be a positive integer.`);
  }
}

export function AssertNonNegativeInteger(params: { value: number; label: string }): void {
  const { value, label } = params;
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative integer.`);
  }
}

export function NormalizeFramedSocketParams(params: {
  framedsocket_params: framedsocket_params_t | undefined;
}): normalized_framedsocket_params_t {
  const input = params.framedsocket_params ?? {};

  const normalized_params: normalized_framedsocket_params_t = {
    default_timeout_ms:
      input.default_timeout_ms ?? DEFAULT_FRAMEDSOCKET_PARAMS.default_timeout_ms,
    framed_chunk_timeout_ms:
      input.framed_chunk_timeout_ms ?? DEFAULT_FRAMEDSOCKET_PARAMS.framed_chunk_timeout_ms,
    framed_chunk_bytes:
      input.framed_chunk_bytes ?? DEFAULT_FRAMEDSOCKET_PARAMS.framed_chunk_bytes,
    max_consecutive_chunk_timeouts:
      input.max_consecutive_chunk_timeouts ??
      DEFAULT_FRAMEDSOCKET_PARAMS.max_consecutive_chunk_timeouts,
    max_frame_bytes: input.max_frame_bytes ?? DEFAULT_FRAMEDSOCKET_PARAMS.max_frame_bytes
  };

  AssertPositiveInteger({
    value: normalized_params.default_timeout_ms,
    label: 'transport.default_timeout_ms'
  });
  AssertPositiveInteger({
    value: normalized_params.framed_chunk_timeout_ms,
    label: 'transport.framed_chunk_timeout_ms'
  });
  AssertPositiveInteger({
    value: normalized_params.framed_chunk_bytes,
    label: 'transport.framed_chunk_bytes'
  });
  AssertNonNegativeInteger({
    value: normalized_params.max_consecutive_chunk_timeouts,
    label: 'transport.max_consecutive_chunk_timeouts'
  });
  AssertPositiveInteger({
    value: normalized_params.max_frame_bytes,
    label: 'transport.max_frame_bytes'
  });

  if (normalized_params.max_frame_bytes > MAX_FRAME_BYTES) {
    throw new Error(`transport.max_frame_bytes cannot exceed ${MAX_FRAME_BYTES}.`);
  }

  return normalized_params;
}

export function NormalizeAddress(params: {
  address: Partial<rpc_address_t> | undefined;
  defaults: rpc_address_t;
  allow_ephemeral_port: boolean;
}): rpc_address_t {
  const normalized_address: rpc_address_t = {
    host: params.address?.host ?? params.defaults.host,
    port: params.address?.port ?? params.defaults.port
  };

  if (params.allow_ephemeral_port) {
    AssertNonNegativeInteger({ value: normalized_address.port, label: 'address.port' });
  } else {
    AssertPositiveInteger({ value: normalized_address.port, label: 'address.port' });
  }

  if (normalized_address.port > 65_535) {
    throw new Error('address.port must be at most 65535.');
  }

  return normalized_address;
}

export function FormatAddress(params: { address: rpc_address_t }): string {
  const host = params.address.host.length > 0 ? params.address.host : '*';
  return `${host}:${params.address.port}`;
}
