import type { serialized_error_record_t } from '../../types/project_types';

import { MarshalingError, ReconstructedError } from '../rpcerrors/RpcErrors.class';

export const ERROR_MARKER_KEY = '$rpc_error';

export function IsPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function DescribeError(params: { error: Error }): serialized_error_record_t {
  const { error } = params;
  const error_record: serialized_error_record_t = {
    name: error.name,
    message: error.message
  };

  if (typeof error.stack === 'string') {
    error_record.stack = error.stack;
  }

  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    error_record.code = error.code;
  }

  return error_record;
}

function EncodeValue(params: { value: unknown; ancestors: Set<object> }): unknown {
  const { value, ancestors } = params;

  if (value instanceof Error) {
    return { [ERROR_MARKER_KEY]: DescribeError({ error: value }) };
  }

  if (typeof value !== 'object' || value === null) {
    return value;
  }

  if (!Array.isArray(value) && !IsPlainObject(value)) {
    return value;
  }

  if (ancestors.has(value)) {
    throw new MarshalingError({ message: 'Cannot serialize a circular structure.' });
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((entry: unknown) => EncodeValue({ value: entry, ancestors }));
    }

    const encoded_object: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      encoded_object[key] = EncodeValue({ value: entry, ancestors });
    }
    return encoded_object;
  } finally {
    ancestors.delete(value);
  }
}

function RebuildError(params: { error_record: Record<string, unknown> }): ReconstructedError {
  const { error_record } = params;

  return new ReconstructedError({
    name: typeof error_record.name === 'string' ? error_record.name : 'Error',
    message: typeof error_record.message === 'string' ? error_record.message : '',
    stack: typeof error_record.stack === 'string' ? error_record.stack : undefined,
    code:
      typeof error_record.code === 'string' || typeof error_record.code === 'number'
        ? error_record.code
        : undefined
  });
}

function DecodeValue(params: { value: unknown }): unknown {
  const { value } = params;

  if (Array.isArray(value)) {
    return value.map((entry: unknown) => DecodeValue({ value: entry }));
  }

  if (!IsPlainObject(value)) {
    return value;
  }

  const error_record = value[ERROR_MARKER_KEY];
  if (Object.keys(value).length === 1 && IsPlainObject(error_record)) {
    return RebuildError({ error_record });
  }

  const decoded_object: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    decoded_object[key] = DecodeValue({ value: entry });
  }
  return decoded_object;
}

/**
 * Replaces every `Error` inside `value` with a tagged plain record so codecs
 * that only know plain data can carry it. Circular arrays or objects throw.
 */
export function EncodeErrorValues(params: { value: unknown }): unknown {
  return EncodeValue({ value: params.value, ancestors: new Set<object>() });
}

export function DecodeErrorValues(params: { value: unknown }): unknown {
  return DecodeValue({ value: params.value });
}
