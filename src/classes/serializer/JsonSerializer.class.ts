import type { rpc_serializer_i } from '../../types/project_types';

import { GetErrorMessage, MarshalingError } from '../rpcerrors/RpcErrors.class';
import { DecodeErrorValues, EncodeErrorValues, IsPlainObject } from './SerializedErrors';

/**
 * UTF-8 JSON inside a `{ "value": ... }` envelope, so a top-level `undefined`
 * survives the trip. JSON limits apply below the top level: `undefined` array
 * entries arrive as `null` and functions are dropped.
 */
export class JsonSerializer implements rpc_serializer_i {
  serialize(params: { value: unknown }): Buffer {
    let payload_json: string;
    try {
      payload_json = JSON.stringify({ value: EncodeErrorValues({ value: params.value }) });
    } catch (error) {
      if (error instanceof MarshalingError) {
        throw error;
      }
      throw new MarshalingError({
        message: `Failed to serialize value: ${GetErrorMessage({ error })}`,
        cause: error
      });
    }

    return Buffer.from(payload_json, 'utf8');
  }

  deserialize(params: { data: Buffer }): unknown {
    let parsed_envelope: unknown;
    try {
      parsed_envelope = JSON.parse(params.data.toString('utf8'));
    } catch (error) {
      throw new MarshalingError({
        message: `Failed to parse serialized value: ${GetErrorMessage({ error })}`,
        cause: error
      });
    }

    if (!IsPlainObject(parsed_envelope)) {
      throw new MarshalingError({ message: 'Serialized value is missing its envelope.' });
    }

    return DecodeErrorValues({ value: parsed_envelope.value });
  }
}
