import { Packr } from 'msgpackr';

import type { rpc_serializer_i } from '../../types/project_types';

import { GetErrorMessage, MarshalingError } from '../rpcerrors/RpcErrors.class';
import { DecodeErrorValues, EncodeErrorValues, IsPlainObject } from './SerializedErrors';

/** MessagePack codec; keeps Dates, binary data and `undefined` that JSON would flatten. */
export class MsgpackSerializer implements rpc_serializer_i {
  private readonly packr = new Packr({ useRecords: false, mapsAsObjects: true });

  serialize(params: { value: unknown }): Buffer {
    const encoded_value = EncodeErrorValues({ value: params.value });

    try {
      return this.packr.pack({ value: encoded_value });
    } catch (error) {
      throw new MarshalingError({
        message: `Failed to serialize value: ${GetErrorMessage({ error })}`,
        cause: error
      });
    }
  }

  deserialize(params: { data: Buffer }): unknown {
    let unpacked_envelope: unknown;
    try {
      unpacked_envelope = this.packr.unpack(params.data);
    } catch (error) {
      throw new MarshalingError({
        message: `Failed to parse serialized value: ${GetErrorMessage({ error })}`,
        cause: error
      });
    }

    if (!IsPlainObject(unpacked_envelope)) {
      throw new MarshalingError({ message: 'Serialized value is missing its envelope.' });
    }

    return DecodeErrorValues({ value: unpacked_envelope.value });
  }
}
