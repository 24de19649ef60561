import type { rpc_wire_frame_t } from '../../types/project_types';

const VERB_SEPARATOR = 0x20;

export const WIRE_VERBS = {
  perform: 'PERFORM',
  ack: 'ACK',
  nack: 'NACK',
  exception: 'EXCEPTION',
  result: 'RESULT'
} as const;

function BuildVerbFrame(params: { verb: string; payload: Buffer }): Buffer {
  return Buffer.concat([Buffer.from(`${params.verb} `, 'utf8'), params.payload]);
}

export function EncodeWireFrame(params: { frame: rpc_wire_frame_t }): Buffer {
  const { frame } = params;

  switch (frame.frame_type) {
    case 'perform':
      return Buffer.from(`${WIRE_VERBS.perform} ${frame.function_name}`, 'utf8');
    case 'ack':
      return Buffer.from(WIRE_VERBS.ack, 'utf8');
    case 'nack':
      return Buffer.from(`${WIRE_VERBS.nack} ${frame.reason}`, 'utf8');
    case 'exception':
      return BuildVerbFrame({ verb: WIRE_VERBS.exception, payload: frame.payload });
    case 'result':
      return BuildVerbFrame({ verb: WIRE_VERBS.result, payload: frame.payload });
    case 'unknown':
      return frame.frame;
  }
}

/**
 * Splits a frame into its verb token and the bytes after the first space.
 * Payload bytes are never decoded as text here; EXCEPTION and RESULT carry
 * serializer output verbatim.
 */
export function DecodeWireFrame(params: { frame: Buffer }): rpc_wire_frame_t {
  const { frame } = params;
  const separator_index = frame.indexOf(VERB_SEPARATOR);
  const verb = frame
    .subarray(0, separator_index === -1 ? frame.length : separator_index)
    .toString('utf8');
  const remainder = separator_index === -1 ? null : frame.subarray(separator_index + 1);

  switch (verb) {
    case WIRE_VERBS.perform:
      if (remainder === null || remainder.length === 0) {
        return { frame_type: 'unknown', frame };
      }
      return { frame_type: 'perform', function_name: remainder.toString('utf8') };
    case WIRE_VERBS.ack:
      if (remainder !== null) {
        return { frame_type: 'unknown', frame };
      }
      return { frame_type: 'ack' };
    case WIRE_VERBS.nack:
      return { frame_type: 'nack', reason: remainder === null ? '' : remainder.toString('utf8') };
    case WIRE_VERBS.exception:
      return { frame_type: 'exception', payload: remainder ?? Buffer.alloc(0) };
    case WIRE_VERBS.result:
      return { frame_type: 'result', payload: remainder ?? Buffer.alloc(0) };
    default:
      return { frame_type: 'unknown', frame };
  }
}
