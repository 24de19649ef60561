import assert from 'node:assert';
import test from 'node:test';

import { pack } from 'msgpackr';

import {
  JsonSerializer,
  MarshalingError,
  MsgpackSerializer,
  ReconstructedError,
  type rpc_serializer_i
} from '../../src';

const serializers: Array<{ label: string; serializer: rpc_serializer_i }> = [
  { label: 'json', serializer: new JsonSerializer() },
  { label: 'msgpack', serializer: new MsgpackSerializer() }
];

function RoundTrip(params: { serializer: rpc_serializer_i; value: unknown }): unknown {
  return params.serializer.deserialize({
    data: params.serializer.serialize({ value: params.value })
  });
}

for (const { label, serializer } of serializers) {
  test(`${label} serializer round-trips plain data and a top-level undefined.`, () => {
    assert.deepStrictEqual(
      RoundTrip({ serializer, value: [2, 'three', { nested: [true, null, 1.5] }] }),
      [2, 'three', { nested: [true, null, 1.5] }]
    );
    assert.equal(RoundTrip({ serializer, value: undefined }), undefined);
  });

  test(`${label} serializer rebuilds errors with name, message and code.`, () => {
    const thrown_error = Object.assign(new RangeError('value out of range'), {
      code: 'E_TEST_RANGE'
    });

    const rebuilt_value = RoundTrip({ serializer, value: { failure: thrown_error } });

    assert.ok(rebuilt_value && typeof rebuilt_value === 'object' && 'failure' in rebuilt_value);
    const rebuilt_error = rebuilt_value.failure;
    assert.ok(rebuilt_error instanceof ReconstructedError);
    assert.equal(rebuilt_error.name, 'RangeError');
    assert.equal(rebuilt_error.message, 'value out of range');
    assert.equal(rebuilt_error.code, 'E_TEST_RANGE');
    assert.equal(rebuilt_error.stack, thrown_error.stack);
  });

  test(`${label} serializer refuses circular structures.`, () => {
    const circular_value: Record<string, unknown> = { name: 'loop' };
    circular_value.self = circular_value;

    assert.throws(
      () => {
        serializer.serialize({ value: circular_value });
      },
      (error: unknown) => {
        assert.ok(error instanceof MarshalingError);
        assert.equal(error.message, 'Cannot serialize a circular structure.');
        return true;
      }
    );
  });

  test(`${label} serializer allows the same object twice when it is not circular.`, () => {
    const shared_value = { id: 7 };
    assert.deepStrictEqual(RoundTrip({ serializer, value: [shared_value, shared_value] }), [
      { id: 7 },
      { id: 7 }
    ]);
  });
}

test('json serializer rejects BigInt with a marshaling error.', () => {
  const serializer = new JsonSerializer();

  assert.throws(
    () => {
      serializer.serialize({ value: [10n] });
    },
    (error: unknown) => {
      assert.ok(error instanceof MarshalingError);
      assert.ok(error.message.startsWith('Failed to serialize value: '));
      return true;
    }
  );
});

test('json serializer rejects malformed and unwrapped input.', () => {
  const serializer = new JsonSerializer();

  assert.throws(
    () => {
      serializer.deserialize({ data: Buffer.from('{not json', 'utf8') });
    },
    (error: unknown) => {
      assert.ok(error instanceof MarshalingError);
      assert.ok(error.message.startsWith('Failed to parse serialized value: '));
      return true;
    }
  );

  assert.throws(
    () => {
      serializer.deserialize({ data: Buffer.from('[1,2]', 'utf8') });
    },
    { name: 'MarshalingError', message: 'Serialized value is missing its envelope.' }
  );
});

test('json serializer writes the value inside an envelope.', () => {
  const serializer = new JsonSerializer();

  assert.equal(
    serializer.serialize({ value: [2, 3] }).toString('utf8'),
    '{"value":[2,3]}'
  );
});

test('msgpack serializer keeps dates and undefined array entries.', () => {
  const serializer = new MsgpackSerializer();
  const created_at = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

  const rebuilt_value = RoundTrip({ serializer, value: [created_at, undefined, 'tail'] });

  assert.ok(Array.isArray(rebuilt_value));
  assert.equal(rebuilt_value.length, 3);
  assert.ok(rebuilt_value[0] instanceof Date);
  assert.equal(rebuilt_value[0].getTime(), created_at.getTime());
  assert.equal(rebuilt_value[1], undefined);
  assert.equal(rebuilt_value[2], 'tail');
});

test('msgpack serializer rejects truncated and unwrapped input.', () => {
  const serializer = new MsgpackSerializer();

  assert.throws(() => {
    serializer.deserialize({ data: Buffer.from([0x92, 0x01]) });
  }, MarshalingError);

  assert.throws(
    () => {
      serializer.deserialize({ data: pack([1, 2]) });
    },
    { name: 'MarshalingError', message: 'Serialized value is missing its envelope.' }
  );
});
