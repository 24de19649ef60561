import assert from 'node:assert';
import test from 'node:test';

import {
  FramedSocket,
  FunctionRegistry,
  ServerStateError,
  SingleConnectionRpcProxy,
  SingleConnectionRpcServer,
  type rpc_log_event_t
} from '../../src';

function Sleep(params: { duration_ms: number }): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, params.duration_ms);
  });
}

function add(left: unknown, right: unknown): number {
  return Number(left) + Number(right);
}

async function WaitFor(params: { condition: () => boolean; timeout_ms: number }): Promise<void> {
  const deadline_ms = Date.now() + params.timeout_ms;
  while (!params.condition()) {
    if (Date.now() > deadline_ms) {
      throw new Error('Condition was not met in time.');
    }
    await Sleep({ duration_ms: 10 });
  }
}

function CreateServer(params: { log_events?: rpc_log_event_t[] } = {}): SingleConnectionRpcServer {
  const log_events = params.log_events;
  const server = new SingleConnectionRpcServer({
    address: { host: '127.0.0.1', port: 0 },
    poll_interval_ms: 50,
    observability: log_events
      ? {
          log_sink: ({ log_event }) => {
            log_events.push(log_event);
          }
        }
      : undefined
  });
  server.registerFunction({ callable: add });
  return server;
}

test('a new server is idle and binds an ephemeral port on start.', async () => {
  const server = CreateServer();
  assert.equal(server.getState(), 'idle');
  assert.equal(server.getAddress().port, 0);

  await server.start();
  try {
    assert.equal(server.getState(), 'running');
    assert.equal(server.getAddress().host, '127.0.0.1');
    assert.ok(server.getAddress().port > 0);
  } finally {
    await server.teardown();
  }
});

test('a blocking stop returns once the accept loop has exited.', async () => {
  const server = CreateServer();
  await server.start();
  try {
    await server.stop({ block: true });
    assert.equal(server.getState(), 'stopped');
    assert.equal(server.isShuttingDown(), true);
  } finally {
    await server.teardown();
  }
});

test('a non-blocking stop reports shutting_down until the loop exits.', async () => {
  const server = CreateServer();
  await server.start();
  try {
    await server.stop();
    assert.equal(server.getState(), 'shutting_down');
    await WaitFor({ condition: () => server.getState() === 'stopped', timeout_ms: 2_000 });
  } finally {
    await server.teardown();
  }
});

test('a stopped server starts again on the same address.', async () => {
  const server = CreateServer();
  await server.start();
  const first_address = server.getAddress();
  try {
    await server.stop({ block: true });
    await server.start();
    assert.equal(server.getState(), 'running');
    assert.deepStrictEqual(server.getAddress(), first_address);

    const proxy = await SingleConnectionRpcProxy.connect({ address: server.getAddress() });
    try {
      assert.equal(await proxy.remote.add(2, 3), 5);
    } finally {
      await proxy.close();
    }
  } finally {
    await server.teardown();
  }
});

test('a stopped server neither serves nor holds new connections.', async () => {
  const server = new SingleConnectionRpcServer({
    address: { host: '127.0.0.1', port: 0 },
    poll_interval_ms: 50,
    listen_backlog: 5
  });
  server.registerFunction({ callable: add });
  await server.start();

  const client_sockets: FramedSocket[] = [];
  try {
    await server.stop({ block: true });

    for (let index = 0; index < 12; index += 1) {
      const client_socket = new FramedSocket();
      client_sockets.push(client_socket);
      await client_socket.connect({ address: server.getAddress() });
    }

    for (const client_socket of client_sockets) {
      assert.equal(await client_socket.recvFramed({ timeout_ms: 2_000 }), null);
    }
    assert.equal(server.getPendingConnectionCount(), 0);
    assert.equal(server.getLiveWorkerCount(), 0);

    await server.start();
    const proxy = await SingleConnectionRpcProxy.connect({ address: server.getAddress() });
    try {
      assert.equal(await proxy.remote.add(2, 2), 4);
    } finally {
      await proxy.close();
    }
  } finally {
    for (const client_socket of client_sockets) {
      client_socket.close();
    }
    await server.teardown();
  }
});

test('starting a running or torn-down server is a state error.', async () => {
  const server = CreateServer();
  await server.start();

  await assert.rejects(
    async () => {
      await server.start();
    },
    (error: unknown) => {
      assert.ok(error instanceof ServerStateError);
      assert.equal(error.message, 'Server is already running.');
      return true;
    }
  );

  await server.teardown();
  assert.equal(server.getState(), 'torn_down');

  await assert.rejects(
    async () => {
      await server.start();
    },
    {
      name: 'ServerStateError',
      message: 'Server has been torn down and cannot be started again.'
    }
  );
});

test('workers are tracked while connected and leave after shutdown.', async () => {
  const server = CreateServer();
  await server.start();

  const proxy = await SingleConnectionRpcProxy.connect({ address: server.getAddress() });
  try {
    assert.equal(await proxy.remote.add(1, 2), 3);
    assert.equal(server.getLiveWorkerCount(), 1);

    await server.stop({ block: true });
    await WaitFor({ condition: () => server.getLiveWorkerCount() === 0, timeout_ms: 2_000 });
  } finally {
    await proxy.close();
    await server.teardown();
  }
});

test('a worker leaves when its proxy disconnects.', async () => {
  const server = CreateServer();
  await server.start();
  try {
    const proxy = await SingleConnectionRpcProxy.connect({ address: server.getAddress() });
    assert.equal(await proxy.remote.add(1, 2), 3);
    await proxy.close();

    await WaitFor({ condition: () => server.getLiveWorkerCount() === 0, timeout_ms: 2_000 });
  } finally {
    await server.teardown();
  }
});

test('a shared registry serves functions registered before start.', async () => {
  const function_registry = new FunctionRegistry();
  function_registry.register({ callable: add, name: 'plus' });

  const server = new SingleConnectionRpcServer({
    address: { host: '127.0.0.1', port: 0 },
    function_registry,
    poll_interval_ms: 50
  });
  assert.equal(server.getFunctionRegistry(), function_registry);
  await server.start();

  const proxy = await SingleConnectionRpcProxy.connect({ address: server.getAddress() });
  try {
    assert.equal(await proxy.invoke('plus', 40, 2), 42);
  } finally {
    await proxy.close();
    await server.teardown();
  }
});

test('the server logs its lifecycle through the log sink.', async () => {
  const log_events: rpc_log_event_t[] = [];
  const server = CreateServer({ log_events });
  await server.start();

  const proxy = await SingleConnectionRpcProxy.connect({ address: server.getAddress() });
  try {
    assert.equal(await proxy.remote.add(1, 1), 2);
  } finally {
    await proxy.close();
    await WaitFor({ condition: () => server.getLiveWorkerCount() === 0, timeout_ms: 2_000 });
    await server.teardown();
  }

  const event_names = log_events.map((log_event) => `${log_event.component}:${log_event.event}`);
  assert.deepStrictEqual(event_names, [
    'server:accept_loop_started',
    'worker:worker_spawned',
    'worker:peer_closed',
    'worker:worker_exit',
    'server:accept_loop_stopped'
  ]);
});
