/**
 * Example overview:
 *
 * 1. Server:
 *    - A `SingleConnectionRpcServer` listens on 127.0.0.1:3344.
 *    - `add` and `divide` are registered; `divide_intent` is the optional
 *      companion hook that hears about every accepted `divide` call.
 *
 * 2. Proxy:
 *    - `SingleConnectionRpcProxy.connect()` opens one persistent connection.
 *    - Calls go through the `remote` facade and through `invoke()`.
 *
 * 3. Errors:
 *    - Dividing by zero raises on the server and arrives as a
 *      `RemoteExceptionError`; the connection stays usable.
 *    - An unknown function arrives as a `RemoteError`.
 *
 * 4. Cleanup:
 *    - The proxy disconnects and the server is torn down.
 */
import {
  RemoteError,
  RemoteExceptionError,
  SingleConnectionRpcProxy,
  SingleConnectionRpcServer
} from './src';

function add(left: unknown, right: unknown): number {
  return Number(left) + Number(right);
}

function divide(dividend: unknown, divisor: unknown): number {
  if (Number(divisor) === 0) {
    throw new RangeError('Division by zero.');
  }
  return Number(dividend) / Number(divisor);
}

async function Main(): Promise<void> {
  const server = new SingleConnectionRpcServer({
    address: { host: '127.0.0.1', port: 3344 },
    poll_interval_ms: 250,
    observability: { enable_console_log: true }
  });

  server.registerFunction({ callable: add });
  server.registerFunction({ callable: divide });
  server.registerFunction({
    name: 'divide_intent',
    callable: (failed: unknown) => {
      console.log(`divide accepted (failed before running: ${String(failed)})`);
    }
  });

  await server.start();

  const proxy = await SingleConnectionRpcProxy.connect({
    address: server.getAddress()
  });

  try {
    console.log('add(2, 3) =', await proxy.remote.add(2, 3));
    console.log('divide(9, 3) =', await proxy.invoke('divide', 9, 3));

    try {
      await proxy.remote.divide(1, 0);
    } catch (error) {
      if (error instanceof RemoteExceptionError) {
        console.log(`divide(1, 0) failed remotely: ${error.remote_error.message}`);
      } else {
        throw error;
      }
    }

    try {
      await proxy.remote.multiply(2, 2);
    } catch (error) {
      if (error instanceof RemoteError) {
        console.log(`multiply(2, 2) rejected: ${error.message}`);
      } else {
        throw error;
      }
    }
  } finally {
    await proxy.close();
    await server.teardown();
  }
}

Main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
