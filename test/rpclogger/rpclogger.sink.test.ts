import assert from 'node:assert';
import test from 'node:test';

import { RpcLogger, type rpc_log_event_t } from '../../src';

test('log sink receives structured events from the logger and its children.', () => {
  const log_events: rpc_log_event_t[] = [];
  const logger = new RpcLogger({
    component: 'server',
    observability: {
      log_sink: ({ log_event }) => {
        log_events.push(log_event);
      }
    }
  });

  logger.log({ level: 'info', event: 'accept_loop_started', message: 'listening' });
  logger
    .child({ component: 'worker' })
    .log({ level: 'debug', event: 'worker_exit', message: 'bye', details: { peer: 'test-peer' } });

  assert.deepStrictEqual(log_events, [
    {
      component: 'server',
      level: 'info',
      event: 'accept_loop_started',
      message: 'listening',
      details: undefined
    },
    {
      component: 'worker',
      level: 'debug',
      event: 'worker_exit',
      message: 'bye',
      details: { peer: 'test-peer' }
    }
  ]);
});

test('a failing log sink does not reach the caller.', () => {
  const logger = new RpcLogger({
    component: 'proxy',
    observability: {
      log_sink: () => {
        throw new Error('sink failed');
      }
    }
  });

  assert.doesNotThrow(() => {
    logger.log({ level: 'warn', event: 'call_failed', message: 'add: test' });
  });
});
