import type {
  rpc_log_event_t,
  rpc_log_level_t,
  rpc_log_sink_t,
  rpc_observability_params_t
} from '../../types/project_types';

import { GetErrorMessage } from '../rpcerrors/RpcErrors.class';

export class RpcLogger {
  private readonly component: string;
  private readonly enable_console_log: boolean;
  private readonly log_sink: rpc_log_sink_t | null;

  constructor(params: { component: string; observability?: rpc_observability_params_t }) {
    this.component = params.component;
    this.enable_console_log = params.observability?.enable_console_log ?? false;
    this.log_sink = params.observability?.log_sink ?? null;
  }

  child(params: { component: string }): RpcLogger {
    return new RpcLogger({
      component: params.component,
      observability: {
        enable_console_log: this.enable_console_log,
        log_sink: this.log_sink ?? undefined
      }
    });
  }

  log(params: {
    level: rpc_log_level_t;
    event: string;
    message: string;
    details?: Record<string, unknown>;
  }): void {
    const log_event: rpc_log_event_t = {
      component: this.component,
      level: params.level,
      event: params.event,
      message: params.message,
      details: params.details
    };

    if (this.log_sink) {
      try {
        this.log_sink({ log_event });
      } catch (error) {
        if (this.enable_console_log) {
          console.warn(
            `[singleconnectionrpc][${this.component}] log_sink failed: ${GetErrorMessage({ error })}`
          );
        }
      }
    }

    if (!this.enable_console_log) {
      return;
    }

    const line = `[singleconnectionrpc][${this.component}] ${params.event}: ${params.message}`;
    if (params.level === 'warn') {
      console.warn(line);
    } else if (params.level === 'info') {
      console.info(line);
    } else {
      console.debug(line);
    }
  }
}
