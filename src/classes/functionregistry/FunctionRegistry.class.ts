import type { register_function_params_t, rpc_callable_t } from '../../types/project_types';

import { DuplicateFunctionError, InvalidRegistrationError } from '../rpcerrors/RpcErrors.class';

export const INTENT_HOOK_SUFFIX = '_intent';

/**
 * Name to callable table owned by one server instance. Entries are never
 * replaced or removed; registering a taken name is a configuration error.
 */
export class FunctionRegistry {
  private readonly callable_by_name = new Map<string, rpc_callable_t>();

  register(params: register_function_params_t): string {
    if (typeof params.callable !== 'function') {
      throw new InvalidRegistrationError({ message: 'callable must be a function.' });
    }

    const function_name = params.name ?? params.callable.name;
    if (typeof function_name !== 'string' || function_name.length === 0) {
      throw new InvalidRegistrationError({
        message: 'A name is required when registering an anonymous function.'
      });
    }

    if (this.callable_by_name.has(function_name)) {
      throw new DuplicateFunctionError({ function_name });
    }

    this.callable_by_name.set(function_name, params.callable);
    return function_name;
  }

  lookup(params: { name: string }): rpc_callable_t | null {
    return this.callable_by_name.get(params.name) ?? null;
  }

  /**
   * The optional `<name>_intent` companion, called with `false` once a call to
   * `name` is accepted and with `true` if that call then fails before running.
   */
  lookupIntentHook(params: { name: string }): rpc_callable_t | null {
    return this.lookup({ name: `${params.name}${INTENT_HOOK_SUFFIX}` });
  }

  has(params: { name: string }): boolean {
    return this.callable_by_name.has(params.name);
  }

  listFunctionNames(): string[] {
    return Array.from(this.callable_by_name.keys()).sort();
  }
}
