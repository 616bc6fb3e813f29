/**
 * Hook Protocol
 *
 * Hooks intercept a value right after it was decoded (already typed) or
 * right before it is encoded. They may transform the value or reject it
 * through `state.raiseError()`. The engine does not re-check the type of
 * what a hook returns.
 */

import { InvalidPrimitiveValue, UserFailure, XmlError, createLocatedError, errorClassOf, isLocated } from './errors.js';
import type { ProcessorState, ProcessorStateView } from './state.js';
import type { StructuredValue } from './value.js';

export type HookFunction = (state: ProcessorStateView, value: StructuredValue) => StructuredValue;

export interface Hooks {
  afterDecode?: HookFunction;
  beforeEncode?: HookFunction;
}

export function applyAfterDecode(
  hooks: Hooks | undefined,
  state: ProcessorState,
  value: StructuredValue
): StructuredValue {
  return runHook(hooks?.afterDecode, state, value);
}

export function applyBeforeEncode(
  hooks: Hooks | undefined,
  state: ProcessorState,
  value: StructuredValue
): StructuredValue {
  return runHook(hooks?.beforeEncode, state, value);
}

function runHook(hook: HookFunction | undefined, state: ProcessorState, value: StructuredValue): StructuredValue {
  if (!hook) {
    return value;
  }

  try {
    return hook(state.view(), value);
  } catch (error) {
    if (isLocated(error)) {
      throw error;
    }
    if (error instanceof XmlError) {
      throw createLocatedError(errorClassOf(error), error.message, state.location, {
        cause: error,
        rawText: error instanceof InvalidPrimitiveValue ? error.rawText : undefined,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new UserFailure(message, state.location, { cause: error });
  }
}
