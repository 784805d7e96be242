// ---------------------------------------------------------------------------
// Request builder: merges caller params over an operation's defaults and
// enforces its required fields.
// ---------------------------------------------------------------------------

import type { ParamValue, RequestParams } from "../core/types.js";
import { MissingParameterError } from "../core/errors.js";
import type {
  DefaultValue,
  DefaultsContext,
  OperationDescriptor,
} from "./descriptors.js";

/**
 * A value counts as missing when it is `null`, `undefined`, an empty string
 * or an empty array.  `0` and `false` are legitimate values.
 */
export function isMissing(value: ParamValue): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value === "";
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

function resolveDefault(value: DefaultValue, ctx: DefaultsContext): ParamValue {
  return typeof value === "function" ? value(ctx) : value;
}

/**
 * Build the parameter set for one call.
 *
 * Every key present in `callerParams` overrides the default, even when the
 * caller's value is empty.  Required fields are checked after the merge.
 *
 * @throws MissingParameterError naming the first required field that is
 *   missing.
 */
export function buildRequestParams(
  descriptor: OperationDescriptor,
  callerParams: RequestParams,
  ctx: DefaultsContext,
): Record<string, ParamValue> {
  const merged: Record<string, ParamValue> = {};

  for (const [key, value] of Object.entries(descriptor.defaultParams)) {
    merged[key] = resolveDefault(value, ctx);
  }
  for (const key of Object.keys(callerParams)) {
    merged[key] = callerParams[key];
  }

  for (const field of descriptor.requiredFields) {
    if (isMissing(merged[field])) {
      throw new MissingParameterError(field);
    }
  }

  return merged;
}
