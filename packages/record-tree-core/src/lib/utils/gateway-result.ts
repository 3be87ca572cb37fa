import { firstValueFrom, isObservable } from 'rxjs';

import type { GatewayResult } from '../types/resource-gateway';
import { type GatewayError, toGatewayError } from '../types/tree-errors';
import { err, type Result } from '../types/result';

/**
 * Runs a gateway call and settles it into a Result. Throws, rejected promises
 * and errored observables all become a GatewayError.
 */
export async function resolveGatewayResult<T>(
  call: () => GatewayResult<T>,
): Promise<Result<T, GatewayError>> {
  try {
    const result = call();
    if (isObservable(result)) {
      return await firstValueFrom(result);
    }
    return await result;
  } catch (error) {
    return err(toGatewayError(error));
  }
}
