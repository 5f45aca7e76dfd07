import { CompatError, TypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'compat-chain' });

/**
 * Wrap a chain assembly failure for throwing. A defective ladder would
 * resolve every later query against the wrong profile, so the failure is
 * logged at error level before it propagates.
 */
export function chainDefect(error: TypedError): CompatError {
  log.error(error.message, { code: error.code, ...error.details });
  return new CompatError(error);
}
