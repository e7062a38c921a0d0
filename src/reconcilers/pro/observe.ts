/**
 * Observation of the current Ubuntu Pro state
 */

import type { ProCli, ProStatus, ServiceStatus } from '../../pro/types.js';
import { serviceStatuses } from '../../pro/status.js';
import { reasonOf } from '../../pro/errors.js';
import { createRecord, ownValue } from '../../utils/records.js';
import type { ObservedState } from './types.js';
import { ObservationError } from './errors.js';

/**
 * Query `pro status` and project it onto the requested services.
 *
 * Never cached: subscription state can change out-of-band between calls.
 * Requested names absent from the payload are reported as not-entitled.
 *
 * @throws ObservationError if the status cannot be read or parsed
 */
export async function observeState(cli: ProCli, services: Iterable<string>): Promise<ObservedState> {
  let status: ProStatus;
  try {
    status = await cli.status();
  } catch (error) {
    throw new ObservationError(reasonOf(error));
  }

  if (!status.attached) {
    return { attached: false, services: createRecord() };
  }

  const all = serviceStatuses(status);
  const projected = createRecord<ServiceStatus>();
  for (const service of services) {
    projected[service] = ownValue(all, service) ?? 'not-entitled';
  }

  return { attached: true, services: projected };
}
