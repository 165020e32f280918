import { metrics, type Meter } from '@opentelemetry/api'
import { METER_NAME } from './constants.js'

/**
 * Return a named {@link Meter} from the global meter provider.
 * Returns a no-op meter unless the host application registered a provider.
 */
export function getMeter(name: string = METER_NAME): Meter {
  return metrics.getMeter(name)
}
